// Free-function forms of the transformation methods, for point-free use.

import type { Extended, Operand } from '@conformal/field'
import type { Coefficients, Matrix2, MobiusTransformation } from './transformation'

export function apply<T>(m: MobiusTransformation<T>, z: Operand<T>): Extended<T> {
  return m.apply(z)
}

/** m ∘ n: apply n first, then m. */
export function compose<T>(m: MobiusTransformation<T>, n: MobiusTransformation<T>): MobiusTransformation<T> {
  return m.compose(n)
}

/** Compose left to right as written: composeAll(f, g, h) = f ∘ g ∘ h. */
export function composeAll<T>(
  first: MobiusTransformation<T>,
  ...rest: readonly MobiusTransformation<T>[]
): MobiusTransformation<T> {
  return rest.reduce((acc, m) => acc.compose(m), first)
}

export function invert<T>(m: MobiusTransformation<T>): MobiusTransformation<T> {
  return m.invert()
}

export function equals<T>(m: MobiusTransformation<T>, n: MobiusTransformation<T>): boolean {
  return m.equals(n)
}

export function isOne<T>(m: MobiusTransformation<T>): boolean {
  return m.isOne()
}

export function determinant<T>(m: MobiusTransformation<T>): T {
  return m.determinant()
}

export function normalize<T>(m: MobiusTransformation<T>): MobiusTransformation<T> {
  return m.normalize()
}

export function asMatrix<T>(m: MobiusTransformation<T>): Matrix2<T> {
  return m.asMatrix()
}

export function coefficients<T>(m: MobiusTransformation<T>): Coefficients<T> {
  return m.coefficients()
}

export function hash<T>(m: MobiusTransformation<T>): number {
  return m.hash()
}
