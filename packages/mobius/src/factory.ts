/**
 * Construction of transformations over one plane.
 *
 * `transformation` accepts every construction form:
 *   transformation(a, b, c, d)       coefficients
 *   transformation([a, b, c, d])     coefficient sequence
 *   transformation([x, y, z])        (0, 1, ∞) → (x, y, z)
 *   transformation(source, target)   source triple → target triple
 */

import type { ExtendedPlane, Operand, ScalarInput } from '@conformal/field'
import { MobiusTransformation } from './transformation'
import type { Triple } from './triples'
import { canonicalTripleMap, tripleMap } from './triples'

export type Quad<I> = readonly [I, I, I, I]

export interface MobiusFactory<T> {
  readonly plane: ExtendedPlane<T>
  transformation(a: ScalarInput<T>, b: ScalarInput<T>, c: ScalarInput<T>, d: ScalarInput<T>): MobiusTransformation<T>
  transformation(sequence: Quad<ScalarInput<T>> | Triple<Operand<T>>): MobiusTransformation<T>
  transformation(source: Triple<Operand<T>>, target: Triple<Operand<T>>): MobiusTransformation<T>
  identity(): MobiusTransformation<T>
  fromCanonicalTriple(x: Operand<T>, y: Operand<T>, z: Operand<T>): MobiusTransformation<T>
  fromTriples(
    x: Operand<T>, y: Operand<T>, z: Operand<T>,
    X: Operand<T>, Y: Operand<T>, Z: Operand<T>,
  ): MobiusTransformation<T>
}

const COEFFICIENT_NAMES = ['a', 'b', 'c', 'd'] as const

function isSequence<T>(value: ScalarInput<T> | readonly Operand<T>[] | undefined): value is readonly Operand<T>[] {
  return Array.isArray(value)
}

function asTriple<T>(points: readonly Operand<T>[]): Triple<Operand<T>> {
  if (points.length !== 3) throw new RangeError(`Expected 3 points, got ${points.length}`)
  return [points[0], points[1], points[2]]
}

export function mobiusFactory<T>(plane: ExtendedPlane<T>): MobiusFactory<T> {
  const { field } = plane

  const fromCoefficients = (values: readonly unknown[]): MobiusTransformation<T> => {
    if (values.length !== 4) throw new RangeError(`Expected 4 coefficients, got ${values.length}`)
    const [a, b, c, d] = COEFFICIENT_NAMES.map((name, i) => plane.coerce(values[i], `coefficient ${name}`))
    const m = new MobiusTransformation(plane, a, b, c, d)
    if (plane.validates && field.isZero(m.determinant())) {
      plane.report({
        kind: 'zero-determinant',
        operation: 'transformation',
        detail: `determinant of ${m.toString()} is zero`,
      })
    }
    return m
  }

  function transformation(
    a: ScalarInput<T>, b: ScalarInput<T>, c: ScalarInput<T>, d: ScalarInput<T>,
  ): MobiusTransformation<T>
  function transformation(sequence: Quad<ScalarInput<T>> | Triple<Operand<T>>): MobiusTransformation<T>
  function transformation(source: Triple<Operand<T>>, target: Triple<Operand<T>>): MobiusTransformation<T>
  function transformation(
    first: ScalarInput<T> | readonly Operand<T>[],
    second?: ScalarInput<T> | readonly Operand<T>[],
    c?: ScalarInput<T>,
    d?: ScalarInput<T>,
  ): MobiusTransformation<T> {
    if (!isSequence<T>(first)) return fromCoefficients([first, second, c, d])
    if (isSequence<T>(second)) return tripleMap(plane, ...asTriple(first), ...asTriple(second))
    if (first.length === 3) return canonicalTripleMap(plane, ...asTriple(first))
    return fromCoefficients(first)
  }

  return {
    plane,
    transformation,
    identity: () => new MobiusTransformation(plane, field.one, field.zero, field.zero, field.one),
    fromCanonicalTriple: (x, y, z) => canonicalTripleMap(plane, x, y, z),
    fromTriples: (x, y, z, X, Y, Z) => tripleMap(plane, x, y, z, X, Y, Z),
  }
}
