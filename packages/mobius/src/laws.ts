/**
 * Law checkers for Möbius transformations.
 *
 *   1. Associativity:  m ∘ (n ∘ p) ≡ (m ∘ n) ∘ p
 *   2. Left identity:  id ∘ m ≡ m
 *   3. Right identity: m ∘ id ≡ m
 *   4. Inverse:        m ∘ m⁻¹ ≡ id, pointwise as well
 *   5. Projective invariance: λm ≡ m for λ ≠ 0
 *   6. Triple mapping: the solved map sends its source points to its targets
 *
 * Exact fields satisfy these with the default projective equality. Float
 * fields need the caller's tolerant comparison. Built for fast-check properties.
 */

import type { Extended, ExtendedPlane, Operand, ScalarInput } from '@conformal/field'
import type { MobiusTransformation } from './transformation'
import { mobiusFactory } from './factory'
import type { Triple } from './triples'
import { canonicalTripleMap, tripleMap } from './triples'

export type MapEquality<T> = (m: MobiusTransformation<T>, n: MobiusTransformation<T>) => boolean
export type PointEquality<T> = (a: Extended<T>, b: Extended<T>) => boolean

const projectiveEquals = <T>(m: MobiusTransformation<T>, n: MobiusTransformation<T>): boolean => m.equals(n)

// ─── Group Laws ─────────────────────────────────────────────────────────────

export function checkAssociativity<T>(
  m: MobiusTransformation<T>,
  n: MobiusTransformation<T>,
  p: MobiusTransformation<T>,
  equals: MapEquality<T> = projectiveEquals,
): boolean {
  return equals(m.compose(n.compose(p)), m.compose(n).compose(p))
}

export function checkLeftIdentity<T>(
  m: MobiusTransformation<T>,
  equals: MapEquality<T> = projectiveEquals,
): boolean {
  return equals(mobiusFactory(m.plane).identity().compose(m), m)
}

export function checkRightIdentity<T>(
  m: MobiusTransformation<T>,
  equals: MapEquality<T> = projectiveEquals,
): boolean {
  return equals(m.compose(mobiusFactory(m.plane).identity()), m)
}

/**
 * m ∘ m⁻¹ is the identity matrix up to scale, and fixes every sample point.
 * The matrix test is exact; pass `exactMatrix = false` for float fields.
 */
export function checkInverse<T>(
  m: MobiusTransformation<T>,
  samples: readonly Operand<T>[],
  same: PointEquality<T> = (a, b) => m.plane.equals(a, b),
  exactMatrix = true,
): boolean {
  const roundTrip = m.compose(m.invert())
  if (exactMatrix && !roundTrip.isOne()) return false
  return samples.every((z) => same(roundTrip.apply(z), m.plane.resolve(z, 'sample')))
}

export function checkProjectiveInvariance<T>(
  m: MobiusTransformation<T>,
  lambda: ScalarInput<T>,
  equals: MapEquality<T> = projectiveEquals,
): boolean {
  return equals(m.scale(lambda), m)
}

// ─── Point Laws ─────────────────────────────────────────────────────────────

/** (0, 1, ∞) ↦ (x, y, z). */
export function checkTripleMapping<T>(
  plane: ExtendedPlane<T>,
  target: Triple<Operand<T>>,
  same: PointEquality<T> = (a, b) => plane.equals(a, b),
): boolean {
  const m = canonicalTripleMap(plane, ...target)
  const canonical: Triple<Operand<T>> = [plane.field.zero, plane.field.one, plane.infinity]
  return canonical.every((p, i) => same(m.apply(p), plane.resolve(target[i], 'target point')))
}

/** (x, y, z) ↦ (X, Y, Z). */
export function checkSixPointMapping<T>(
  plane: ExtendedPlane<T>,
  source: Triple<Operand<T>>,
  target: Triple<Operand<T>>,
  same: PointEquality<T> = (a, b) => plane.equals(a, b),
): boolean {
  const m = tripleMap(plane, ...source, ...target)
  return source.every((p, i) => same(m.apply(p), plane.resolve(target[i], 'target point')))
}
