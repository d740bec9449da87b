/**
 * Transformations determined by three points.
 *
 * A Möbius map is fixed by the images of any three distinct points. The
 * canonical source is (0, 1, ∞); a general source → target map is the
 * composite target ∘ source⁻¹, which needs no division and no case analysis
 * beyond the canonical one.
 */

import type { ExtendedPlane, Operand } from '@conformal/field'
import { MobiusTransformation } from './transformation'

export type Triple<I> = readonly [I, I, I]

/**
 * The map sending (0, 1, ∞) to (x, y, z). Any one point may be infinite.
 *
 *   x = ∞:  (z, y − z, 1, 0)
 *   y = ∞:  (−z, x, −1, 1)
 *   z = ∞:  (y − x, x, 0, 1)
 *   else:   (z(y − x), x(z − y), y − x, z − y)
 *
 * The points must be distinct. Coincident points give a non-invertible map,
 * reported only under the plane's validation mode; two infinite points give
 * the zero matrix.
 */
export function canonicalTripleMap<T>(
  plane: ExtendedPlane<T>,
  x: Operand<T>,
  y: Operand<T>,
  z: Operand<T>,
): MobiusTransformation<T> {
  const { zero, one, sub, mul, neg } = plane.field
  const [px, py, pz] = [x, y, z].map((p, i) => plane.finite(plane.resolve(p, `point ${i + 1}`)))

  if (plane.validates) reportCoincidences(plane, [px, py, pz], 'fromCanonicalTriple')

  const map = (a: T, b: T, c: T, d: T) => new MobiusTransformation(plane, a, b, c, d)

  if (px === undefined) {
    if (py === undefined || pz === undefined) return map(zero, zero, zero, zero)
    return map(pz, sub(py, pz), one, zero)
  }
  if (py === undefined) {
    if (pz === undefined) return map(zero, zero, zero, zero)
    return map(neg(pz), px, neg(one), one)
  }
  if (pz === undefined) {
    return map(sub(py, px), px, zero, one)
  }
  const xy = sub(py, px)
  const yz = sub(pz, py)
  return map(mul(pz, xy), mul(px, yz), xy, yz)
}

/** The map sending (x, y, z) to (X, Y, Z). */
export function tripleMap<T>(
  plane: ExtendedPlane<T>,
  x: Operand<T>, y: Operand<T>, z: Operand<T>,
  X: Operand<T>, Y: Operand<T>, Z: Operand<T>,
): MobiusTransformation<T> {
  const toSource = canonicalTripleMap(plane, x, y, z) // (0, 1, ∞) → (x, y, z)
  const toTarget = canonicalTripleMap(plane, X, Y, Z) // (0, 1, ∞) → (X, Y, Z)
  return toTarget.compose(toSource.invert())
}

const PAIRS = [[0, 1], [0, 2], [1, 2]] as const

function reportCoincidences<T>(
  plane: ExtendedPlane<T>,
  points: readonly (T | undefined)[],
  operation: string,
): void {
  for (const [i, j] of PAIRS) {
    const p = points[i]
    const q = points[j]
    const coincide = p === undefined || q === undefined
      ? p === undefined && q === undefined
      : plane.field.equals(p, q)
    if (coincide) {
      plane.report({
        kind: 'coincident-points',
        operation,
        detail: `points ${i + 1} and ${j + 1} coincide`,
      })
      return
    }
  }
}
