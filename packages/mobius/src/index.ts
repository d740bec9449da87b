/**
 * @conformal/mobius
 *
 * Möbius transformations z ↦ (az + b) / (cz + d) on the extended plane:
 * construction (coefficients, point triples), application including the point
 * at infinity, and the group operations.
 *
 * The top-level constructors work over the default complex plane; use
 * `mobiusFactory(plane)` for any other scalar field.
 */

import type { Complex, ExtendedPlane } from '@conformal/field'
import { complexPlane } from '@conformal/field'
import type { MobiusTransformation } from './transformation'
import { mobiusFactory } from './factory'

// ─── Core ───────────────────────────────────────────────────────────────────
export { MobiusTransformation, type Coefficients, type Matrix2 } from './transformation'
export { mobiusFactory, type MobiusFactory, type Quad } from './factory'
export { canonicalTripleMap, tripleMap, type Triple } from './triples'
export { formatTransformation, describeTransformation } from './format'

// ─── Operations ─────────────────────────────────────────────────────────────
export {
  apply, compose, composeAll, invert, equals, isOne,
  determinant, normalize, asMatrix, coefficients, hash,
} from './operations'

// ─── Laws ───────────────────────────────────────────────────────────────────
export {
  checkAssociativity, checkLeftIdentity, checkRightIdentity,
  checkInverse, checkProjectiveInvariance,
  checkTripleMapping, checkSixPointMapping,
  type MapEquality, type PointEquality,
} from './laws'

// ─── Default Complex Plane ──────────────────────────────────────────────────

const complexMobius = mobiusFactory(complexPlane)

export const transformation = complexMobius.transformation
export const fromCanonicalTriple = complexMobius.fromCanonicalTriple
export const fromTriples = complexMobius.fromTriples

export function identityTransformation(): MobiusTransformation<Complex>
export function identityTransformation<T>(plane: ExtendedPlane<T>): MobiusTransformation<T>
export function identityTransformation<T>(
  plane?: ExtendedPlane<T>,
): MobiusTransformation<T> | MobiusTransformation<Complex> {
  return plane === undefined ? complexMobius.identity() : mobiusFactory(plane).identity()
}
