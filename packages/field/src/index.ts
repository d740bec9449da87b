/**
 * @conformal/field
 *
 * Scalar fields, the point at infinity, and the extended-plane context that
 * transformations and projections are computed in.
 */

// ─── Types ──────────────────────────────────────────────────────────────────
export {
  type Complex, type Rational, type GaussianRational,
  type Scalar, type ScalarInput, type Operand,
  type PointAtInfinity, type Extended,
  type ScalarField, type Mapping,
  pointAtInfinity, isPointAtInfinity,
} from './types'

// ─── Fields ─────────────────────────────────────────────────────────────────
export { complex, isComplex, formatComplex, complexField } from './complex'
export { realField } from './real'
export { gaussian, gaussianOf, formatGaussian, gaussianRationalField } from './gaussian'
export {
  rational, rationalFromNumber, rationalToNumber, formatRational,
  isRational, isGaussianRational,
  RATIONAL_ZERO, RATIONAL_ONE,
} from './rational'

// ─── Infinity & Plane ───────────────────────────────────────────────────────
export { InfinityRegistry } from './infinity'
export { ExtendedPlane, createPlane, type PlaneOptions, type Degeneracy } from './plane'
export { complexPlane, getInfinity, setInfinity, resetInfinity } from './defaults'

// ─── Errors ─────────────────────────────────────────────────────────────────
export {
  ConformalError, TypeMismatchError, DegenerateTransformationError,
  describeValue,
  type ConformalErrorCode, type DegeneracyKind,
} from './errors'

// ─── Hashing ────────────────────────────────────────────────────────────────
export { murmurHash3_32, hashKeys } from './hash'
