/**
 * Scalar fields and the extended plane.
 *
 * Every algebraic operation in the library is written against ScalarField<T>,
 * so floating complex numbers, plain reals and exact Gaussian rationals all
 * run through the same transformation and projection code.
 */

// ─── Built-in Scalars ───────────────────────────────────────────────────────

export interface Complex {
  readonly re: number
  readonly im: number
}

/** Reduced fraction: den > 0, gcd(num, den) = 1. */
export interface Rational {
  readonly num: bigint
  readonly den: bigint
}

/** re + im·i with exact rational parts. */
export interface GaussianRational {
  readonly re: Rational
  readonly im: Rational
}

/** Any scalar a built-in field knows how to promote. */
export type Scalar = number | bigint | Complex | GaussianRational

/** Values accepted wherever an element of T is expected. */
export type ScalarInput<T> = T | Scalar

// ─── Point at Infinity ──────────────────────────────────────────────────────

export interface PointAtInfinity {
  readonly kind: 'point-at-infinity'
}

/** Canonical infinity for fields with no infinite element of their own. */
export const pointAtInfinity: PointAtInfinity = Object.freeze({ kind: 'point-at-infinity' })

export function isPointAtInfinity(value: unknown): value is PointAtInfinity {
  return value === pointAtInfinity
}

/** A point of the extended plane: a field element or infinity. */
export type Extended<T> = T | PointAtInfinity

/** Argument to a point mapping: anything coercible, or the infinity token. */
export type Operand<T> = ScalarInput<T> | PointAtInfinity

// ─── Field ──────────────────────────────────────────────────────────────────

/**
 * A field of scalars.
 *
 * Laws (exact fields satisfy them exactly, float fields up to rounding):
 *   add, mul associative and commutative; mul distributes over add
 *   add(a, zero) = a, mul(a, one) = a, mul(a, inv(a)) = one for a ≠ 0
 *
 * `isZero` and `equals` are exact tests. No tolerance is applied anywhere.
 */
export interface ScalarField<T> {
  readonly name: string
  readonly zero: T
  readonly one: T
  /** The value `apply` and `project` return for infinity unless reconfigured. */
  readonly defaultInfinity: Extended<T>

  add(a: T, b: T): T
  sub(a: T, b: T): T
  mul(a: T, b: T): T
  neg(a: T): T
  inv(a: T): T
  conj(a: T): T

  isZero(a: T): boolean
  equals(a: T, b: T): boolean
  isInfinite(a: T): boolean

  /** re + im·i. Throws TypeMismatchError if the field cannot hold it. */
  fromParts(re: number, im: number): T
  /** Real part, as an element of the field. */
  real(a: T): T
  /** Imaginary part, as an element of the field. */
  imag(a: T): T

  /** Promote a foreign value into the field, or undefined if it has no representation. */
  coerce(value: unknown): T | undefined
  /** Canonical string; equal elements share a key, negative zero included. */
  key(a: T): string
  format(a: T): string
}

// ─── Mapping ────────────────────────────────────────────────────────────────

/** A point map, the capability transformations and projections share. */
export interface Mapping<A, B> {
  apply(input: A): B
}
