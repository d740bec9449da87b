/**
 * Möbius transformations z ↦ (az + b) / (cz + d) on the extended plane.
 *
 * A transformation is its 2×2 coefficient matrix up to a nonzero scalar:
 * (a, b, c, d) and (λa, λb, λc, λd) are the same map. Coefficients are stored
 * exactly as given and never normalized behind the caller's back, so equality
 * is projective rather than coefficient-wise.
 *
 * Group laws (exact fields exactly, float fields up to rounding):
 *   m ∘ (n ∘ p) = (m ∘ n) ∘ p
 *   m ∘ id = m = id ∘ m
 *   m ∘ m⁻¹ = id               (ad − bc ≠ 0)
 */

import type { Extended, ExtendedPlane, Mapping, Operand, ScalarInput } from '@conformal/field'
import { hashKeys } from '@conformal/field'
import { describeTransformation, formatTransformation } from './format'

export type Coefficients<T> = readonly [a: T, b: T, c: T, d: T]

export type Matrix2<T> = readonly [readonly [T, T], readonly [T, T]]

export class MobiusTransformation<T> implements Mapping<Operand<T>, Extended<T>> {
  constructor(
    readonly plane: ExtendedPlane<T>,
    readonly a: T,
    readonly b: T,
    readonly c: T,
    readonly d: T,
  ) {}

  // ─── Application ──────────────────────────────────────────────────────────

  /**
   * m(z). At infinity the value is a/c, or infinity when c = 0. Elsewhere a
   * denominator that is exactly zero (no tolerance) yields the plane's
   * configured infinity.
   */
  apply(z: Operand<T>): Extended<T> {
    const { field } = this.plane
    const { a, b, c, d } = this
    const w = this.plane.finite(this.plane.resolve(z, 'operand'))

    const numer = w === undefined ? a : field.add(field.mul(a, w), b)
    const denom = w === undefined ? c : field.add(field.mul(c, w), d)

    if (field.isZero(denom)) return this.plane.infinity
    return field.mul(numer, field.inv(denom))
  }

  applyAll(zs: readonly Operand<T>[]): Extended<T>[] {
    return zs.map((z) => this.apply(z))
  }

  // ─── Algebra ──────────────────────────────────────────────────────────────

  /** this ∘ other: the map z ↦ this(other(z)), as the matrix product. */
  compose(other: MobiusTransformation<T>): MobiusTransformation<T> {
    const { field } = this.plane
    const { add, mul } = field
    const [e, f, g, h] = this.adopt(other).coefficients()
    const { a, b, c, d } = this
    return new MobiusTransformation(
      this.plane,
      add(mul(a, e), mul(b, g)),
      add(mul(a, f), mul(b, h)),
      add(mul(c, e), mul(d, g)),
      add(mul(c, f), mul(d, h)),
    )
  }

  /** The adjugate (d, −b, −c, a): an inverse for any nonzero determinant, no division. */
  invert(): MobiusTransformation<T> {
    const { neg } = this.plane.field
    return new MobiusTransformation(this.plane, this.d, neg(this.b), neg(this.c), this.a)
  }

  /** Projective equality: this ∘ other⁻¹ is the identity. */
  equals(other: MobiusTransformation<T>): boolean {
    return this.compose(this.adopt(other).invert()).isOne()
  }

  /** Whether the stored coefficients are a multiple of the identity: b = c = 0, a = d. */
  isOne(): boolean {
    const { field } = this.plane
    return field.isZero(this.b) && field.isZero(this.c) && field.equals(this.a, this.d)
  }

  determinant(): T {
    const { sub, mul } = this.plane.field
    return sub(mul(this.a, this.d), mul(this.b, this.c))
  }

  /** λ·m: the same map with scaled coefficients. */
  scale(lambda: ScalarInput<T>): MobiusTransformation<T> {
    const { mul } = this.plane.field
    const l = this.plane.coerce(lambda, 'scale factor')
    return new MobiusTransformation(this.plane, mul(l, this.a), mul(l, this.b), mul(l, this.c), mul(l, this.d))
  }

  /**
   * inv(det)·m. Undefined for a zero determinant: float fields produce
   * non-finite coefficients, exact fields throw.
   */
  normalize(): MobiusTransformation<T> {
    const { field } = this.plane
    const det = this.determinant()
    if (this.plane.validates && field.isZero(det)) {
      this.plane.report({
        kind: 'zero-determinant',
        operation: 'normalize',
        detail: `determinant of ${this.toString()} is zero`,
      })
    }
    return this.scale(field.inv(det))
  }

  // ─── Views ────────────────────────────────────────────────────────────────

  coefficients(): Coefficients<T> {
    return [this.a, this.b, this.c, this.d]
  }

  asMatrix(): Matrix2<T> {
    return [
      [this.a, this.b],
      [this.c, this.d],
    ]
  }

  /**
   * Hash of the images of 0, 1 and ∞. These determine the map, so
   * projectively equal transformations hash alike; keys fold negative zero.
   */
  hash(): number {
    const { zero, one } = this.plane.field
    const images = this.applyAll([zero, one, this.plane.infinity])
    return hashKeys(images.map((z) => this.plane.key(z)))
  }

  toString(): string {
    return formatTransformation(this)
  }

  /** Multi-line rendering: field name, numerator over denominator. */
  describe(): string {
    return describeTransformation(this)
  }

  /** Bring a transformation over another plane into this one's field. */
  private adopt(other: MobiusTransformation<T>): MobiusTransformation<T> {
    if (other.plane.field === this.plane.field) return other
    const [a, b, c, d] = other.coefficients().map((v, i) => this.plane.coerce(v, `coefficient ${'abcd'.charAt(i)}`))
    return new MobiusTransformation(this.plane, a, b, c, d)
  }
}
