/**
 * Gaussian rationals Q(i): an exact field.
 *
 * No element is infinite, so infinity is the pointAtInfinity token. Finite
 * doubles and complex values convert exactly; NaN and ±Infinity have no
 * representation.
 */

import type { GaussianRational, Rational, ScalarField } from './types'
import { pointAtInfinity } from './types'
import { TypeMismatchError } from './errors'
import { isComplex } from './complex'
import {
  RATIONAL_ONE, RATIONAL_ZERO,
  addQ, subQ, mulQ, negQ, invQ, isZeroQ, equalsQ,
  formatRational, isGaussianRational, rational, rationalFromNumber,
} from './rational'

export function gaussian(re: Rational, im: Rational = RATIONAL_ZERO): GaussianRational {
  return { re, im }
}

/** Shorthand for integer or fractional parts: gaussianOf(1, 2) = 1 + 2i, gaussianOf([1, 2]) = 1/2. */
export function gaussianOf(
  re: bigint | number | readonly [bigint | number, bigint | number],
  im: bigint | number | readonly [bigint | number, bigint | number] = 0n,
): GaussianRational {
  const part = (p: bigint | number | readonly [bigint | number, bigint | number]): Rational =>
    typeof p === 'object' ? rational(p[0], p[1]) : rational(p)
  return gaussian(part(re), part(im))
}

function fromNumbers(re: number, im: number): GaussianRational | undefined {
  const r = rationalFromNumber(re)
  const i = rationalFromNumber(im)
  if (r === undefined || i === undefined) return undefined
  return gaussian(r, i)
}

export function formatGaussian(z: GaussianRational): string {
  const sign = z.im.num < 0n ? '-' : '+'
  const magnitude = formatRational({ num: z.im.num < 0n ? -z.im.num : z.im.num, den: z.im.den })
  const imPart = z.im.den === 1n ? magnitude : `(${magnitude})`
  return `${formatRational(z.re)}${sign}${imPart}i`
}

export const gaussianRationalField: ScalarField<GaussianRational> = {
  name: 'gaussian-rational',
  zero: gaussian(RATIONAL_ZERO, RATIONAL_ZERO),
  one: gaussian(RATIONAL_ONE, RATIONAL_ZERO),
  defaultInfinity: pointAtInfinity,

  add: (a, b) => gaussian(addQ(a.re, b.re), addQ(a.im, b.im)),
  sub: (a, b) => gaussian(subQ(a.re, b.re), subQ(a.im, b.im)),
  mul: (a, b) => gaussian(
    subQ(mulQ(a.re, b.re), mulQ(a.im, b.im)),
    addQ(mulQ(a.re, b.im), mulQ(a.im, b.re)),
  ),
  neg: (a) => gaussian(negQ(a.re), negQ(a.im)),
  inv: (a) => {
    // (x - yi) / (x² + y²); invQ throws on zero
    const norm = invQ(addQ(mulQ(a.re, a.re), mulQ(a.im, a.im)))
    return gaussian(mulQ(a.re, norm), negQ(mulQ(a.im, norm)))
  },
  conj: (a) => gaussian(a.re, negQ(a.im)),

  isZero: (a) => isZeroQ(a.re) && isZeroQ(a.im),
  equals: (a, b) => equalsQ(a.re, b.re) && equalsQ(a.im, b.im),
  isInfinite: () => false,

  fromParts(re, im) {
    const z = fromNumbers(re, im)
    if (z === undefined) {
      const real = Number.isFinite(re)
      throw new TypeMismatchError('gaussian-rational', real ? im : re, real ? 'imaginary part' : 'real part')
    }
    return z
  },
  real: (a) => gaussian(a.re, RATIONAL_ZERO),
  imag: (a) => gaussian(a.im, RATIONAL_ZERO),

  coerce(value) {
    if (typeof value === 'bigint') return gaussian(rational(value))
    if (typeof value === 'number') return fromNumbers(value, 0)
    if (isGaussianRational(value)) return value
    if (isComplex(value)) return fromNumbers(value.re, value.im)
    return undefined
  },

  key: (a) => `${a.re.num}/${a.re.den}:${a.im.num}/${a.im.den}`,
  format: formatGaussian,
}
