/**
 * The real line over IEEE doubles, infinity = Infinity.
 *
 * Values with a nonzero imaginary part have no representation, so planar
 * results that need one (stereographic projection) are not available here.
 */

import type { ScalarField } from './types'
import { TypeMismatchError } from './errors'
import { isComplex } from './complex'
import { isGaussianRational, isZeroQ, rationalToNumber } from './rational'

export const realField: ScalarField<number> = {
  name: 'real',
  zero: 0,
  one: 1,
  defaultInfinity: Infinity,

  add: (a, b) => a + b,
  sub: (a, b) => a - b,
  mul: (a, b) => a * b,
  neg: (a) => -a,
  inv: (a) => 1 / a,
  conj: (a) => a,

  isZero: (a) => a === 0,
  equals: (a, b) => a === b,
  isInfinite: (a) => Math.abs(a) === Infinity,

  fromParts(re, im) {
    if (im !== 0) throw new TypeMismatchError('real', im, 'imaginary part')
    return re
  },
  real: (a) => a,
  imag: () => 0,

  coerce(value) {
    if (typeof value === 'number') return value
    if (typeof value === 'bigint') return Number(value)
    if (isComplex(value)) return value.im === 0 ? value.re : undefined
    if (isGaussianRational(value)) return isZeroQ(value.im) ? rationalToNumber(value.re) : undefined
    return undefined
  },

  key: (a) => String(a + 0),
  format: (a) => String(a + 0),
}
