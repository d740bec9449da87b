/**
 * Complex numbers over IEEE doubles.
 *
 * The point at infinity defaults to complex(Infinity, 0); any value with an
 * infinite part is treated as infinite.
 */

import type { Complex, ScalarField } from './types'
import { isGaussianRational, rationalToNumber } from './rational'

export function complex(re: number, im = 0): Complex {
  return { re, im }
}

export function isComplex(value: unknown): value is Complex {
  return (
    typeof value === 'object' &&
    value !== null &&
    're' in value &&
    'im' in value &&
    typeof value.re === 'number' &&
    typeof value.im === 'number'
  )
}

/** Format a double with negative zero shown as 0. */
function formatNumber(x: number): string {
  return String(x + 0)
}

export function formatComplex(z: Complex): string {
  const sign = z.im < 0 ? '-' : '+'
  return `${formatNumber(z.re)}${sign}${formatNumber(Math.abs(z.im))}i`
}

export const complexField: ScalarField<Complex> = {
  name: 'complex',
  zero: complex(0, 0),
  one: complex(1, 0),
  defaultInfinity: complex(Infinity, 0),

  add: (a, b) => complex(a.re + b.re, a.im + b.im),
  sub: (a, b) => complex(a.re - b.re, a.im - b.im),
  mul: (a, b) => complex(a.re * b.re - a.im * b.im, a.re * b.im + a.im * b.re),
  neg: (a) => complex(-a.re, -a.im),
  inv: (a) => {
    const d = a.re * a.re + a.im * a.im
    return complex(a.re / d, -a.im / d)
  },
  conj: (a) => complex(a.re, -a.im),

  isZero: (a) => a.re === 0 && a.im === 0,
  equals: (a, b) => a.re === b.re && a.im === b.im,
  isInfinite: (a) => Math.abs(a.re) === Infinity || Math.abs(a.im) === Infinity,

  fromParts: (re, im) => complex(re, im),
  real: (a) => complex(a.re, 0),
  imag: (a) => complex(a.im, 0),

  coerce(value) {
    if (typeof value === 'number') return complex(value, 0)
    if (typeof value === 'bigint') return complex(Number(value), 0)
    if (isComplex(value)) return value
    if (isGaussianRational(value)) {
      return complex(rationalToNumber(value.re), rationalToNumber(value.im))
    }
    return undefined
  },

  key: (a) => `${a.re + 0}:${a.im + 0}`,
  format: formatComplex,
}
