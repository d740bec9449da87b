/**
 * Exact rational arithmetic on bigint numerators and denominators.
 *
 * Every constructor reduces, so structural equality is value equality.
 */

import type { GaussianRational, Rational } from './types'

function abs(a: bigint): bigint {
  return a < 0n ? -a : a
}

function gcd(a: bigint, b: bigint): bigint {
  let x = abs(a)
  let y = abs(b)
  while (y !== 0n) {
    const r = x % y
    x = y
    y = r
  }
  return x
}

export function rational(num: bigint | number, den: bigint | number = 1n): Rational {
  let n = BigInt(num)
  let d = BigInt(den)
  if (d === 0n) throw new RangeError('Rational with zero denominator')
  if (d < 0n) {
    n = -n
    d = -d
  }
  const g = gcd(n, d)
  return g > 1n ? { num: n / g, den: d / g } : { num: n, den: d }
}

export const RATIONAL_ZERO: Rational = rational(0n)
export const RATIONAL_ONE: Rational = rational(1n)

/**
 * Exact conversion of a finite double. Every double is k / 2^e, so doubling
 * until the value is an integer terminates and never rounds.
 */
export function rationalFromNumber(x: number): Rational | undefined {
  if (!Number.isFinite(x)) return undefined
  let scaled = x
  let den = 1n
  while (!Number.isInteger(scaled)) {
    scaled *= 2
    den *= 2n
  }
  return rational(BigInt(scaled), den)
}

// Bigints longer than this overflow Number(); shift both parts down first.
const MAX_CONVERTIBLE_BITS = 1020

function bitLength(a: bigint): number {
  return abs(a).toString(2).length
}

/** Nearest double, also for parts too large to convert on their own. */
export function rationalToNumber(r: Rational): number {
  const excess = Math.max(bitLength(r.num), bitLength(r.den)) - MAX_CONVERTIBLE_BITS
  if (excess <= 0) return Number(r.num) / Number(r.den)
  const shift = BigInt(excess)
  return Number(r.num >> shift) / Number(r.den >> shift)
}

export const addQ = (a: Rational, b: Rational): Rational =>
  rational(a.num * b.den + b.num * a.den, a.den * b.den)

export const subQ = (a: Rational, b: Rational): Rational =>
  rational(a.num * b.den - b.num * a.den, a.den * b.den)

export const mulQ = (a: Rational, b: Rational): Rational =>
  rational(a.num * b.num, a.den * b.den)

export const negQ = (a: Rational): Rational => ({ num: -a.num, den: a.den })

/** Throws RangeError for zero. */
export const invQ = (a: Rational): Rational => rational(a.den, a.num)

export const isZeroQ = (a: Rational): boolean => a.num === 0n

export const equalsQ = (a: Rational, b: Rational): boolean =>
  a.num === b.num && a.den === b.den

export function formatRational(r: Rational): string {
  return r.den === 1n ? r.num.toString() : `${r.num}/${r.den}`
}

// ─── Guards ─────────────────────────────────────────────────────────────────

export function isRational(value: unknown): value is Rational {
  return (
    typeof value === 'object' &&
    value !== null &&
    'num' in value &&
    'den' in value &&
    typeof value.num === 'bigint' &&
    typeof value.den === 'bigint'
  )
}

export function isGaussianRational(value: unknown): value is GaussianRational {
  return (
    typeof value === 'object' &&
    value !== null &&
    're' in value &&
    'im' in value &&
    isRational(value.re) &&
    isRational(value.im)
  )
}
