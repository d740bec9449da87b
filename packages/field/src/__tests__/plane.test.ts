import { describe, it, expect, afterEach } from 'vitest'
import { createLogger } from '@conformal/config'
import type { LogEntry } from '@conformal/config'
import { createPlane } from '../plane'
import { complexPlane, getInfinity, setInfinity, resetInfinity } from '../defaults'
import { complex } from '../complex'
import { realField } from '../real'
import { gaussianOf, gaussianRationalField } from '../gaussian'
import { pointAtInfinity } from '../types'
import { DegenerateTransformationError, TypeMismatchError } from '../errors'
import { murmurHash3_32, hashKeys } from '../hash'

afterEach(() => {
  resetInfinity()
})

describe('ExtendedPlane: infinity', () => {
  it('recognizes the token, the configured value and infinite elements', () => {
    expect(complexPlane.isInfinite(pointAtInfinity)).toBe(true)
    expect(complexPlane.isInfinite(complex(Infinity, 0))).toBe(true)
    expect(complexPlane.isInfinite(complex(0, -Infinity))).toBe(true)
    expect(complexPlane.isInfinite(complex(1, 0))).toBe(false)
  })

  it('treats a configured sentinel as infinite', () => {
    const plane = createPlane(realField, { infinity: Number.MAX_VALUE })
    expect(plane.infinity).toBe(Number.MAX_VALUE)
    expect(plane.isInfinite(Number.MAX_VALUE)).toBe(true)
    expect(plane.isInfinite(1)).toBe(false)
  })

  it('exact planes default to the token', () => {
    expect(createPlane(gaussianRationalField).infinity).toBe(pointAtInfinity)
  })

  it('all infinities are one point', () => {
    expect(complexPlane.equals(pointAtInfinity, complex(Infinity, 0))).toBe(true)
    expect(complexPlane.equals(pointAtInfinity, complex(0, 0))).toBe(false)
    expect(complexPlane.key(complex(-Infinity, 5))).toBe('inf')
    expect(complexPlane.format(pointAtInfinity)).toBe('∞')
  })
})

describe('process-wide infinity', () => {
  it('defaults to complex infinity', () => {
    expect(getInfinity()).toEqual(complex(Infinity, 0))
  })

  it('setInfinity reconfigures the default plane', () => {
    setInfinity(pointAtInfinity)
    expect(getInfinity()).toBe(pointAtInfinity)
    expect(complexPlane.infinity).toBe(pointAtInfinity)
  })

  it('planes with their own registry are unaffected', () => {
    const isolated = createPlane(complexPlane.field)
    setInfinity(pointAtInfinity)
    expect(isolated.infinity).toEqual(complex(Infinity, 0))
  })
})

describe('ExtendedPlane: coercion', () => {
  it('names the field and role on mismatch', () => {
    const exact = createPlane(gaussianRationalField)
    expect(() => exact.coerce(Number.NaN, 'coefficient a')).toThrow(
      'Cannot represent number NaN as gaussian-rational (coefficient a)',
    )
  })

  it('rejects arbitrary values', () => {
    expect(() => complexPlane.coerce('2+3i', 'operand')).toThrow(TypeMismatchError)
  })

  it('resolve lets the token through', () => {
    const real = createPlane(realField)
    expect(real.resolve(pointAtInfinity, 'operand')).toBe(pointAtInfinity)
    expect(real.resolve(3n, 'operand')).toBe(3)
  })

  it('builds complex values from the field', () => {
    const exact = createPlane(gaussianRationalField)
    expect(exact.complex(gaussianOf(1), gaussianOf(2))).toEqual(gaussianOf(1, 2))
  })
})

describe('ExtendedPlane: validation', () => {
  const degeneracy = { kind: 'zero-determinant', operation: 'normalize', detail: 'determinant is zero' } as const

  it('off ignores degeneracies', () => {
    const plane = createPlane(realField, { validation: 'off' })
    expect(() => plane.report(degeneracy)).not.toThrow()
    expect(plane.validates).toBe(false)
  })

  it('warn logs a structured warning', () => {
    const entries: LogEntry[] = []
    const logger = createLogger('test', { level: 'debug', sink: (e) => { entries.push(e) } })
    const plane = createPlane(realField, { validation: 'warn', logger })

    plane.report(degeneracy)

    expect(entries).toHaveLength(1)
    expect(entries[0]).toMatchObject({
      level: 'warn',
      scope: 'test',
      msg: 'determinant is zero',
      kind: 'zero-determinant',
      operation: 'normalize',
    })
  })

  it('strict throws', () => {
    const plane = createPlane(realField, { validation: 'strict' })
    expect(() => plane.report(degeneracy)).toThrow(DegenerateTransformationError)
    expect(() => plane.report(degeneracy)).toThrow('Degenerate input to normalize: determinant is zero')
  })
})

describe('murmurHash3_32', () => {
  it('matches reference vectors', () => {
    expect(murmurHash3_32('', 0)).toBe(0)
    expect(murmurHash3_32('The quick brown fox jumps over the lazy dog', 0)).toBe(0x2e4ff723)
  })

  it('takes the seed into account', () => {
    expect(murmurHash3_32('', 1)).toBe(0x514e28b7)
  })

  it('hashKeys hashes the joined keys', () => {
    expect(hashKeys(['0:0', 'inf'])).toBe(murmurHash3_32('0:0|inf'))
  })

  it('hashKeys keeps key boundaries', () => {
    expect(hashKeys(['ab', 'c'])).not.toBe(hashKeys(['a', 'bc']))
  })
})
