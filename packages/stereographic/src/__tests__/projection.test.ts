import { describe, it, expect, afterEach } from 'vitest'
import fc from 'fast-check'
import { settings } from '@conformal/config'
import {
  complex, complexPlane, createPlane, gaussianOf, gaussianRationalField, realField,
  getInfinity, setInfinity, resetInfinity, isComplex, pointAtInfinity,
  TypeMismatchError,
} from '@conformal/field'
import type { Complex, Extended, GaussianRational } from '@conformal/field'
import { transformation } from '@conformal/mobius'
import {
  stereographicProjection, stereographicProjectionOf, projectionOn, complementAxes,
} from '../index'
import type { Point3 } from '../index'

function expectComplex(z: Extended<Complex>, re: number, im: number): void {
  expect(isComplex(z) && !complexPlane.isInfinite(z)).toBe(true)
  if (!isComplex(z)) return
  expect(z.re).toBeCloseTo(re, 12)
  expect(z.im).toBeCloseTo(im, 12)
}

function expectPoint(p: Point3<Complex>, expected: readonly [number, number, number]): void {
  p.forEach((coordinate, i) => {
    expect(coordinate.re).toBeCloseTo(expected[i], 12)
    expect(coordinate.im).toBeCloseTo(0, 12)
  })
}

const exactPlane = createPlane(gaussianRationalField)

afterEach(() => {
  resetInfinity()
})

// ─── Geometry ───────────────────────────────────────────────────────────────

describe('stereographicProjection', () => {
  it('centres on the origin with the configured north axis', () => {
    const proj = stereographicProjection()
    expect(proj.center()).toEqual([complex(0, 0), complex(0, 0), complex(0, 0)])
    expect(proj.northAxis).toBe(settings.northAxis)
  })

  it('puts the north pole one unit along the north axis', () => {
    const proj = stereographicProjection([1, 2, 3], { northAxis: 2 })
    expectPoint(proj.northPole(), [1, 2, 4])
    expectPoint(stereographicProjection([1, 2, 3], { northAxis: 0 }).northPole(), [2, 2, 3])
  })

  it('lists the remaining axes in ascending order', () => {
    expect(complementAxes(0)).toEqual([1, 2])
    expect(complementAxes(1)).toEqual([0, 2])
    expect(stereographicProjection(undefined, { northAxis: 2 }).otherAxes).toEqual([0, 1])
  })

  it('rejects a center the field cannot hold', () => {
    expect(() => stereographicProjection([complex(0, 1), 0, 0], { plane: createPlane(realField) }))
      .toThrow(TypeMismatchError)
  })
})

// ─── Sphere → Plane ─────────────────────────────────────────────────────────

describe('project', () => {
  const proj = stereographicProjection(undefined, { northAxis: 2 })

  it('sends the north pole to infinity', () => {
    expect(proj.project([0, 0, 1])).toBe(getInfinity())
  })

  it('returns the infinity configured at call time', () => {
    setInfinity(pointAtInfinity)
    expect(proj.project([0, 0, 1])).toBe(pointAtInfinity)
  })

  it('sends the sphere center to the origin', () => {
    expectComplex(proj.project([0, 0, 0]), 0, 0)
  })

  it('sends a southern point inside the unit disc', () => {
    expectComplex(proj.project([0.6, 0, -0.8]), 1 / 3, 0)
  })

  it('projects exactly over gaussian rationals', () => {
    const exact = stereographicProjectionOf(exactPlane, { northAxis: 2 })
    expect(exact.project([gaussianOf([3, 5]), 0, gaussianOf([-4, 5])])).toEqual(gaussianOf([1, 3]))
    expect(exact.project([0, 1, 0])).toEqual(gaussianOf(0, 1))
  })

  it('follows a shifted center', () => {
    const shifted = projectionOn(exactPlane, [1, 2, 0], { northAxis: 2 })
    expect(shifted.project([1, 2, -1])).toEqual(gaussianOf(1, 2))
  })

  it('uses the other axes when north is axis 1', () => {
    const sideways = stereographicProjectionOf(exactPlane, { northAxis: 1 })
    expect(sideways.project([0, 1, 0])).toBe(pointAtInfinity)
    expect(sideways.project([0, -1, 0])).toEqual(gaussianOf(0))
    expect(sideways.project([1, 0, 0])).toEqual(gaussianOf(1))
  })

  it('sends points at the pole\'s height to infinity', () => {
    const exact = stereographicProjectionOf(exactPlane, { northAxis: 2 })
    expect(exact.project([1, 0, 1])).toBe(pointAtInfinity)
    expect(exact.project([0, gaussianOf(-3), 1])).toBe(pointAtInfinity)
    expect(proj.project([1, 0, 1])).toBe(getInfinity())
  })

  it('needs an imaginary unit in the field', () => {
    const line = stereographicProjectionOf(createPlane(realField), { northAxis: 2 })
    expect(() => line.project([0, 0, 0])).toThrow(TypeMismatchError)
  })
})

// ─── Plane → Sphere ─────────────────────────────────────────────────────────

describe('unproject', () => {
  const proj = stereographicProjection(undefined, { northAxis: 2 })
  const exact = stereographicProjectionOf(exactPlane, { northAxis: 2 })

  it('sends infinity to the north pole', () => {
    expectPoint(proj.unproject(pointAtInfinity), [0, 0, 1])
    expectPoint(proj.unproject(getInfinity()), [0, 0, 1])
    expect(exact.unproject(pointAtInfinity)).toEqual(exact.northPole())
  })

  it('sends 0 to the south pole', () => {
    expectPoint(proj.unproject(0), [0, 0, -1])
  })

  it('inverts the southern example', () => {
    expectPoint(proj.unproject(1 / 3), [0.6, 0, -0.8])
  })

  it('is exact over gaussian rationals', () => {
    expect(exact.unproject(gaussianOf([1, 3]))).toEqual([gaussianOf([3, 5]), gaussianOf(0), gaussianOf([-4, 5])])
    expect(exact.unproject(gaussianOf(0, 1))).toEqual([gaussianOf(0), gaussianOf(1), gaussianOf(0)])
  })

  it('places the real and imaginary parts on the other axes', () => {
    const sideways = stereographicProjectionOf(exactPlane, { northAxis: 1 })
    expect(sideways.unproject(gaussianOf(0, 1))).toEqual([gaussianOf(0), gaussianOf(0), gaussianOf(1)])
  })

  it('follows a shifted center', () => {
    const shifted = projectionOn(exactPlane, [1, 2, 0], { northAxis: 2 })
    expect(shifted.unproject(gaussianOf(1, 2))).toEqual([gaussianOf(1), gaussianOf(2), gaussianOf(-1)])
  })

  it('sends the foot of a pole lying on the plane back to the pole', () => {
    const lowered = projectionOn(exactPlane, [0, 0, -1], { northAxis: 2 })
    expect(lowered.unproject(gaussianOf(0))).toEqual([gaussianOf(0), gaussianOf(0), gaussianOf(0)])
    expectPoint(stereographicProjection([0, 0, -1], { northAxis: 2 }).unproject(0), [0, 0, 0])
  })

  it('works over the real line', () => {
    const line = stereographicProjectionOf(createPlane(realField), { northAxis: 2 })
    const [x, y, z] = line.unproject(1 / 3)
    expect(x).toBeCloseTo(0.6, 12)
    expect(y).toBeCloseTo(0, 12)
    expect(z).toBeCloseTo(-0.8, 12)
  })
})

// ─── Dispatch & Round Trips ─────────────────────────────────────────────────

describe('apply', () => {
  const exact = stereographicProjectionOf(exactPlane, { northAxis: 2 })

  it('projects points and unprojects everything else', () => {
    expect(exact.apply([0, 0, 0])).toEqual(gaussianOf(0))
    expect(exact.apply(gaussianOf(0))).toEqual([gaussianOf(0), gaussianOf(0), gaussianOf(-1)])
    expect(exact.apply(pointAtInfinity)).toEqual(exact.northPole())
  })

  it('renders the field, center and axis', () => {
    expect(exact.toString()).toBe('StereographicProjection(gaussian-rational) center (0+0i, 0+0i, 0+0i), north axis 2')
  })
})

const part = fc.tuple(fc.integer({ min: -20, max: 20 }), fc.integer({ min: 1, max: 5 }))
const gaussianArb: fc.Arbitrary<GaussianRational> = fc.tuple(part, part).map(([re, im]) => gaussianOf(re, im))

describe('round trips', () => {
  it('project ∘ unproject is the identity over gaussian rationals, infinity included', () => {
    const exact = stereographicProjectionOf(exactPlane, { northAxis: 2 })
    fc.assert(
      fc.property(fc.oneof(gaussianArb, fc.constant(pointAtInfinity)), (z) =>
        exactPlane.equals(exact.project(exact.unproject(z)), z)),
    )
  })

  it('unproject ∘ project is the identity on the sphere', () => {
    const exact = projectionOn(exactPlane, [1, -2, 3], { northAxis: 0 })
    fc.assert(
      fc.property(gaussianArb, (z) => {
        const point = exact.unproject(z)
        const back = exact.unproject(exact.project(point))
        return back.every((coordinate, i) => gaussianRationalField.equals(coordinate, point[i]))
      }),
    )
  })

  it('holds up to rounding over complex doubles', () => {
    const proj = stereographicProjection(undefined, { northAxis: 2 })
    const coordinate = fc.double({ min: -10, max: 10, noNaN: true })
    fc.assert(
      fc.property(coordinate, coordinate, (re, im) => {
        const back = complexPlane.finite(proj.project(proj.unproject(complex(re, im))))
        if (back === undefined) return false
        return Math.hypot(back.re - re, back.im - im) <= 1e-9 * Math.max(1, Math.hypot(re, im))
      }),
    )
  })
})

describe('with Möbius transformations', () => {
  it('z ↦ 1/z reflects the sphere through the equator along the real meridian', () => {
    const proj = stereographicProjection(undefined, { northAxis: 2 })
    const inversion = transformation(0, 1, 1, 0)
    expectPoint(proj.unproject(inversion.apply(proj.project([0.6, 0, -0.8]))), [0.6, 0, 0.8])
  })
})
