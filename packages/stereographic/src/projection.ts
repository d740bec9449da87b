/**
 * Stereographic projection between a unit sphere and the extended plane.
 *
 * The sphere has radius 1 around `center`; the projection point is the north
 * pole, center + e_N. Points are cast from the north pole onto the coordinate
 * plane x_N = 0, whose remaining axes J < K carry the real and imaginary
 * parts. The north pole itself goes to infinity and back.
 */

import type { AxisIndex } from '@conformal/config'
import type { Extended, ExtendedPlane, Mapping, Operand, ScalarInput } from '@conformal/field'

export type Point3<T> = readonly [T, T, T]

export type AxisPair = readonly [AxisIndex, AxisIndex]

const OTHER_AXES: Record<AxisIndex, AxisPair> = {
  0: [1, 2],
  1: [0, 2],
  2: [0, 1],
}

/** The two axes other than `north`, ascending. */
export function complementAxes(north: AxisIndex): AxisPair {
  return OTHER_AXES[north]
}

function isPoint<T>(input: Point3<ScalarInput<T>> | Operand<T>): input is Point3<ScalarInput<T>> {
  return Array.isArray(input) && input.length === 3
}

export class StereographicProjection<T>
  implements Mapping<Point3<ScalarInput<T>> | Operand<T>, Extended<T> | Point3<T>>
{
  readonly otherAxes: AxisPair

  constructor(
    readonly plane: ExtendedPlane<T>,
    readonly x: T,
    readonly y: T,
    readonly z: T,
    readonly northAxis: AxisIndex,
  ) {
    this.otherAxes = complementAxes(northAxis)
  }

  center(): Point3<T> {
    return [this.x, this.y, this.z]
  }

  /** center + e_N. */
  northPole(): Point3<T> {
    const { add, one } = this.plane.field
    const [x, y, z] = this.center()
    const n = this.northAxis
    return [n === 0 ? add(x, one) : x, n === 1 ? add(y, one) : y, n === 2 ? add(z, one) : z]
  }

  // ─── Sphere → Plane ───────────────────────────────────────────────────────

  /**
   * The plane point on the line from the north pole through `point`. A point
   * at the pole's height, the pole itself included, has a line parallel to
   * the plane and maps to the plane's configured infinity.
   */
  project(point: Point3<ScalarInput<T>>): Extended<T> {
    const { field } = this.plane
    const { add, mul, neg, inv } = field
    const p = this.coercePoint(point)
    const np = this.northPole()
    const dir = this.difference(p, np)

    const n = this.northAxis
    if (field.isZero(dir[n])) return this.plane.infinity

    const [j, k] = this.otherAxes
    const t = mul(neg(np[n]), inv(dir[n]))
    return this.plane.complex(add(np[j], mul(t, dir[j])), add(np[k], mul(t, dir[k])))
  }

  // ─── Plane → Sphere ───────────────────────────────────────────────────────

  /**
   * The second intersection of the sphere with the line from the north pole
   * through z (placed at x_N = 0). Infinity maps to the north pole, and so
   * does the pole's own foot point when the pole lies on the plane.
   */
  unproject(z: Operand<T>): Point3<T> {
    const { field } = this.plane
    const { add, mul, neg, inv, conj } = field
    const np = this.northPole()
    const w = this.plane.finite(this.plane.resolve(z, 'operand'))
    if (w === undefined) return np

    const n = this.northAxis
    const [j, k] = this.otherAxes
    const at = (axis: AxisIndex): T => (axis === j ? field.real(w) : axis === k ? field.imag(w) : field.zero)
    const dir = this.difference([at(0), at(1), at(2)], np)

    // t = −2·dir_N / |dir|², the nonzero root of |np + t·dir − center|² = 1
    const norm = dir.reduce((acc, v) => add(acc, mul(v, conj(v))), field.zero)
    if (field.isZero(norm)) return np
    const t = mul(neg(add(dir[n], dir[n])), inv(norm))
    return [add(np[0], mul(t, dir[0])), add(np[1], mul(t, dir[1])), add(np[2], mul(t, dir[2]))]
  }

  // ─── Dispatch ─────────────────────────────────────────────────────────────

  /** A three-coordinate point projects; anything else unprojects. */
  apply(input: Point3<ScalarInput<T>>): Extended<T>
  apply(input: Operand<T>): Point3<T>
  apply(input: Point3<ScalarInput<T>> | Operand<T>): Extended<T> | Point3<T>
  apply(input: Point3<ScalarInput<T>> | Operand<T>): Extended<T> | Point3<T> {
    return isPoint<T>(input) ? this.project(input) : this.unproject(input)
  }

  toString(): string {
    const { format } = this.plane.field
    const [x, y, z] = this.center().map(format)
    return `StereographicProjection(${this.plane.field.name}) center (${x}, ${y}, ${z}), north axis ${this.northAxis}`
  }

  private coercePoint(point: Point3<ScalarInput<T>>): Point3<T> {
    const { plane } = this
    return [
      plane.coerce(point[0], 'coordinate 0'),
      plane.coerce(point[1], 'coordinate 1'),
      plane.coerce(point[2], 'coordinate 2'),
    ]
  }

  private difference(p: Point3<T>, q: Point3<T>): Point3<T> {
    const { sub } = this.plane.field
    return [sub(p[0], q[0]), sub(p[1], q[1]), sub(p[2], q[2])]
  }
}
