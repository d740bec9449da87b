import type { AxisIndex } from '@conformal/config'
import { settings } from '@conformal/config'
import type { Complex, ExtendedPlane, ScalarInput } from '@conformal/field'
import { complexPlane } from '@conformal/field'
import type { Point3 } from './projection'
import { StereographicProjection } from './projection'

export interface ProjectionOptions {
  /** Index of the axis through the north pole; defaults to CONFORMAL_NORTH_AXIS. */
  northAxis?: AxisIndex
}

export interface PlaneProjectionOptions<T> extends ProjectionOptions {
  plane: ExtendedPlane<T>
}

function build<T>(
  plane: ExtendedPlane<T>,
  center: Point3<unknown> | undefined,
  northAxis: AxisIndex,
): StereographicProjection<T> {
  const { zero } = plane.field
  const [x, y, z] = center ?? [zero, zero, zero]
  return new StereographicProjection(
    plane,
    plane.coerce(x, 'center x'),
    plane.coerce(y, 'center y'),
    plane.coerce(z, 'center z'),
    northAxis,
  )
}

/** Projection from the sphere around `center` (default the origin) on the given plane. */
export function projectionOn<T>(
  plane: ExtendedPlane<T>,
  center?: Point3<ScalarInput<T>>,
  options: ProjectionOptions = {},
): StereographicProjection<T> {
  return build(plane, center, options.northAxis ?? settings.northAxis)
}

export function stereographicProjection(
  center?: Point3<ScalarInput<Complex>>,
  options?: ProjectionOptions,
): StereographicProjection<Complex>
export function stereographicProjection<T>(
  center: Point3<ScalarInput<T>> | undefined,
  options: PlaneProjectionOptions<T>,
): StereographicProjection<T>
export function stereographicProjection<T>(
  center?: Point3<unknown>,
  options: Partial<PlaneProjectionOptions<T>> = {},
): StereographicProjection<T> | StereographicProjection<Complex> {
  const { plane, northAxis = settings.northAxis } = options
  return plane === undefined ? build(complexPlane, center, northAxis) : build(plane, center, northAxis)
}

/** The origin-centred projection for a plane's scalar type. */
export function stereographicProjectionOf<T>(
  plane: ExtendedPlane<T>,
  options: ProjectionOptions = {},
): StereographicProjection<T> {
  return build(plane, undefined, options.northAxis ?? settings.northAxis)
}
