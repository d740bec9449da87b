/**
 * @conformal/stereographic
 *
 * Stereographic projection between a unit sphere in 3-space and the extended
 * plane, in both directions, over any scalar field the plane supports.
 */

export {
  StereographicProjection, complementAxes,
  type Point3, type AxisPair,
} from './projection'
export {
  stereographicProjection, stereographicProjectionOf, projectionOn,
  type ProjectionOptions, type PlaneProjectionOptions,
} from './factory'
