/**
 * The extended plane over a scalar field: the field plus one point at infinity.
 *
 * Transformations and projections hold a plane rather than reading global
 * state, so the infinity value and the validation mode travel with them.
 */

import type { Logger, ValidationMode } from '@conformal/config'
import { createLogger, settings } from '@conformal/config'
import type { Extended, ScalarField } from './types'
import { isPointAtInfinity } from './types'
import { InfinityRegistry } from './infinity'
import type { DegeneracyKind } from './errors'
import { DegenerateTransformationError, TypeMismatchError } from './errors'

export interface PlaneOptions<T> {
  /** Initial infinity value; defaults to the field's own. Ignored when `registry` is given. */
  infinity?: Extended<T>
  /** Share an existing registry, e.g. the process-wide one. */
  registry?: InfinityRegistry<T>
  validation?: ValidationMode
  logger?: Logger
}

export interface Degeneracy {
  readonly kind: DegeneracyKind
  readonly operation: string
  readonly detail: string
}

export class ExtendedPlane<T> {
  readonly registry: InfinityRegistry<T>
  readonly validation: ValidationMode
  private readonly logger: Logger

  constructor(
    readonly field: ScalarField<T>,
    options: PlaneOptions<T> = {},
  ) {
    this.registry = options.registry ?? new InfinityRegistry(options.infinity ?? field.defaultInfinity)
    this.validation = options.validation ?? settings.validation
    this.logger = options.logger ?? createLogger('conformal').child(field.name)
  }

  /** The value currently standing for the point at infinity. */
  get infinity(): Extended<T> {
    return this.registry.get()
  }

  /** Whether degeneracy checks should run at all. */
  get validates(): boolean {
    return this.validation !== 'off'
  }

  /**
   * The finite field element behind `z`, or undefined when `z` is infinite:
   * the infinity token, the configured infinity value, or an element the
   * field itself considers infinite.
   */
  finite(z: Extended<T>): T | undefined {
    if (isPointAtInfinity(z)) return undefined
    if (z === this.registry.get() || this.field.isInfinite(z)) return undefined
    return z
  }

  isInfinite(z: Extended<T>): boolean {
    return this.finite(z) === undefined
  }

  /** Promote `value` into the field. `role` names it in the error. */
  coerce(value: unknown, role: string): T {
    const coerced = this.field.coerce(value)
    if (coerced === undefined) throw new TypeMismatchError(this.field.name, value, role)
    return coerced
  }

  /** Like `coerce`, but lets the infinity token through. */
  resolve(value: unknown, role: string): Extended<T> {
    if (isPointAtInfinity(value)) return value
    return this.coerce(value, role)
  }

  /** Exact equality on the extended plane; all infinities are one point. */
  equals(a: Extended<T>, b: Extended<T>): boolean {
    const x = this.finite(a)
    const y = this.finite(b)
    if (x === undefined || y === undefined) return x === undefined && y === undefined
    return this.field.equals(x, y)
  }

  key(z: Extended<T>): string {
    const w = this.finite(z)
    return w === undefined ? 'inf' : this.field.key(w)
  }

  format(z: Extended<T>): string {
    const w = this.finite(z)
    return w === undefined ? '∞' : this.field.format(w)
  }

  /** re + im·i, with i taken from the field itself. */
  complex(re: T, im: T): T {
    const { field } = this
    return field.add(re, field.mul(im, field.fromParts(0, 1)))
  }

  /** Apply the validation mode to a detected degeneracy. */
  report(degeneracy: Degeneracy): void {
    switch (this.validation) {
      case 'off':
        return
      case 'warn':
        this.logger.warn(degeneracy.detail, {
          kind: degeneracy.kind,
          operation: degeneracy.operation,
        })
        return
      case 'strict':
        throw new DegenerateTransformationError(degeneracy.kind, degeneracy.operation, degeneracy.detail)
    }
  }
}

export function createPlane<T>(field: ScalarField<T>, options: PlaneOptions<T> = {}): ExtendedPlane<T> {
  return new ExtendedPlane(field, options)
}
