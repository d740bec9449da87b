/**
 * The process-wide default: floating complex numbers with a shared infinity.
 *
 * Everything built without an explicit plane uses `complexPlane`, so
 * `setInfinity` reconfigures all of it at once. Callers wanting isolation
 * create their own plane with `createPlane`.
 */

import type { Complex, Extended } from './types'
import { complexField } from './complex'
import { InfinityRegistry } from './infinity'
import { ExtendedPlane } from './plane'

const globalInfinity = new InfinityRegistry<Complex>(complexField.defaultInfinity)

export const complexPlane: ExtendedPlane<Complex> = new ExtendedPlane(complexField, {
  registry: globalInfinity,
})

export function getInfinity(): Extended<Complex> {
  return globalInfinity.get()
}

export function setInfinity(value: Extended<Complex>): void {
  globalInfinity.set(value)
}

/** Back to complex(Infinity, 0). */
export function resetInfinity(): void {
  globalInfinity.reset()
}
