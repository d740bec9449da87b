import type { Extended } from './types'

/**
 * Holds the value that stands for the point at infinity.
 *
 * Nothing checks the value against the field in use: floating fields take an
 * infinite element, exact fields usually take the pointAtInfinity token.
 * Configure before use; readers consult it on every infinity-sensitive call.
 */
export class InfinityRegistry<T> {
  private value: Extended<T>

  constructor(private readonly initial: Extended<T>) {
    this.value = initial
  }

  get(): Extended<T> {
    return this.value
  }

  set(value: Extended<T>): void {
    this.value = value
  }

  /** Restore the value the registry was created with. */
  reset(): void {
    this.value = this.initial
  }
}
