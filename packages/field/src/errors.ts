export type ConformalErrorCode = 'TYPE_MISMATCH' | 'DEGENERATE'

export class ConformalError extends Error {
  constructor(
    public readonly code: ConformalErrorCode,
    message: string,
  ) {
    super(message)
    this.name = 'ConformalError'
  }
}

/** A value has no representation in the scalar field in use. */
export class TypeMismatchError extends ConformalError {
  constructor(
    public readonly field: string,
    public readonly value: unknown,
    public readonly role: string,
  ) {
    super('TYPE_MISMATCH', `Cannot represent ${describeValue(value)} as ${field} (${role})`)
    this.name = 'TypeMismatchError'
  }
}

export type DegeneracyKind = 'zero-determinant' | 'coincident-points'

/** Raised for degenerate input only when validation is 'strict'. */
export class DegenerateTransformationError extends ConformalError {
  constructor(
    public readonly kind: DegeneracyKind,
    public readonly operation: string,
    detail: string,
  ) {
    super('DEGENERATE', `Degenerate input to ${operation}: ${detail}`)
    this.name = 'DegenerateTransformationError'
  }
}

export function describeValue(value: unknown): string {
  switch (typeof value) {
    case 'string':
      return `string ${JSON.stringify(value)}`
    case 'number':
    case 'boolean':
      return `${typeof value} ${String(value)}`
    case 'bigint':
      return `bigint ${value.toString()}n`
    case 'undefined':
      return 'undefined'
    case 'function':
      return 'function'
    case 'symbol':
      return 'symbol'
    default:
      return value === null ? 'null' : 'object'
  }
}
