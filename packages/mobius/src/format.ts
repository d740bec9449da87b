// Human-readable rendering. Presentation only; nothing parses these strings.

import type { MobiusTransformation } from './transformation'

/** "z -> (a*z + b) / (c*z + d)" with the field's formatting of each coefficient. */
export function formatTransformation<T>(m: MobiusTransformation<T>): string {
  const [a, b, c, d] = m.coefficients().map((v) => m.plane.field.format(v))
  return `z -> (${a}*z + ${b}) / (${c}*z + ${d})`
}

/**
 *   Möbius: complex
 *      (1+0i)*z + 2+0i
 *      –––––––––––––––
 *      (0+0i)*z + 1+0i
 */
export function describeTransformation<T>(m: MobiusTransformation<T>): string {
  const [a, b, c, d] = m.coefficients().map((v) => m.plane.field.format(v))
  const numer = `(${a})*z + ${b}`
  const denom = `(${c})*z + ${d}`
  const rule = '–'.repeat(Math.max(numer.length, denom.length))
  return [`Möbius: ${m.plane.field.name}`, numer, rule, denom].join('\n   ')
}
