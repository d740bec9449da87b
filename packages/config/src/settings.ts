import { z } from 'zod'

/** How detected degeneracies (zero determinant, coincident points) are handled. */
export const VALIDATION_MODES = ['off', 'warn', 'strict'] as const
export type ValidationMode = (typeof VALIDATION_MODES)[number]

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const
export type LogLevel = (typeof LOG_LEVELS)[number]

/** Coordinate index of a 3D point. */
export type AxisIndex = 0 | 1 | 2

export interface Settings {
  readonly validation: ValidationMode
  readonly northAxis: AxisIndex
  readonly logLevel: LogLevel
}

export type Environment = Readonly<Record<string, string | undefined>>

const AXES = { '0': 0, '1': 1, '2': 2 } as const

// Empty strings count as unset, like a blank line in a .env file.
const blankAsUnset = (value: unknown) => (value === '' ? undefined : value)

const settingsSchema = z.object({
  CONFORMAL_VALIDATION: z.preprocess(blankAsUnset, z.enum(VALIDATION_MODES).default('off')),
  CONFORMAL_NORTH_AXIS: z.preprocess(
    blankAsUnset,
    z.enum(['0', '1', '2']).default('2').transform((axis) => AXES[axis]),
  ),
  CONFORMAL_LOG_LEVEL: z.preprocess(blankAsUnset, z.enum(LOG_LEVELS).default('warn')),
})

export const DEFAULT_SETTINGS: Settings = {
  validation: 'off',
  northAxis: 2,
  logLevel: 'warn',
}

/**
 * Parse settings from an environment record, falling back to defaults.
 * Throws on the first load if a variable is set to something unusable.
 */
export function loadSettings(env: Environment): Settings {
  const parsed = settingsSchema.safeParse({
    CONFORMAL_VALIDATION: env['CONFORMAL_VALIDATION'],
    CONFORMAL_NORTH_AXIS: env['CONFORMAL_NORTH_AXIS'],
    CONFORMAL_LOG_LEVEL: env['CONFORMAL_LOG_LEVEL'],
  })
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ')
    throw new Error(
      `Invalid environment configuration (${problems}). ` +
      `Fix the variable in .env or your deployment configuration.`,
    )
  }
  return {
    validation: parsed.data.CONFORMAL_VALIDATION,
    northAxis: parsed.data.CONFORMAL_NORTH_AXIS,
    logLevel: parsed.data.CONFORMAL_LOG_LEVEL,
  }
}

function readProcessEnv(): Environment {
  if (typeof process !== 'undefined' && process.env) return process.env
  return {}
}

/** Settings resolved from process.env at import time. */
export const settings: Settings = loadSettings(readProcessEnv())
