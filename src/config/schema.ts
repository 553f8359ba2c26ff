/**
 * Zod schemas for the options a file-backed config context is opened with
 */

import { z } from 'zod'

export const LogLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])

/**
 * Options for opening a config context on disk
 */
export const ConfigContextOptionsSchema = z.object({
  mainFile: z.string().min(1),
  defaultsFile: z.string().min(1).optional(),
  logLevel: LogLevelSchema.default('info'),
  pretty: z.boolean().default(false),
})

export type ConfigContextFileOptions = z.infer<typeof ConfigContextOptionsSchema>
export type ConfigContextFileOptionsInput = z.input<typeof ConfigContextOptionsSchema>

/**
 * Validate and parse options with defaults
 */
export function validateOptions(options: unknown): ConfigContextFileOptions {
  return ConfigContextOptionsSchema.parse(options)
}

/**
 * Validate options with detailed error messages
 */
export function validateOptionsSafe(
  options: unknown
): { success: true; data: ConfigContextFileOptions } | { success: false; errors: string[] } {
  const result = ConfigContextOptionsSchema.safeParse(options)

  if (result.success) {
    return { success: true, data: result.data }
  }

  const errors = result.error.issues.map(err => {
    const path = err.path.join('.')
    return `${path}: ${err.message}`
  })

  return { success: false, errors }
}
