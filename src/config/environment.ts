/**
 * Environment Configuration
 *
 * Reads context options from INIMAP_* variables. The loader passes them through
 * the options schema, so values are only collected here.
 */

export const ENV_CONFIG_FILE = 'INIMAP_CONFIG_FILE'
export const ENV_DEFAULTS_FILE = 'INIMAP_DEFAULTS_FILE'
export const ENV_LOG_LEVEL = 'INIMAP_LOG_LEVEL'
export const ENV_LOG_PRETTY = 'INIMAP_LOG_PRETTY'

export interface EnvironmentOptions {
  mainFile: string
  defaultsFile?: string
  logLevel?: string
  pretty?: boolean
}

/**
 * Load context options from environment
 * @returns null when no main file is configured
 */
export function loadEnvironmentOptions(env: NodeJS.ProcessEnv = process.env): EnvironmentOptions | null {
  const mainFile = env[ENV_CONFIG_FILE]
  if (!mainFile) return null

  const options: EnvironmentOptions = { mainFile }
  if (env[ENV_DEFAULTS_FILE]) {
    options.defaultsFile = env[ENV_DEFAULTS_FILE]
  }
  if (env[ENV_LOG_LEVEL]) {
    options.logLevel = env[ENV_LOG_LEVEL]
  }
  const pretty = env[ENV_LOG_PRETTY]
  if (pretty) {
    options.pretty = pretty === 'true' || pretty === '1'
  }
  return options
}
