/**
 * Config file location
 *
 * A file sitting in the startup directory wins; otherwise the file lives in
 * the per-user application data directory.
 */

import { existsSync } from 'fs'
import { homedir } from 'os'
import { join } from 'path'

export interface LocationOptions {
  /** Directory name under the application data directory */
  applicationName: string
  /** Directory the program was started from (default: cwd) */
  startupDir?: string
  /** Per-user data directory (default: APPDATA, else ~/.config) */
  appDataDir?: string
  env?: NodeJS.ProcessEnv
}

export function defaultAppDataDir(env: NodeJS.ProcessEnv = process.env): string {
  return env.APPDATA || join(homedir(), '.config')
}

/**
 * Resolve where a config file should be read from and written to
 */
export function resolveConfigLocation(fileName: string, options: LocationOptions): string {
  const startupPath = join(options.startupDir ?? process.cwd(), fileName)
  if (existsSync(startupPath)) {
    return startupPath
  }
  const appDataDir = options.appDataDir ?? defaultAppDataDir(options.env)
  return join(appDataDir, options.applicationName, fileName)
}
