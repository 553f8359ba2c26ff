/**
 * Open a file-backed config context with validated options
 */

import type { TypeRegistry } from '../convert/type-registry'
import { createLogger } from '../observability'
import { ConfigContext } from '../sections/config-context'
import { FileSystemSource } from '../sections/file-source'
import { ConfigurationError } from './errors'
import { loadEnvironmentOptions } from './environment'
import { validateOptionsSafe } from './schema'
import type { ConfigContextFileOptions } from './schema'

export interface OpenContextExtras {
  registry?: TypeRegistry
}

function open(options: ConfigContextFileOptions, extras: OpenContextExtras): ConfigContext {
  const logger = createLogger({ level: options.logLevel, pretty: options.pretty })
  const source = new FileSystemSource({
    mainFile: options.mainFile,
    defaultsFile: options.defaultsFile,
    logger,
  })
  return new ConfigContext({ source, registry: extras.registry, logger })
}

/**
 * Validate options and load the defaults file and main file
 * @throws ConfigurationError if the options are invalid
 */
export function openConfigContext(options: unknown, extras: OpenContextExtras = {}): ConfigContext {
  const validation = validateOptionsSafe(options)
  if (!validation.success) {
    throw new ConfigurationError(`Invalid config context options: ${validation.errors.join(', ')}`, {
      context: { errors: validation.errors },
    })
  }
  return open(validation.data, extras)
}

/**
 * Open with detailed error reporting
 */
export function openConfigContextSafe(
  options: unknown,
  extras: OpenContextExtras = {}
): { success: true; data: ConfigContext } | { success: false; errors: string[] } {
  const validation = validateOptionsSafe(options)
  if (!validation.success) {
    return validation
  }
  return { success: true, data: open(validation.data, extras) }
}

/**
 * Open from INIMAP_* environment variables
 * Returns undefined when INIMAP_CONFIG_FILE is not set
 */
export function openConfigContextAuto(
  env: NodeJS.ProcessEnv = process.env,
  extras: OpenContextExtras = {}
): ConfigContext | undefined {
  const options = loadEnvironmentOptions(env)
  if (!options) {
    return undefined
  }
  return openConfigContext(options, extras)
}
