/**
 * File-content sources for the defaults file and the main file
 */

import { existsSync, readFileSync, writeFileSync, mkdirSync } from 'fs'
import { dirname, resolve } from 'path'
import type { Logger } from 'pino'
import { logger as rootLogger } from '../observability'

export interface ConfigFileSource {
  /** Defaults file text, undefined when there is none */
  readDefaults(): string | undefined
  /** Main file text, undefined when there is none */
  readMain(): string | undefined
  /** Overwrite the main file */
  writeMain(text: string): void
}

export interface FileSystemSourceOptions {
  mainFile: string
  defaultsFile?: string
  logger?: Logger
}

/**
 * Reads and writes UTF-8 files on disk
 */
export class FileSystemSource implements ConfigFileSource {
  readonly mainFile: string
  readonly defaultsFile?: string
  private logger: Logger

  constructor(options: FileSystemSourceOptions) {
    this.mainFile = resolve(options.mainFile)
    this.defaultsFile = options.defaultsFile ? resolve(options.defaultsFile) : undefined
    this.logger = (options.logger ?? rootLogger).child({ component: 'file-source' })
  }

  readDefaults(): string | undefined {
    return this.defaultsFile ? this.read(this.defaultsFile) : undefined
  }

  readMain(): string | undefined {
    return this.read(this.mainFile)
  }

  writeMain(text: string): void {
    this.logger.info({ path: this.mainFile }, 'Saving configuration')
    mkdirSync(dirname(this.mainFile), { recursive: true })
    writeFileSync(this.mainFile, text, 'utf-8')
  }

  private read(path: string): string | undefined {
    if (!existsSync(path)) {
      this.logger.info({ path }, "Can't find file")
      return undefined
    }
    this.logger.info({ path }, 'Reading ini-properties from file')
    return stripBom(readFileSync(path, 'utf-8'))
  }
}

/**
 * Keeps both texts in memory, useful for testing and embedding
 */
export class InMemorySource implements ConfigFileSource {
  constructor(
    public main?: string,
    public defaults?: string
  ) {}

  readDefaults(): string | undefined {
    return this.defaults
  }

  readMain(): string | undefined {
    return this.main
  }

  writeMain(text: string): void {
    this.main = text
  }
}

function stripBom(text: string): string {
  return text.charCodeAt(0) === 0xfeff ? text.substring(1) : text
}
