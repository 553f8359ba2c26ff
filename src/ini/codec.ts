/**
 * INI text codec
 *
 * Parses section-delimited key=value text into a RawPropertyTable and writes
 * rendered sections (with description comments) plus unclaimed raw sections.
 */

import type { Logger } from 'pino'
import { logger as rootLogger } from '../observability'
import { RawPropertyTable } from './property-table'

export interface RenderedField {
  description: string
  /** One (key, value) pair per output line */
  lines: Array<[string, string]>
}

export interface RenderedSection {
  name: string
  description: string
  fields: RenderedField[]
}

export const COMMENT_PREFIX = ';'
export const LINE_SEPARATOR = '\n'

/**
 * Parse INI text into a property table
 *
 * Parsing into an existing table overwrites entries with the same
 * (section, name) and keeps everything else, which is how the main file is
 * layered over the defaults file.
 */
export function parseIni(
  text: string,
  table: RawPropertyTable = new RawPropertyTable(),
  logger: Logger = rootLogger
): RawPropertyTable {
  let currentSection: string | undefined

  for (const line of text.split(/\r?\n/)) {
    const currentLine = line.trimStart()

    if (currentLine.startsWith('[')) {
      const end = currentLine.indexOf(']')
      if (end < 0) {
        logger.debug({ line }, 'Skipping malformed section header')
        continue
      }
      currentSection = currentLine.substring(1, end)
      logger.debug({ section: currentSection }, 'Found section')
      continue
    }

    if (currentLine.startsWith(COMMENT_PREFIX) || currentLine.indexOf('=') <= 0) {
      continue
    }

    const separator = currentLine.indexOf('=')
    const name = currentLine.substring(0, separator).trim()
    if (name.length === 0) {
      continue
    }
    const value = currentLine.substring(separator + 1)

    if (currentSection === undefined) {
      logger.debug({ name }, 'Property without section')
      continue
    }
    table.set(currentSection, name, value)
  }

  return table
}

/**
 * Serialize rendered sections followed by raw sections nobody claimed
 */
export function serializeIni(
  sections: RenderedSection[],
  leftovers: Iterable<[string, ReadonlyMap<string, string>]> = []
): string {
  const out: string[] = []

  for (const section of sections) {
    out.push(`${COMMENT_PREFIX} ${section.description}`)
    out.push(`[${section.name}]`)
    for (const field of section.fields) {
      out.push(`${COMMENT_PREFIX} ${field.description}`)
      for (const [key, value] of field.lines) {
        out.push(`${key}=${value}`)
      }
    }
    out.push('')
  }
  out.push('')

  for (const [name, properties] of leftovers) {
    out.push(
      `${COMMENT_PREFIX} The section ${name} is not registered, maybe a plugin hasn't claimed it due to errors or some functionality isn't used yet.`
    )
    out.push(`[${name}]`)
    for (const [key, value] of properties) {
      out.push(`${key}=${value}`)
    }
    out.push('')
  }

  return out.join(LINE_SEPARATOR) + LINE_SEPARATOR
}
