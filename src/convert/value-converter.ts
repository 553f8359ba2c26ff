/**
 * Value Converter - raw INI text <-> typed field values
 *
 * One branch per field kind. Absent text (undefined) always converts to
 * absent; the caller decides which default comes next.
 */

import type { Logger } from 'pino'
import { ConversionError } from '../config/errors'
import { logger as rootLogger } from '../observability'
import { isColor, isPoint, isRectangle, isSize } from './geometry'
import { describeKind, enumEntries, isDynamicValue } from './kinds'
import type { DynamicValue, EnumKind, FieldKind, FieldValue, MapKind } from './kinds'
import {
  BooleanTextSchema,
  ColorChannelTextSchema,
  Int32Schema,
  Int32TextSchema,
  UInt32Schema,
  UInt32TextSchema,
  parseText,
} from './primitives'
import type { TextSchema } from './primitives'
import { TypeRegistry } from './type-registry'

export interface ValueConverterOptions {
  registry?: TypeRegistry
  logger?: Logger
}

export class ValueConverter {
  readonly registry: TypeRegistry
  private logger: Logger

  constructor(options: ValueConverterOptions = {}) {
    this.registry = options.registry ?? new TypeRegistry()
    this.logger = (options.logger ?? rootLogger).child({ component: 'value-converter' })
  }

  /**
   * Convert raw text to a value of the given kind
   * @throws ConversionError when the text is not a valid value of the kind
   */
  toTyped(kind: FieldKind, raw: string | undefined): FieldValue | undefined {
    if (raw === undefined) {
      return undefined
    }
    if (kind.tag === 'string') {
      return raw
    }
    if (raw.length === 0) {
      return undefined
    }

    switch (kind.tag) {
      case 'boolean':
        return this.parseScalar(kind, BooleanTextSchema, raw)
      case 'int':
        return this.parseScalar(kind, Int32TextSchema, raw)
      case 'uint':
        return this.parseScalar(kind, UInt32TextSchema, raw)
      case 'point': {
        const [x, y] = this.parseComponents(kind, raw, 2)
        return { x, y }
      }
      case 'size': {
        const [width, height] = this.parseComponents(kind, raw, 2)
        return { width, height }
      }
      case 'rectangle': {
        const [x, y, width, height] = this.parseComponents(kind, raw, 4)
        return { x, y, width, height }
      }
      case 'color': {
        const [a, r, g, b] = this.parseComponents(kind, raw, 4)
        return { a, r, g, b }
      }
      case 'enum':
        return this.parseEnum(kind, raw)
      case 'nullable':
        return this.toTyped(kind.inner, raw)
      case 'list':
        return this.parseList(kind.element, raw)
      case 'map':
        return this.fromPairs(kind, splitPairs(raw))
      case 'dynamic':
        return this.parseDynamic(raw)
    }
  }

  /**
   * Render a value as raw text for the given kind
   * @throws ConversionError when the value does not fit the kind
   */
  toText(kind: FieldKind, value: unknown): string {
    if (value === undefined || value === null) {
      return ''
    }

    switch (kind.tag) {
      case 'string':
        if (typeof value === 'string') return value
        break
      case 'boolean':
        if (typeof value === 'boolean') return value ? 'True' : 'False'
        break
      case 'int':
        if (Int32Schema.safeParse(value).success) return String(value)
        break
      case 'uint':
        if (UInt32Schema.safeParse(value).success) return String(value)
        break
      case 'point':
        if (isPoint(value)) return joinComponents([value.x, value.y])
        break
      case 'size':
        if (isSize(value)) return joinComponents([value.width, value.height])
        break
      case 'rectangle':
        if (isRectangle(value)) return joinComponents([value.x, value.y, value.width, value.height])
        break
      case 'color':
        if (isColor(value)) return joinComponents([value.a, value.r, value.g, value.b])
        break
      case 'enum': {
        const entry = enumEntries(kind.members).find(([, member]) => member === value)
        if (entry) return entry[0]
        break
      }
      case 'nullable':
        return this.toText(kind.inner, value)
      case 'list':
        if (Array.isArray(value)) {
          return value.map(item => this.toText(kind.element, item)).join(',')
        }
        break
      case 'map':
        if (value instanceof Map) {
          return this.toEntries(kind, value)
            .map(([key, text]) => `${key}=${text}`)
            .join(',')
        }
        break
      case 'dynamic':
        if (isDynamicValue(value)) return this.renderDynamic(value)
        break
    }

    throw new ConversionError(`Cannot render value as ${describeKind(kind)}`, {
      kind: describeKind(kind),
      context: { value },
    })
  }

  /**
   * Build a map from every `fieldName.<key>` property of a section
   */
  fromProperties(
    kind: MapKind,
    fieldName: string,
    properties: ReadonlyMap<string, string>
  ): Map<FieldValue, FieldValue> | undefined {
    const prefix = `${fieldName}.`
    const pairs: Array<[string, string]> = []
    for (const [key, raw] of properties) {
      if (key.startsWith(prefix)) {
        pairs.push([key.substring(prefix.length), raw])
      }
    }
    return this.fromPairs(kind, pairs)
  }

  /**
   * Render a map as (key text, value text) pairs in enumeration order
   */
  toEntries(kind: MapKind, value: unknown): Array<[string, string]> {
    if (!(value instanceof Map)) {
      throw new ConversionError(`Cannot render value as ${describeKind(kind)}`, {
        kind: describeKind(kind),
      })
    }
    return Array.from(value.entries()).map(([key, item]): [string, string] => [
      this.toText(kind.key, key),
      this.toText(kind.value, item),
    ])
  }

  private parseScalar<T>(
    kind: FieldKind,
    schema: TextSchema<T>,
    raw: string
  ): T {
    const result = parseText(schema, raw)
    if (!result.success) {
      throw new ConversionError(`Invalid ${describeKind(kind)} value "${raw}": ${result.error}`, {
        kind: describeKind(kind),
        raw,
      })
    }
    return result.data
  }

  private parseComponents(kind: FieldKind, raw: string, count: number): number[] {
    const parts = raw.split(',')
    if (parts.length < count) {
      throw new ConversionError(
        `Invalid ${describeKind(kind)} value "${raw}": expected ${count} components`,
        { kind: describeKind(kind), raw }
      )
    }
    const schema: TextSchema<number> = kind.tag === 'color' ? ColorChannelTextSchema : Int32TextSchema
    return parts.slice(0, count).map(part => this.parseScalar(kind, schema, part))
  }

  private parseEnum(kind: EnumKind, raw: string): string | number {
    const entry = enumEntries(kind.members).find(([name]) => name === raw)
    if (!entry) {
      throw new ConversionError(`"${raw}" is not a member of ${kind.name}`, {
        kind: describeKind(kind),
        raw,
      })
    }
    return entry[1]
  }

  private parseList(element: FieldKind, raw: string): FieldValue[] | undefined {
    const items: FieldValue[] = []
    for (const token of raw.split(',')) {
      if (token.length === 0) continue
      try {
        const item = this.toTyped(element, token)
        if (item !== undefined) {
          items.push(item)
        }
      } catch (error) {
        this.logger.error(
          { err: error, raw: token, kind: describeKind(element) },
          'Problem converting list element'
        )
      }
    }
    return items.length > 0 ? items : undefined
  }

  private fromPairs(
    kind: MapKind,
    pairs: Array<[string, string]>
  ): Map<FieldValue, FieldValue> | undefined {
    const result = new Map<FieldValue, FieldValue>()
    for (const [keyText, raw] of pairs) {
      try {
        const key = this.toTyped(kind.key, keyText)
        const value = this.toTyped(kind.value, raw)
        if (key !== undefined && value !== undefined) {
          result.set(key, value)
        }
      } catch (error) {
        this.logger.error(
          { err: error, key: keyText, raw, kind: describeKind(kind) },
          'Problem converting map entry'
        )
      }
    }
    return result.size > 0 ? result : undefined
  }

  private parseDynamic(raw: string): DynamicValue | undefined {
    const separator = raw.indexOf(':')
    if (separator < 0) {
      throw new ConversionError(`Dynamic value "${raw}" has no type identifier`, {
        kind: 'dynamic',
        raw,
      })
    }
    const identifier = raw.substring(0, separator)
    const entry = this.registry.resolve(identifier)
    if (!entry) {
      throw new ConversionError(`Unknown type identifier "${identifier}"`, {
        kind: 'dynamic',
        raw,
      })
    }
    this.logger.debug({ identifier, type: entry.id }, 'Resolved dynamic type')

    const value = this.toTyped(entry.kind, raw.substring(separator + 1))
    return value === undefined ? undefined : { type: entry.id, value }
  }

  private renderDynamic(value: DynamicValue): string {
    const entry = this.registry.get(value.type)
    if (!entry) {
      throw new ConversionError(`Unknown type identifier "${value.type}"`, { kind: 'dynamic' })
    }
    return `${this.registry.identifierOf(entry)}:${this.toText(entry.kind, value.value)}`
  }
}

function joinComponents(components: number[]): string {
  return components.join(',')
}

/**
 * Split `a=1,b=2` into key/value pairs; tokens without `=` are skipped
 */
function splitPairs(raw: string): Array<[string, string]> {
  const pairs: Array<[string, string]> = []
  for (const token of raw.split(',')) {
    const separator = token.indexOf('=')
    if (separator > 0) {
      pairs.push([token.substring(0, separator).trim(), token.substring(separator + 1)])
    }
  }
  return pairs
}
