/**
 * Config Context - the section registry
 *
 * Owns the raw property table loaded from the defaults file and the main file,
 * materializes one typed instance per requested section and writes everything
 * back on save. One context per configuration consumer; nothing here locks.
 */

import type { Logger } from 'pino'
import { ConfigurationError, PropertyParseError } from '../config/errors'
import { describeKind } from '../convert/kinds'
import type { FieldValue } from '../convert/kinds'
import { BooleanTextSchema, Int32TextSchema, parseText } from '../convert/primitives'
import type { TextSchema } from '../convert/primitives'
import { TypeRegistry } from '../convert/type-registry'
import { ValueConverter } from '../convert/value-converter'
import { parseIni, serializeIni } from '../ini/codec'
import type { RenderedSection } from '../ini/codec'
import { RawPropertyTable } from '../ini/property-table'
import { logger as rootLogger } from '../observability'
import type { ConfigFileSource } from './file-source'
import type { FieldDescriptor, IniSection, SchemaDescriptor, SectionDefinition } from './section'

export interface ConfigContextOptions {
  source: ConfigFileSource
  /** Types that dynamic fields may carry; built-ins only when omitted */
  registry?: TypeRegistry
  logger?: Logger
}

/**
 * A section instance handed out by the context, with its renderer bound to
 * the schema it was built from.
 */
interface ClaimedSection {
  instance: IniSection
  render(): RenderedSection
}

export class ConfigContext {
  readonly converter: ValueConverter
  private properties = new RawPropertyTable()
  private claimed = new Map<string, ClaimedSection>()
  private source: ConfigFileSource
  private logger: Logger

  constructor(options: ConfigContextOptions) {
    const baseLogger = options.logger ?? rootLogger
    this.source = options.source
    this.logger = baseLogger.child({ component: 'config-context' })
    this.converter = new ValueConverter({ registry: options.registry, logger: baseLogger })
    this.reload()
  }

  get types(): TypeRegistry {
    return this.converter.registry
  }

  /**
   * Re-read the defaults file and then the main file into a fresh table.
   * Sections already handed out keep their values.
   */
  reload(): void {
    this.properties.clear()
    const defaults = this.source.readDefaults()
    if (defaults !== undefined) {
      parseIni(defaults, this.properties, this.logger)
    }
    const main = this.source.readMain()
    if (main !== undefined) {
      parseIni(main, this.properties, this.logger)
    }
  }

  /**
   * Get the instance for a section type, filling it on first request
   */
  getSection<T extends IniSection>(definition: SectionDefinition<T>): T {
    const schema = definition.describe()
    this.logger.debug({ section: schema.name }, 'Trying to find section')

    const cached = this.claimed.get(schema.name)
    if (cached) {
      if (definition.is(cached.instance)) {
        return cached.instance
      }
      throw new ConfigurationError(`Section ${schema.name} is already claimed by another type`, {
        section: schema.name,
      })
    }

    const section = definition.create()
    const properties = this.properties.ensureSection(schema.name)
    for (const field of schema.fields) {
      this.fillField(schema.name, section, field, properties)
    }

    this.claimed.set(schema.name, {
      instance: section,
      render: () => this.renderSection(schema, section),
    })
    return section
  }

  /**
   * Whether a typed section has been requested for this name
   */
  isRegistered(section: string): boolean {
    return this.claimed.has(section)
  }

  getSectionNames(): string[] {
    return this.properties.sectionNames()
  }

  hasProperty(section: string, name: string): boolean {
    return this.properties.has(section, name)
  }

  getProperty(section: string, name: string): string | undefined {
    return this.properties.get(section, name)
  }

  /**
   * Split a property on ','
   */
  getPropertyAsArray(section: string, name: string): string[] | undefined {
    return this.properties.get(section, name)?.split(',')
  }

  /**
   * @throws PropertyParseError when the property is missing or not a boolean
   */
  getBoolProperty(section: string, name: string): boolean {
    return this.parseProperty(section, name, BooleanTextSchema)
  }

  /**
   * @throws PropertyParseError when the property is missing or not an integer
   */
  getIntProperty(section: string, name: string): number {
    return this.parseProperty(section, name, Int32TextSchema)
  }

  /**
   * Insert or overwrite a raw property, creating the section if needed
   */
  setProperty(section: string, name: string, value: string): void {
    this.properties.set(section, name, value)
    this.logger.debug({ section, name, value }, 'Set property')
  }

  /**
   * Overwrite a raw property in an existing section
   * @returns false when the section does not exist
   */
  changeProperty(section: string, name: string, value: string): boolean {
    const changed = this.properties.change(section, name, value)
    if (!changed) {
      this.logger.debug({ section, name }, 'Property without section')
    }
    return changed
  }

  /**
   * The text `save()` would write
   */
  render(): string {
    const sections = Array.from(this.claimed.values(), claimed => claimed.render())
    const leftovers = Array.from(this.properties.entries()).filter(
      ([name]) => !this.claimed.has(name)
    )
    return serializeIni(sections, leftovers)
  }

  /**
   * Write all sections to the main file and clear their dirty flags
   */
  save(): void {
    const text = this.render()
    this.source.writeMain(text)
    for (const { instance } of this.claimed.values()) {
      instance.isDirty = false
    }
  }

  private fillField<T extends IniSection>(
    sectionName: string,
    section: T,
    field: FieldDescriptor<T>,
    properties: ReadonlyMap<string, string>
  ): void {
    const present = field.kind.tag === 'map'
      ? hasPrefixedKey(properties, field.name)
      : properties.has(field.name)

    if (!present && field.defaultValue !== undefined) {
      // Even values coming from the defaults file count as persisted
      section.isDirty = true
      this.logger.debug(
        { section: sectionName, name: field.name, defaultValue: field.defaultValue },
        'Passing default'
      )
    }

    let value: unknown
    try {
      value = this.convertField(field, properties, present)
    } catch (error) {
      this.logger.warn(
        { err: error, section: sectionName, name: field.name, kind: describeKind(field.kind) },
        "Couldn't parse field"
      )
    }

    if (value === undefined) {
      value = section.getDefault(field.name)
    }
    if (value === undefined) {
      return
    }

    if (!field.assign(section, value)) {
      this.logger.warn(
        { section: sectionName, name: field.name, kind: describeKind(field.kind) },
        "Couldn't set field"
      )
    }
  }

  private convertField<T extends IniSection>(
    field: FieldDescriptor<T>,
    properties: ReadonlyMap<string, string>,
    present: boolean
  ): FieldValue | undefined {
    const kind = field.kind
    if (kind.tag === 'map' && present) {
      return this.converter.fromProperties(kind, field.name, properties)
    }
    const raw = present ? properties.get(field.name) : field.defaultValue
    return this.converter.toTyped(kind, raw)
  }

  private renderSection<T extends IniSection>(
    schema: SchemaDescriptor<T>,
    section: T
  ): RenderedSection {
    return {
      name: schema.name,
      description: schema.description,
      fields: schema.fields.map(field => ({
        description: field.description,
        lines: this.renderField(schema.name, field, section),
      })),
    }
  }

  private renderField<T extends IniSection>(
    sectionName: string,
    field: FieldDescriptor<T>,
    section: T
  ): Array<[string, string]> {
    const value = field.read(section)
    const fallback: Array<[string, string]> = [[field.name, field.defaultValue ?? '']]
    if (value === undefined || value === null) {
      return fallback
    }

    try {
      const kind = field.kind
      if (kind.tag === 'map') {
        return this.converter
          .toEntries(kind, value)
          .map(([key, text]): [string, string] => [`${field.name}.${key}`, text])
      }
      return [[field.name, this.converter.toText(kind, value)]]
    } catch (error) {
      this.logger.error(
        { err: error, section: sectionName, name: field.name, kind: describeKind(field.kind) },
        "Couldn't render field, writing its default"
      )
      return fallback
    }
  }

  private parseProperty<T>(section: string, name: string, schema: TextSchema<T>): T {
    const raw = this.properties.get(section, name)
    if (raw === undefined) {
      throw new PropertyParseError(`Property ${section}.${name} is not set`, {
        section,
        property: name,
      })
    }
    const result = parseText(schema, raw)
    if (!result.success) {
      throw new PropertyParseError(`Property ${section}.${name}: ${result.error}`, {
        section,
        property: name,
        raw,
      })
    }
    return result.data
  }
}

function hasPrefixedKey(properties: ReadonlyMap<string, string>, name: string): boolean {
  const prefix = `${name}.`
  for (const key of properties.keys()) {
    if (key.startsWith(prefix)) return true
  }
  return false
}
