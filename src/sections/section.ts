/**
 * Section declarations
 *
 * A section is a class extending IniSection plus a definition that binds its
 * properties to INI keys:
 *
 *   class CoreConfiguration extends IniSection {
 *     language?: string
 *   }
 *
 *   const CoreSection = defineSection(CoreConfiguration, {
 *     name: 'Core',
 *     description: 'Core application settings',
 *     fields: field => [
 *       field('language', kinds.string, { name: 'Language', defaultValue: 'en-US', description: 'UI language' }),
 *     ],
 *   })
 */

import type { FieldKind, Kind } from '../convert/kinds'

/**
 * Base class for all sections
 */
export abstract class IniSection {
  /** Set when some field had to fall back to its declared default */
  isDirty = false

  /**
   * Supply values that can't be written as default text
   * @param name - INI key of the field being filled
   */
  getDefault(name: string): unknown {
    return undefined
  }
}

export interface FieldOptions {
  /** INI key, also the prefix of `name.key` lines for maps */
  name: string
  description: string
  /** Default as raw text, converted like persisted text */
  defaultValue?: string
}

export interface FieldDescriptor<T extends IniSection = IniSection> {
  readonly property: string
  readonly name: string
  readonly description: string
  readonly defaultValue?: string
  readonly kind: FieldKind
  read(target: T): unknown
  /**
   * Store a value if it fits the field kind
   * @returns false when the value was rejected
   */
  assign(target: T, value: unknown): boolean
}

export interface SchemaDescriptor<T extends IniSection = IniSection> {
  readonly name: string
  readonly description: string
  readonly fields: ReadonlyArray<FieldDescriptor<T>>
}

export type FieldFactory<T extends IniSection> = <K extends Exclude<keyof T, keyof IniSection> & string>(
  property: K,
  kind: Kind<T[K]>,
  options: FieldOptions
) => FieldDescriptor<T>

export interface SectionOptions<T extends IniSection> {
  name: string
  description: string
  fields: (field: FieldFactory<T>) => Array<FieldDescriptor<T>>
}

export interface SectionDefinition<T extends IniSection = IniSection> {
  readonly name: string
  create(): T
  is(value: unknown): value is T
  describe(): SchemaDescriptor<T>
}

function createField<T extends IniSection>(): FieldFactory<T> {
  return (property, kind, options) => ({
    property,
    name: options.name,
    description: options.description,
    defaultValue: options.defaultValue,
    kind,
    read: target => target[property],
    assign: (target, value) => {
      if (!kind.guard(value)) {
        return false
      }
      target[property] = value
      return true
    },
  })
}

/**
 * Declare a section type
 *
 * The field list is derived the first time `describe()` is called and reused
 * afterwards.
 */
export function defineSection<T extends IniSection>(
  sectionClass: new () => T,
  options: SectionOptions<T>
): SectionDefinition<T> {
  let schema: SchemaDescriptor<T> | undefined

  return {
    name: options.name,
    create: () => new sectionClass(),
    is: (value): value is T => value instanceof sectionClass,
    describe: () => {
      if (!schema) {
        const fields = options.fields(createField<T>())
        const seen = new Set<string>()
        for (const field of fields) {
          if (seen.has(field.name)) {
            throw new Error(`Duplicate field "${field.name}" in section ${options.name}`)
          }
          seen.add(field.name)
        }
        schema = Object.freeze({
          name: options.name,
          description: options.description,
          fields: Object.freeze(fields),
        })
      }
      return schema
    },
  }
}
