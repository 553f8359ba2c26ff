/**
 * Type Registry - lookup table from dynamic type identifiers to field kinds
 *
 * Dynamic fields persist as `TypeIdentifier:Value`. Built-in kinds are known
 * under fully qualified `std.*` names; application types (enums) are registered
 * with a module qualifier and render as `Name,Module`.
 */

import { kinds } from './kinds'
import type { DynamicValue, EnumKind, FieldKind, FieldValue, Kind, TypedKind } from './kinds'

export interface RegisteredType {
  /** Qualified type name */
  id: string
  /** Module qualifier, already trimmed to the part before the first comma */
  module?: string
  kind: FieldKind
  guard: (value: unknown) => boolean
}

export interface RegisterTypeOptions {
  module?: string
}

export class TypeRegistry {
  private types = new Map<string, RegisteredType>()

  constructor(options: { builtins?: boolean } = {}) {
    if (options.builtins ?? true) {
      // Registration order is the order `box` tries guards in, so the
      // rectangle has to come before the point it would otherwise match.
      this.register('std.String', kinds.string)
      this.register('std.Boolean', kinds.boolean)
      this.register('std.Int32', kinds.int)
      this.register('std.UInt32', kinds.uint)
      this.register('std.Rectangle', kinds.rectangle)
      this.register('std.Point', kinds.point)
      this.register('std.Size', kinds.size)
      this.register('std.Color', kinds.color)
    }
  }

  /**
   * Register a type under a qualified name
   */
  register<V>(id: string, kind: Kind<V>, options: RegisterTypeOptions = {}): RegisteredType {
    if (id.includes(':') || id.includes(',')) {
      throw new Error(`Invalid type identifier: ${id}`)
    }
    const entry: RegisteredType = {
      id,
      module: options.module ? trimModule(options.module) : undefined,
      kind,
      guard: kind.guard,
    }
    this.types.set(id, entry)
    return entry
  }

  /**
   * Register an enum kind under its own name
   */
  registerEnum<V>(kind: TypedKind<EnumKind, V>, options: RegisterTypeOptions = {}): RegisteredType {
    return this.register(kind.name, kind, options)
  }

  get(id: string): RegisteredType | undefined {
    return this.types.get(id)
  }

  /**
   * Resolve a persisted identifier: exact name first, then the part before
   * the module qualifier.
   */
  resolve(identifier: string): RegisteredType | undefined {
    const trimmed = identifier.trim()
    const exact = this.types.get(trimmed)
    if (exact) return exact

    const commaIndex = trimmed.indexOf(',')
    if (commaIndex < 0) return undefined

    const entry = this.types.get(trimmed.substring(0, commaIndex).trim())
    if (!entry) return undefined

    const module = trimModule(trimmed.substring(commaIndex + 1))
    if (entry.module && entry.module !== module) {
      return undefined
    }
    return entry
  }

  /**
   * The identifier written in front of a dynamic value
   */
  identifierOf(entry: RegisteredType): string {
    return entry.module ? `${entry.id},${entry.module}` : entry.id
  }

  /**
   * Tag a plain value with the first registered type that accepts it
   */
  box(value: FieldValue): DynamicValue | undefined {
    for (const entry of this.types.values()) {
      if (entry.guard(value)) {
        return { type: entry.id, value }
      }
    }
    return undefined
  }

  list(): RegisteredType[] {
    return Array.from(this.types.values())
  }
}

function trimModule(module: string): string {
  const commaIndex = module.indexOf(',')
  return (commaIndex < 0 ? module : module.substring(0, commaIndex)).trim()
}
