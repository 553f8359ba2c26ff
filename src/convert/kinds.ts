/**
 * Field kinds - the closed set of value shapes a section field can declare
 *
 * `FieldKind` is what the converter switches on. `Kind<V>` is the same value
 * with a type guard attached, so that section declarations can check at
 * compile time that a kind matches the property it is bound to.
 */

import { isColor, isPoint, isRectangle, isSize } from './geometry'
import type { Color, Point, Rectangle, Size } from './geometry'
import { Int32Schema, UInt32Schema } from './primitives'

export type EnumMembers = Readonly<Record<string, string | number>>

export interface ScalarKind {
  readonly tag: 'string' | 'boolean' | 'int' | 'uint' | 'point' | 'size' | 'rectangle' | 'color'
}

export interface EnumKind {
  readonly tag: 'enum'
  /** Qualified name, also used as the dynamic type identifier */
  readonly name: string
  readonly members: EnumMembers
}

export interface NullableKind {
  readonly tag: 'nullable'
  readonly inner: FieldKind
}

export interface ListKind {
  readonly tag: 'list'
  readonly element: FieldKind
}

export interface MapKind {
  readonly tag: 'map'
  readonly key: FieldKind
  readonly value: FieldKind
}

export interface DynamicKind {
  readonly tag: 'dynamic'
}

export type FieldKind = ScalarKind | EnumKind | NullableKind | ListKind | MapKind | DynamicKind

export type FieldKindTag = FieldKind['tag']

/**
 * A value tagged with the identifier of its runtime type
 */
export interface DynamicValue {
  readonly type: string
  readonly value: FieldValue
}

export type FieldValue =
  | string
  | number
  | boolean
  | null
  | Point
  | Size
  | Rectangle
  | Color
  | DynamicValue
  | FieldValue[]
  | Map<FieldValue, FieldValue>

/**
 * A kind variant carrying a guard for the values it produces
 */
export type TypedKind<K extends FieldKind, V> = K & {
  readonly guard: (value: unknown) => value is V
}

export type Kind<V> = TypedKind<FieldKind, V>

export function isDynamicValue(value: unknown): value is DynamicValue {
  return typeof value === 'object' && value !== null && 'type' in value && 'value' in value &&
    typeof value.type === 'string'
}

/**
 * Forward (name, value) pairs of an enum object, skipping the reverse
 * mappings numeric enums carry.
 */
export function enumEntries(members: EnumMembers): Array<[string, string | number]> {
  return Object.entries(members).filter(([name]) => Number.isNaN(Number(name)))
}

const stringKind: Kind<string> = {
  tag: 'string',
  guard: (value): value is string => typeof value === 'string',
}

const booleanKind: Kind<boolean> = {
  tag: 'boolean',
  guard: (value): value is boolean => typeof value === 'boolean',
}

const intKind: Kind<number> = {
  tag: 'int',
  guard: (value): value is number => Int32Schema.safeParse(value).success,
}

const uintKind: Kind<number> = {
  tag: 'uint',
  guard: (value): value is number => UInt32Schema.safeParse(value).success,
}

const pointKind: Kind<Point> = { tag: 'point', guard: isPoint }
const sizeKind: Kind<Size> = { tag: 'size', guard: isSize }
const rectangleKind: Kind<Rectangle> = { tag: 'rectangle', guard: isRectangle }
const colorKind: Kind<Color> = { tag: 'color', guard: isColor }

const dynamicKind: Kind<DynamicValue> = { tag: 'dynamic', guard: isDynamicValue }

function enumeration<E extends EnumMembers>(name: string, members: E): TypedKind<EnumKind, E[keyof E]> {
  const values = enumEntries(members).map(([, value]) => value)
  return {
    tag: 'enum',
    name,
    members,
    guard: (value): value is E[keyof E] => values.some(member => member === value),
  }
}

function nullable<V>(inner: Kind<V>): TypedKind<NullableKind, V | null> {
  return {
    tag: 'nullable',
    inner,
    guard: (value): value is V | null => value === null || inner.guard(value),
  }
}

function list<V>(element: Kind<V>): TypedKind<ListKind, V[]> {
  return {
    tag: 'list',
    element,
    guard: (value): value is V[] => Array.isArray(value) && value.every(item => element.guard(item)),
  }
}

function map<K, V>(key: Kind<K>, value: Kind<V>): TypedKind<MapKind, Map<K, V>> {
  return {
    tag: 'map',
    key,
    value,
    guard: (candidate): candidate is Map<K, V> =>
      candidate instanceof Map &&
      Array.from(candidate.entries()).every(([k, v]) => key.guard(k) && value.guard(v)),
  }
}

/**
 * Kind constructors used when declaring section fields
 */
export const kinds = {
  string: stringKind,
  boolean: booleanKind,
  int: intKind,
  uint: uintKind,
  point: pointKind,
  size: sizeKind,
  rectangle: rectangleKind,
  color: colorKind,
  dynamic: dynamicKind,
  enumeration,
  nullable,
  list,
  map,
}

/**
 * Human readable kind name for log lines and error messages
 */
export function describeKind(kind: FieldKind): string {
  switch (kind.tag) {
    case 'enum':
      return `enum ${kind.name}`
    case 'nullable':
      return `${describeKind(kind.inner)}?`
    case 'list':
      return `list<${describeKind(kind.element)}>`
    case 'map':
      return `map<${describeKind(kind.key)}, ${describeKind(kind.value)}>`
    default:
      return kind.tag
  }
}
