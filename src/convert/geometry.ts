/**
 * Geometric value types persisted as comma-separated integers
 */

export interface Point {
  x: number
  y: number
}

export interface Size {
  width: number
  height: number
}

export interface Rectangle {
  x: number
  y: number
  width: number
  height: number
}

/**
 * ARGB color, each channel 0..255
 */
export interface Color {
  a: number
  r: number
  g: number
  b: number
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

const INT32_MIN = -2147483648
const INT32_MAX = 2147483647

function hasIntegers(
  value: Record<string, unknown>,
  keys: readonly string[],
  min = INT32_MIN,
  max = INT32_MAX
): boolean {
  return keys.every(key => {
    const component = value[key]
    return typeof component === 'number' && Number.isInteger(component) && component >= min && component <= max
  })
}

export function isPoint(value: unknown): value is Point {
  return isRecord(value) && hasIntegers(value, ['x', 'y'])
}

export function isSize(value: unknown): value is Size {
  return isRecord(value) && hasIntegers(value, ['width', 'height'])
}

export function isRectangle(value: unknown): value is Rectangle {
  return isRecord(value) && hasIntegers(value, ['x', 'y', 'width', 'height'])
}

export function isColor(value: unknown): value is Color {
  return isRecord(value) && hasIntegers(value, ['a', 'r', 'g', 'b'], 0, 255)
}

export const point = (x: number, y: number): Point => ({ x, y })
export const size = (width: number, height: number): Size => ({ width, height })
export const rectangle = (x: number, y: number, width: number, height: number): Rectangle => ({ x, y, width, height })
export const color = (a: number, r: number, g: number, b: number): Color => ({ a, r, g, b })
