/**
 * Zod schemas for the scalar text forms used in INI values
 */

import { z } from 'zod'

export const BooleanTextSchema = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(['true', 'false']))
  .transform(value => value === 'true')

export const Int32TextSchema = z
  .string()
  .trim()
  .regex(/^[+-]?\d+$/, 'Not an integer')
  .transform(Number)
  .pipe(z.number().int().min(-2147483648).max(2147483647))

export const UInt32TextSchema = z
  .string()
  .trim()
  .regex(/^\+?\d+$/, 'Not an unsigned integer')
  .transform(Number)
  .pipe(z.number().int().min(0).max(4294967295))

export const ColorChannelTextSchema = Int32TextSchema.pipe(z.number().min(0).max(255))

export const Int32Schema = z.number().int().min(-2147483648).max(2147483647)
export const UInt32Schema = z.number().int().min(0).max(4294967295)

export type TextSchema<T> = z.ZodType<T, z.ZodTypeDef, string>

/**
 * Parse with a schema, returning the first issue message on failure
 */
export function parseText<T>(
  schema: TextSchema<T>,
  raw: string
): { success: true; data: T } | { success: false; error: string } {
  const result = schema.safeParse(raw)
  if (result.success) {
    return { success: true, data: result.data }
  }
  const error = result.error.issues.map(issue => issue.message).join('; ')
  return { success: false, error }
}
