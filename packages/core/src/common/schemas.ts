/**
 * Shared Zod schemas used across modules.
 */

import { z } from 'zod'

export const UsernameSchema = z
  .string()
  .trim()
  .min(1, 'Username cannot be empty')
  .refine((v) => !v.includes(':') && !/\s/.test(v), 'Username cannot contain ":" or whitespace')
