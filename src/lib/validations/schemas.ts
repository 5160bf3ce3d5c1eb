/**
 * Zod validation schemas for run command input and persisted audit rows
 *
 * Usage:
 * ```typescript
 * import { SyncCommandSchema } from '@/lib/validations/schemas'
 *
 * const result = SyncCommandSchema.safeParse(options)
 * if (!result.success) {
 *   // report result.error.issues
 * }
 * // Use result.data (typed and validated)
 * ```
 */

import { z } from 'zod'
import { DEFAULTS } from '@/lib/constants'

// =============================================================================
// Run Command
// =============================================================================

/** Only the literal "true" (any case) enables a string flag */
const booleanFlag = z
  .union([z.boolean(), z.string()])
  .transform((value) => (typeof value === 'boolean' ? value : value.trim().toLowerCase() === 'true'))

export const SyncCommandSchema = z.object({
  folderId: z
    .string({ required_error: 'Folder ID is required' })
    .trim()
    .min(1, 'Folder ID is required'),
  credentials: z
    .string()
    .optional()
    .transform((value) => value?.trim() || DEFAULTS.CREDENTIALS_PATH),
  runTodayOnly: booleanFlag
    .optional()
    .transform((value) => value ?? DEFAULTS.RUN_TODAY_ONLY),
  tz: z
    .string()
    .optional()
    .transform((value) => value?.trim() || DEFAULTS.TIMEZONE),
})

// =============================================================================
// Audit Log Rows
// =============================================================================

/** Missing or non-text cells in a persisted row read as empty */
const cell = z.string().catch('')

export const AuditLogRowSchema = z.object({
  timestamp: cell,
  src_id: cell,
  src_title: cell,
  src_modified: cell,
  dst_id: cell,
  dst_title: cell,
  rows_in: cell,
  rows_out: cell,
  status: cell,
  message: cell,
})

// =============================================================================
// Type Exports
// =============================================================================

export type SyncCommandInput = z.input<typeof SyncCommandSchema>
export type AuditLogRow = z.infer<typeof AuditLogRowSchema>
