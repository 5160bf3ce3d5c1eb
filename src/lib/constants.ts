/**
 * Centralized Constants
 *
 * Fixed names and lookup tables used across the sync pipeline, grouped by
 * domain. Import from here instead of using inline literals.
 */

// =============================================================================
// Google Drive
// =============================================================================

export const DRIVE = {
  /** Mime type Drive uses for folders */
  FOLDER_MIME_TYPE: 'application/vnd.google-apps.folder',
  /** Mime type for uploaded cleaned payloads and the audit log */
  CSV_MIME_TYPE: 'text/csv',
  /** Full read/write access is needed to create the cleaned folder and files */
  SCOPES: ['https://www.googleapis.com/auth/drive'],
  /** Max page size accepted by files.list */
  PAGE_SIZE: 1000,
} as const

// =============================================================================
// Pipeline Layout
// =============================================================================

export const PIPELINE = {
  /** Subfolder of the root folder holding cleaned outputs and the log */
  CLEANED_FOLDER_NAME: 'data_cleaned',
  /** Audit log item name inside the cleaned folder */
  LOG_NAME: '_pipeline_log.csv',
  /** Suffix appended to a source's base name */
  CLEANED_SUFFIX: '_cleaned.csv',
  /** Source files are matched on this extension, case-insensitively */
  SOURCE_EXTENSION: '.csv',
} as const

// =============================================================================
// Run Command Defaults
// =============================================================================

export const DEFAULTS = {
  CREDENTIALS_PATH: 'credentials.json',
  RUN_TODAY_ONLY: true,
  TIMEZONE: 'America/New_York',
} as const

// =============================================================================
// Transform Tables
// =============================================================================

/** Closed enumeration for the `result` column */
export const RESULT_ENCODING: Readonly<Record<string, number>> = Object.freeze({
  'Qualified': 0,
  'No Address Info': 1,
  'Location Not Clear': 2,
  'No Clear Shipping Label': 3,
  'Public or Unsafe Area': 4,
  'Invalid Mailbox Delivery': 5,
  'Leave Outside of Building': 6,
  'Wrong Address': 7,
  'Wrong Parcel Photo': 8,
  'No POD': 9,
  'Inappropriate Delivery': 10,
})

/** Encoding for the `VALID POD` flag column */
export const VALID_POD_ENCODING: Readonly<Record<string, number>> = Object.freeze({
  Y: 0,
  N: 1,
})

/** Text written for an unmapped `result` value */
export const NULL_MARKER = '<NA>'

/** Cell written for an unmapped `VALID POD` value */
export const ABSENT_MARKER = ''

/** Encodings tried, in order, when decoding a downloaded CSV */
export const CSV_ENCODINGS = ['default', 'utf-8', 'utf-8-sig', 'latin1'] as const

export type CsvEncoding = (typeof CSV_ENCODINGS)[number]

// =============================================================================
// Audit Log
// =============================================================================

/** Fixed, positional column order of the audit log */
export const AUDIT_LOG_COLUMNS = [
  'timestamp',
  'src_id',
  'src_title',
  'src_modified',
  'dst_id',
  'dst_title',
  'rows_in',
  'rows_out',
  'status',
  'message',
] as const

export type AuditLogColumn = (typeof AUDIT_LOG_COLUMNS)[number]
