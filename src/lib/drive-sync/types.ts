/**
 * Drive Sync Types
 *
 * Type definitions for the incremental CSV cleaning pipeline.
 */

import type { DateTime } from 'luxon'
import type { PipelineError } from './errors'

// =============================================================================
// Remote File Store
// =============================================================================

/**
 * An item (file or folder) in the remote store
 */
export interface RemoteItem {
  id: string
  title: string
  /** ISO-8601 timestamp, or null when the store did not report one */
  modifiedTime: string | null
  mimeType: string
}

export interface ListFilter {
  name?: string
  mimeType?: string
}

/**
 * Primitives the pipeline needs from a hierarchical file store.
 * Containers are folders, identified by their item id.
 */
export interface RemoteFileStore {
  listChildren(containerId: string, filter?: ListFilter): Promise<RemoteItem[]>
  findByName(containerId: string, title: string): Promise<RemoteItem | null>
  /** Get-or-create a folder named `name` under `containerId` */
  ensureSubfolder(containerId: string, name: string): Promise<string>
  download(item: RemoteItem): Promise<Buffer>
  create(containerId: string, title: string, content: Buffer): Promise<string>
  /** Replace an item's content in place; the id is unchanged */
  overwrite(itemId: string, content: Buffer): Promise<string>
}

// =============================================================================
// Pipeline Items
// =============================================================================

export type SourceItem = Pick<RemoteItem, 'id' | 'title' | 'modifiedTime'>

export type DestinationItem = Pick<RemoteItem, 'id' | 'title' | 'modifiedTime'>

/**
 * Ordered rows of a CSV file, keyed by column name
 */
export interface TabularPayload {
  columns: string[]
  rows: Array<Record<string, string>>
}

export interface TransformResult {
  payload: TabularPayload
  rowsIn: number
  rowsOut: number
  /** Encoding strategy that decoded the input */
  encoding: string
}

// =============================================================================
// Change Detection
// =============================================================================

export type ChangeDecision = 'date_filtered' | 'up_to_date' | 'process'

export interface ChangeDetectionOptions {
  runTodayOnly: boolean
  timezone: string
  /** Current instant; defaults to the system clock */
  now?: DateTime
}

// =============================================================================
// Audit Log
// =============================================================================

export type AuditStatus = 'ok' | 'fail'

export interface AuditLogEntry {
  timestamp: string
  src_id: string
  src_title: string
  src_modified: string
  dst_id: string
  dst_title: string
  rows_in: number | null
  rows_out: number | null
  status: AuditStatus
  message: string
}

// =============================================================================
// Run
// =============================================================================

export interface SyncRunOptions {
  /** Root folder holding the raw CSV files */
  rootId: string
  runTodayOnly: boolean
  timezone: string
}

export interface RunSummary {
  processed: number
  skipped: number
  failed: number
}

export interface SyncRunResult {
  summary: RunSummary
  /** Entries appended during this run, in order */
  entries: AuditLogEntry[]
  destinationId: string
}

/**
 * Outcome of processing a single source file
 */
export type FileOutcome =
  | { status: 'ok'; destinationId: string; rowsIn: number; rowsOut: number }
  | { status: 'fail'; error: PipelineError }
