/**
 * Audit Log
 *
 * Append-only ledger of processing attempts, persisted as a single CSV item
 * (`_pipeline_log.csv`) in the cleaned folder.
 *
 * The log is pulled once at run start, appended to in memory, and written
 * back once at run end with overwrite semantics. This read-modify-write has
 * no locking: at most one run may target a given cleaned folder at a time.
 */

import * as Papa from 'papaparse'
import { AUDIT_LOG_COLUMNS, PIPELINE } from '@/lib/constants'
import { createLogger } from '@/lib/logger'
import { AuditLogRowSchema, type AuditLogRow } from '@/lib/validations/schemas'
import { UpsertWriter } from './upsert-writer'
import type { RunWorkspace } from './workspace'
import type { AuditLogEntry, RemoteFileStore } from './types'

const log = createLogger('drive-sync:audit')

// =============================================================================
// Row Conversion
// =============================================================================

function formatCount(value: number | null): string {
  return value === null ? '' : String(value)
}

function parseCount(value: string): number | null {
  if (value.trim() === '') return null
  const parsed = Number(value)
  return Number.isInteger(parsed) ? parsed : null
}

export function toRow(entry: AuditLogEntry): AuditLogRow {
  return {
    ...entry,
    rows_in: formatCount(entry.rows_in),
    rows_out: formatCount(entry.rows_out),
  }
}

export function fromRow(row: AuditLogRow): AuditLogEntry {
  return {
    ...row,
    rows_in: parseCount(row.rows_in),
    rows_out: parseCount(row.rows_out),
    status: row.status === 'ok' ? 'ok' : 'fail',
  }
}

export function serializeRows(rows: AuditLogRow[]): string {
  // Header-only output carries no trailing newline, same as a populated log
  if (rows.length === 0) return Papa.unparse([[...AUDIT_LOG_COLUMNS]], { newline: '\n' })

  return Papa.unparse(
    {
      fields: [...AUDIT_LOG_COLUMNS],
      data: rows.map((row) => AUDIT_LOG_COLUMNS.map((column) => row[column])),
    },
    { newline: '\n' }
  )
}

export function parseRows(text: string): AuditLogRow[] {
  const { data } = Papa.parse<Record<string, unknown>>(text, {
    header: true,
    skipEmptyLines: true,
  })
  return data.map((record) => AuditLogRowSchema.parse(record))
}

// =============================================================================
// Audit Log
// =============================================================================

export class AuditLog {
  private rows: AuditLogRow[] = []
  private appended: AuditLogEntry[] = []

  constructor(
    private readonly store: RemoteFileStore,
    private readonly workspace: RunWorkspace
  ) {}

  /**
   * Pull the persisted log from `containerId`. A missing log item is an
   * empty log; the working copy then starts with just the header.
   */
  async load(containerId: string): Promise<AuditLogEntry[]> {
    const existing = await this.store.findByName(containerId, PIPELINE.LOG_NAME)

    if (existing) {
      const content = await this.store.download(existing)
      await this.workspace.write(PIPELINE.LOG_NAME, content)
      this.rows = parseRows(content.toString('utf8'))
      log.debug('Loaded audit log', { rows: this.rows.length })
    } else {
      this.rows = []
      await this.workspace.write(PIPELINE.LOG_NAME, serializeRows([]))
      log.debug('No audit log found, starting empty')
    }

    this.appended = []
    return this.entries()
  }

  /**
   * Record an attempt in memory. Nothing is persisted until flush().
   */
  append(entry: AuditLogEntry): void {
    this.rows.push(toRow(entry))
    this.appended.push(entry)
  }

  entries(): AuditLogEntry[] {
    return this.rows.map(fromRow)
  }

  /** Entries appended since the last load() */
  appendedEntries(): AuditLogEntry[] {
    return [...this.appended]
  }

  /**
   * Persist the full log to `containerId`, replacing any earlier copy.
   *
   * @returns the log item id
   */
  async flush(containerId: string): Promise<string> {
    const workingCopy = await this.workspace.write(PIPELINE.LOG_NAME, serializeRows(this.rows))
    const logId = await new UpsertWriter(this.store).upsert(containerId, workingCopy, PIPELINE.LOG_NAME)
    log.debug('Flushed audit log', { rows: this.rows.length, logId })
    return logId
  }
}
