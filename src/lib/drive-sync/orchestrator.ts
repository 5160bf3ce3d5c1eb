/**
 * Sync Orchestrator
 *
 * Runs one incremental pass over the root folder: discover CSV files, skip
 * what is already fresh, clean and upsert the rest, and record every attempt
 * in the audit log. A failing file is logged and the run moves on; only
 * setup failures (auth, listing) abort the run.
 */

import { DateTime } from 'luxon'
import { PIPELINE } from '@/lib/constants'
import { createLogger, type Logger } from '@/lib/logger'
import { AuditLog } from './audit-log'
import { evaluate, passesDateFilter } from './change-detector'
import {
  DownloadError,
  ListError,
  PipelineError,
  TransformError,
  UploadError,
  asPipelineError,
  toErrorMessage,
} from './errors'
import { serialize, transform } from './transformer'
import { UpsertWriter, cleanedName } from './upsert-writer'
import { withWorkspace, type RunWorkspace } from './workspace'
import type {
  AuditLogEntry,
  FileOutcome,
  RemoteFileStore,
  RemoteItem,
  RunSummary,
  SyncRunOptions,
  SyncRunResult,
} from './types'

export interface SyncOrchestratorDeps {
  store: RemoteFileStore
  logger?: Logger
  /** Current instant; injectable for deterministic runs */
  clock?: () => DateTime
}

export function isSourceCandidate(item: RemoteItem): boolean {
  return item.title.toLowerCase().endsWith(PIPELINE.SOURCE_EXTENSION)
}

/**
 * Run one pipeline stage, tagging any failure with the stage's error type
 */
async function stage<T>(
  wrap: new (message: string, options?: { cause?: unknown }) => PipelineError,
  fn: () => T | Promise<T>
): Promise<T> {
  try {
    return await fn()
  } catch (error) {
    throw asPipelineError(error, wrap)
  }
}

export function formatSummary(summary: RunSummary): string {
  return `processed: ${summary.processed}, skipped: ${summary.skipped}, failed: ${summary.failed}`
}

// =============================================================================
// Sync Orchestrator Class
// =============================================================================

export class SyncOrchestrator {
  private readonly store: RemoteFileStore
  private readonly log: Logger
  private readonly clock: () => DateTime
  private readonly writer: UpsertWriter

  constructor(deps: SyncOrchestratorDeps) {
    this.store = deps.store
    this.log = deps.logger ?? createLogger('drive-sync:orchestrator')
    this.clock = deps.clock ?? (() => DateTime.now())
    this.writer = new UpsertWriter(deps.store)
  }

  async run(options: SyncRunOptions): Promise<SyncRunResult> {
    const log = this.log.child('run', { rootId: options.rootId })

    // 1. Resolve the cleaned folder
    const destinationId = await this.setup('Could not resolve cleaned folder', () =>
      this.store.ensureSubfolder(options.rootId, PIPELINE.CLEANED_FOLDER_NAME)
    )

    return withWorkspace(async (workspace) => {
      // 2. Pull the existing audit log
      const auditLog = new AuditLog(this.store, workspace)
      await this.setup('Could not load audit log', () => auditLog.load(destinationId))

      // 3. Discover candidate files
      const children = await this.setup('Could not list root folder', () =>
        this.store.listChildren(options.rootId)
      )
      const sources = children.filter(isSourceCandidate)
      log.info(`Found ${sources.length} CSV file(s)`)

      const summary: RunSummary = { processed: 0, skipped: 0, failed: 0 }
      const now = this.clock()
      const detection = { runTodayOnly: options.runTodayOnly, timezone: options.timezone, now }

      // 4. Process each file
      for (const source of sources) {
        if (!passesDateFilter(source, detection)) {
          log.debug(`Not modified today: ${source.title}`)
          continue
        }

        const destinationName = cleanedName(source.title)
        const existing = await this.setup(`Could not look up ${destinationName}`, () =>
          this.store.findByName(destinationId, destinationName)
        )

        if (evaluate(source, existing, detection) === 'up_to_date') {
          summary.skipped += 1
          log.debug(`Up to date: ${source.title}`)
          continue
        }

        const outcome = await this.processFile(source, destinationId, destinationName, workspace)
        auditLog.append(this.toEntry(source, destinationName, outcome))

        if (outcome.status === 'ok') {
          summary.processed += 1
          log.info(`OK: ${source.title} -> ${destinationName} (${outcome.rowsIn}→${outcome.rowsOut})`)
        } else {
          summary.failed += 1
          log.warn(`FAIL: ${source.title} | ${outcome.error.message}`, { code: outcome.error.code })
        }
      }

      // 5. Persist the log once
      await auditLog.flush(destinationId)
      log.info(`Log saved: ${PIPELINE.CLEANED_FOLDER_NAME}/${PIPELINE.LOG_NAME}`)

      return {
        summary,
        entries: auditLog.appendedEntries(),
        destinationId,
      }
    })
  }

  // ===========================================================================
  // Private: Per-file Processing
  // ===========================================================================

  /**
   * Download → transform → upsert. Never throws; every failure becomes a
   * `fail` outcome.
   */
  private async processFile(
    source: RemoteItem,
    destinationId: string,
    destinationName: string,
    workspace: RunWorkspace
  ): Promise<FileOutcome> {
    try {
      const raw = await stage(DownloadError, async () => {
        const content = await this.store.download(source)
        await workspace.write(source.title, content)
        return content
      })

      const result = await stage(TransformError, () => transform(raw))

      const localPath = await stage(UploadError, () =>
        workspace.write(destinationName, serialize(result.payload))
      )
      const dstId = await this.writer.upsert(destinationId, localPath, destinationName)

      return { status: 'ok', destinationId: dstId, rowsIn: result.rowsIn, rowsOut: result.rowsOut }
    } catch (error) {
      return { status: 'fail', error: asPipelineError(error, TransformError) }
    }
  }

  private toEntry(source: RemoteItem, destinationName: string, outcome: FileOutcome): AuditLogEntry {
    const base = {
      timestamp: this.clock().toUTC().toISO({ suppressMilliseconds: true }) ?? '',
      src_id: source.id,
      src_title: source.title,
      src_modified: source.modifiedTime ?? '',
      dst_title: destinationName,
    }

    if (outcome.status === 'ok') {
      return {
        ...base,
        dst_id: outcome.destinationId,
        rows_in: outcome.rowsIn,
        rows_out: outcome.rowsOut,
        status: 'ok',
        message: '',
      }
    }

    return {
      ...base,
      dst_id: '',
      rows_in: null,
      rows_out: null,
      status: 'fail',
      message: outcome.error.message,
    }
  }

  // ===========================================================================
  // Private: Setup
  // ===========================================================================

  /**
   * Run a setup-phase call; failures are fatal and surface as ListError
   * unless they already carry a pipeline error type.
   */
  private async setup<T>(context: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn()
    } catch (error) {
      if (error instanceof PipelineError) throw error
      throw new ListError(`${context}: ${toErrorMessage(error)}`, { cause: error })
    }
  }
}
