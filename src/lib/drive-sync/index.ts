/**
 * Drive Sync Module
 *
 * Incremental cleaning of CSV files from a Google Drive folder into its
 * `data_cleaned` subfolder, with an audit log of every attempt.
 *
 * Usage:
 * ```typescript
 * import { SyncOrchestrator, formatSummary } from '@/lib/drive-sync'
 * import { connectDrive } from '@/lib/google/drive'
 *
 * const store = await connectDrive('credentials.json')
 * const { summary } = await new SyncOrchestrator({ store }).run({
 *   rootId: folderId,
 *   runTodayOnly: true,
 *   timezone: 'America/New_York',
 * })
 * console.log(formatSummary(summary))
 * ```
 */

// Types
export type {
  RemoteItem,
  ListFilter,
  RemoteFileStore,
  SourceItem,
  DestinationItem,
  TabularPayload,
  TransformResult,
  ChangeDecision,
  ChangeDetectionOptions,
  AuditStatus,
  AuditLogEntry,
  SyncRunOptions,
  RunSummary,
  SyncRunResult,
  FileOutcome,
} from './types'

// Errors
export {
  PipelineError,
  AuthError,
  ListError,
  DownloadError,
  DecodeError,
  TransformError,
  UploadError,
  mapPipelineError,
  toErrorMessage,
} from './errors'
export type { PipelineErrorCode } from './errors'

// Components
export { shouldProcess, evaluate, passesDateFilter, resolveTimezone } from './change-detector'
export { transform, serialize } from './transformer'
export { UpsertWriter, cleanedName } from './upsert-writer'
export { AuditLog } from './audit-log'
export { RunWorkspace, withWorkspace } from './workspace'

// Orchestrator
export { SyncOrchestrator, formatSummary } from './orchestrator'
export type { SyncOrchestratorDeps } from './orchestrator'
