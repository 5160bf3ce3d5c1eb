/**
 * Pipeline Error Types
 *
 * Setup-phase failures (auth, listing) are fatal and abort the run.
 * Per-file failures are caught at the file boundary and written to the
 * audit log.
 */

export type PipelineErrorCode =
  | 'AUTH_FAILED'
  | 'LIST_FAILED'
  | 'DOWNLOAD_FAILED'
  | 'DECODE_FAILED'
  | 'TRANSFORM_FAILED'
  | 'UPLOAD_FAILED'

export class PipelineError extends Error {
  readonly code: PipelineErrorCode
  readonly fatal: boolean

  constructor(code: PipelineErrorCode, message: string, fatal: boolean, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'PipelineError'
    this.code = code
    this.fatal = fatal
  }
}

export class AuthError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('AUTH_FAILED', message, true, options)
    this.name = 'AuthError'
  }
}

export class ListError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('LIST_FAILED', message, true, options)
    this.name = 'ListError'
  }
}

export class DownloadError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('DOWNLOAD_FAILED', message, false, options)
    this.name = 'DownloadError'
  }
}

export class DecodeError extends PipelineError {
  readonly attempted: string[]

  constructor(attempted: string[], reasons: string[]) {
    super(
      'DECODE_FAILED',
      `Unable to read CSV with any supported encoding (${attempted
        .map((encoding, i) => `${encoding}: ${reasons[i] ?? 'unknown'}`)
        .join('; ')})`,
      false
    )
    this.name = 'DecodeError'
    this.attempted = attempted
  }
}

export class TransformError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('TRANSFORM_FAILED', message, false, options)
    this.name = 'TransformError'
  }
}

export class UploadError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('UPLOAD_FAILED', message, false, options)
    this.name = 'UploadError'
  }
}

// =============================================================================
// Helpers
// =============================================================================

export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message
  if (typeof error === 'string') return error
  return 'Unknown error'
}

/**
 * Wrap a thrown value in the given pipeline error type unless it already
 * is one.
 */
export function asPipelineError(
  error: unknown,
  wrap: new (message: string, options?: { cause?: unknown }) => PipelineError
): PipelineError {
  if (error instanceof PipelineError) return error
  return new wrap(toErrorMessage(error), { cause: error })
}

export function mapPipelineError(error: unknown): { exitCode: number; message: string } {
  if (error instanceof PipelineError) {
    switch (error.code) {
      case 'AUTH_FAILED':
        return { exitCode: 1, message: `Authentication failed: ${error.message}` }
      case 'LIST_FAILED':
        return { exitCode: 1, message: `Could not list Drive folder: ${error.message}` }
      default:
        return { exitCode: 1, message: error.message }
    }
  }

  return { exitCode: 1, message: `Sync failed: ${toErrorMessage(error)}` }
}
