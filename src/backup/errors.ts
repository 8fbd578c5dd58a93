export type BackupErrorCode =
  | 'SOURCE_UNAVAILABLE'
  | 'MALFORMED_RECORD'
  | 'SESSION_PROCESSING_FAILED'
  | 'DESTINATION_WRITE_ERROR'
  | 'INVALID_OPTION'

export class BackupError extends Error {
  readonly code: BackupErrorCode
  readonly suggestions?: string[]

  constructor(code: BackupErrorCode, message: string, suggestions?: string[]) {
    super(message)
    this.name = 'BackupError'
    this.code = code
    this.suggestions = suggestions
  }
}

export function isBackupError(error: unknown): error is BackupError {
  return error instanceof BackupError
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
