/**
 * Typed error class for ledger operations.
 */

export type ErrorCode =
  | 'DB_ERROR'
  | 'IO_ERROR'
  | 'VALIDATION_ERROR'
  | 'BOUNDARY_LOST'

export class LedgerError extends Error {
  readonly code: ErrorCode

  constructor(code: ErrorCode, message: string) {
    super(message)
    this.name = 'LedgerError'
    this.code = code
  }

  static validation(message: string): LedgerError {
    return new LedgerError('VALIDATION_ERROR', message)
  }

  static db(message: string): LedgerError {
    return new LedgerError('DB_ERROR', message)
  }

  static io(message: string): LedgerError {
    return new LedgerError('IO_ERROR', message)
  }

  /** A restart was detected but could not be recorded; the session boundary is gone. */
  static boundaryLost(message: string): LedgerError {
    return new LedgerError('BOUNDARY_LOST', message)
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e)
}
