/**
 * Common utilities — shared types, Result pattern, error handling, logging.
 */

export { Ok, Err, unwrap, isOk, isErr } from './result.js'
export type { Result } from './result.js'

export { LedgerError, errorMessage } from './errors.js'
export type { ErrorCode } from './errors.js'

export {
  EpochSecondsSchema,
  DurationSecondsSchema,
  FilePathSchema,
  ShutdownKindSchema,
} from './schemas.js'
export type { ShutdownKind } from './schemas.js'

export { silentLogger } from './logger.js'
export type { Logger } from './logger.js'
