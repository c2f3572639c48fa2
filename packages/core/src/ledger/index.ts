/**
 * Ledger — session records and their store.
 */

export { LedgerRepository } from './repository.js'
export { checkIntegrity, isHealthy } from './integrity.js'
export type { LedgerIntegrity } from './integrity.js'
export {
  OPEN_SENTINEL,
  SessionRecordSchema,
  NewSessionInputSchema,
  RefreshInputSchema,
  CloseInputSchema,
  ObservationSchema,
  isOpen,
} from './schemas.js'
export type {
  SessionRecord,
  NewSessionInput,
  RefreshInput,
  CloseInput,
  Observation,
} from './schemas.js'
