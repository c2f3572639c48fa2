export {
  resolveConfig,
  LedgerConfigSchema,
  DEFAULT_DB_PATH,
  ENV_DB_PATH,
  ENV_UTC,
} from './config.js'
export type { LedgerConfig, LedgerConfigInput } from './config.js'
