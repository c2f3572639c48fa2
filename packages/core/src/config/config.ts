/**
 * Runtime configuration. Resolved once per invocation and passed down
 * explicitly; nothing reads the environment after this point.
 */

import { z } from 'zod'
import { Ok, Err, LedgerError, FilePathSchema, ShutdownKindSchema } from '../common/index.js'
import type { Result } from '../common/index.js'

export const DEFAULT_DB_PATH = '/var/lib/uptime-ledger/ledger.db'

export const ENV_DB_PATH = 'UPTIME_LEDGER_DB'
export const ENV_UTC = 'UPTIME_LEDGER_UTC'

export const LedgerConfigSchema = z.object({
  dbPath: FilePathSchema.default(DEFAULT_DB_PATH),
  shutdownKind: ShutdownKindSchema.default('ungraceful'),
  silent: z.boolean().default(false),
  utc: z.boolean().default(false),
})

export type LedgerConfig = z.infer<typeof LedgerConfigSchema>
export type LedgerConfigInput = z.input<typeof LedgerConfigSchema>

const TRUTHY = new Set(['1', 'true', 'yes', 'on'])
const FALSY = new Set(['0', 'false', 'no', 'off', ''])

function envFlag(name: string, value: string | undefined): Result<boolean | undefined, LedgerError> {
  if (value === undefined) return Ok(undefined)
  const normalized = value.trim().toLowerCase()
  if (TRUTHY.has(normalized)) return Ok(true)
  if (FALSY.has(normalized)) return Ok(false)
  return Err(LedgerError.validation(`${name} must be a boolean, got "${value}"`))
}

/**
 * Precedence, lowest first: defaults, environment, explicit overrides.
 * Overrides set to `undefined` do not mask the environment.
 */
export function resolveConfig(
  overrides: Partial<LedgerConfigInput> = {},
  env: Record<string, string | undefined> = process.env,
): Result<LedgerConfig, LedgerError> {
  const fromEnv: Record<string, unknown> = {}
  const dbPath = env[ENV_DB_PATH]
  if (dbPath !== undefined && dbPath !== '') fromEnv.dbPath = dbPath

  const utc = envFlag(ENV_UTC, env[ENV_UTC])
  if (!utc.ok) return utc
  if (utc.value !== undefined) fromEnv.utc = utc.value

  const explicit = Object.fromEntries(Object.entries(overrides).filter(([, v]) => v !== undefined))

  const parsed = LedgerConfigSchema.safeParse({ ...fromEnv, ...explicit })
  if (!parsed.success) {
    return Err(LedgerError.validation(parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')))
  }
  return Ok(parsed.data)
}
