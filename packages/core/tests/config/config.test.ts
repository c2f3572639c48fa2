import { describe, it, expect } from 'vitest'
import { resolveConfig, DEFAULT_DB_PATH } from '../../src/config/config.js'

describe('resolveConfig', () => {
  it('applies defaults', () => {
    expect(resolveConfig({}, {})).toEqual({
      ok: true,
      value: { dbPath: DEFAULT_DB_PATH, shutdownKind: 'ungraceful', silent: false, utc: false },
    })
  })

  it('reads the environment', () => {
    const result = resolveConfig({}, { UPTIME_LEDGER_DB: '/tmp/ledger.db', UPTIME_LEDGER_UTC: 'yes' })
    expect(result.ok && result.value).toMatchObject({ dbPath: '/tmp/ledger.db', utc: true })
  })

  it('lets explicit overrides win over the environment', () => {
    const result = resolveConfig(
      { dbPath: '/srv/ledger.db', shutdownKind: 'graceful', utc: false },
      { UPTIME_LEDGER_DB: '/tmp/ledger.db', UPTIME_LEDGER_UTC: '1' },
    )
    expect(result.ok && result.value).toEqual({
      dbPath: '/srv/ledger.db',
      shutdownKind: 'graceful',
      silent: false,
      utc: false,
    })
  })

  it('ignores undefined overrides', () => {
    const result = resolveConfig({ dbPath: undefined }, { UPTIME_LEDGER_DB: '/tmp/ledger.db' })
    expect(result.ok && result.value.dbPath).toBe('/tmp/ledger.db')
  })

  it('rejects a non-boolean UTC flag', () => {
    const result = resolveConfig({}, { UPTIME_LEDGER_UTC: 'maybe' })
    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error.message).toBe('UPTIME_LEDGER_UTC must be a boolean, got "maybe"')
  })

  it('rejects an empty database path', () => {
    const result = resolveConfig({ dbPath: '' }, {})
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.code).toBe('VALIDATION_ERROR')
      expect(result.error.message).toBe('dbPath: File path cannot be empty')
    }
  })
})
