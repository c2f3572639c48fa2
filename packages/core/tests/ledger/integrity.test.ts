import { describe, it, expect } from 'vitest'
import { checkIntegrity, isHealthy } from '../../src/ledger/integrity.js'
import type { SessionRecord } from '../../src/ledger/schemas.js'

function record(sequence: number, bootEpoch: number, open = false): SessionRecord {
  return {
    sequence,
    bootEpoch,
    uptimeSeconds: 100,
    shutdownEpoch: open ? -1 : bootEpoch + 100,
    shutdownKind: 'ungraceful',
    downtimeSeconds: open ? -1 : 50,
    kernelLabel: 'k',
  }
}

describe('checkIntegrity', () => {
  it('accepts a well-formed ledger', () => {
    const integrity = checkIntegrity([record(1, 1000), record(2, 1200), record(3, 1400, true)])
    expect(integrity).toEqual({
      rowCount: 3,
      tailSequence: 3,
      missingRows: 0,
      strayOpenSequences: [],
      bootRegressions: [],
    })
    expect(isHealthy(integrity)).toBe(true)
  })

  it('counts rows deleted from the middle of the ledger', () => {
    const integrity = checkIntegrity([record(1, 1000), record(4, 1400, true)])
    expect(integrity.missingRows).toBe(2)
    expect(isHealthy(integrity)).toBe(false)
  })

  it('finds open records that are not the tail', () => {
    const integrity = checkIntegrity([record(1, 1000, true), record(2, 1200, true)])
    expect(integrity.strayOpenSequences).toEqual([1])
  })

  it('finds boot-time regressions', () => {
    const integrity = checkIntegrity([record(1, 5000), record(2, 1200), record(3, 1400, true)])
    expect(integrity.bootRegressions).toEqual([2])
  })

  it('handles an empty ledger', () => {
    expect(checkIntegrity([])).toEqual({
      rowCount: 0,
      tailSequence: 0,
      missingRows: 0,
      strayOpenSequences: [],
      bootRegressions: [],
    })
  })
})
