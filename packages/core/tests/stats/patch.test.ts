import { describe, it, expect } from 'vitest'
import { overrideFromObservation, patchSnapshot } from '../../src/stats/patch.js'
import type { SessionRecord } from '../../src/ledger/schemas.js'

const snapshot: SessionRecord[] = [
  { sequence: 1, bootEpoch: 1000, uptimeSeconds: 500, shutdownEpoch: 1500, shutdownKind: 'graceful', downtimeSeconds: 100, kernelLabel: 'k1' },
  { sequence: 2, bootEpoch: 1600, uptimeSeconds: 60, shutdownEpoch: -1, shutdownKind: 'ungraceful', downtimeSeconds: -1, kernelLabel: 'k1' },
]

describe('patchSnapshot', () => {
  it('overlays the live observation on the tail only', () => {
    const override = overrideFromObservation({ bootEpoch: 1600, uptimeSeconds: 200, kernelLabel: 'k2' }, 'graceful')
    const patched = patchSnapshot(snapshot, override)

    expect(patched[0]).toBe(snapshot[0])
    expect(patched[1]).toEqual({
      sequence: 2,
      bootEpoch: 1600,
      uptimeSeconds: 200,
      shutdownEpoch: -1,
      shutdownKind: 'graceful',
      downtimeSeconds: -1,
      kernelLabel: 'k2',
    })
  })

  it('leaves the stored snapshot untouched', () => {
    patchSnapshot(snapshot, { uptimeSeconds: 999, shutdownKind: 'graceful', kernelLabel: 'x' })
    expect(snapshot[1]?.uptimeSeconds).toBe(60)
    expect(snapshot[1]?.kernelLabel).toBe('k1')
  })

  it('returns an empty snapshot unchanged', () => {
    expect(patchSnapshot([], { uptimeSeconds: 1, shutdownKind: 'ungraceful', kernelLabel: '' })).toEqual([])
  })
})
