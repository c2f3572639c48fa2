/**
 * Statistics — tail patching and summary metrics.
 */

export { computeStatistics, round2, ratio } from './aggregator.js'
export type { LedgerStatistics, UptimeExtreme, DowntimeExtreme } from './aggregator.js'
export { patchSnapshot, overrideFromObservation } from './patch.js'
export type { TailOverride } from './patch.js'
