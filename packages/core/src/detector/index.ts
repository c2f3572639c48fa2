export { isRestart, estimateShutdown, planMutation, applyObservation } from './restart-detector.js'
export type { LedgerMutation, DetectionOutcome } from './restart-detector.js'
