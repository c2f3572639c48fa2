export { runCycle } from './run-cycle.js'
export type { CycleReport, RunCycleOptions, DatabaseOpener } from './run-cycle.js'
