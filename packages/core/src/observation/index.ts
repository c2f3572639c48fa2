export {
  createSystemObservationSource,
  createStaticObservationSource,
  defaultKernelLabel,
  parseProcUptime,
  parseProcBootTime,
} from './source.js'
export type { ObservationSource, SystemObservationOptions } from './source.js'
