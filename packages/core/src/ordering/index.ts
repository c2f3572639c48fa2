export { orderLedger, windowLedger } from './ordering.js'
export type { OrderKey, OrderOptions, WindowOptions } from './ordering.js'
