/**
 * @uptime-ledger/core
 *
 * Boot-session ledger: restart detection, durable session history, and the
 * statistics derived from it.
 */

export * from './common/index.js'
export * from './storage/index.js'
export * from './ledger/index.js'
export * from './detector/index.js'
export * from './stats/index.js'
export * from './ordering/index.js'
export * from './observation/index.js'
export * from './config/index.js'
export * from './cycle/index.js'
