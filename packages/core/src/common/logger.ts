/**
 * Logging surface. Components write tagged lines (`[cycle] ...`) to whatever
 * console-shaped sink they are given.
 */

export type Logger = Pick<Console, 'info' | 'warn' | 'error'>

export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
}
