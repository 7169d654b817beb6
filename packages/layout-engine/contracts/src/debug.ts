export type DebugLevel = 'error' | 'warn' | 'info' | 'verbose';

/** Verbose layout logging is opt-in through `LEAFLINE_DEBUG_LAYOUT`. */
export const isLayoutDebugEnabled = (): boolean =>
  typeof process !== 'undefined' && typeof process.env !== 'undefined' && Boolean(process.env.LEAFLINE_DEBUG_LAYOUT);

/**
 * Logs a layout diagnostic.
 *
 * Errors and warnings always reach the console; `info` and `verbose` only when
 * layout debugging is enabled.
 */
export function debugLog(level: DebugLevel, message: string, data?: Record<string, unknown>): void {
  if (level === 'error') {
    if (data) console.error(message, data);
    else console.error(message);
    return;
  }
  if (level === 'warn') {
    if (data) console.warn(message, data);
    else console.warn(message);
    return;
  }
  if (!isLayoutDebugEnabled()) return;
  if (data) console.log(message, data);
  else console.log(message);
}
