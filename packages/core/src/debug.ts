/**
 * Debug logging helpers.
 */

const SCALE_DEBUG_FLAG = String(
  (typeof process !== 'undefined' && process.env.ADAPTIVE_SCALE_DEBUG) || '',
).toLowerCase();

export const scaleDebugEnabled =
  SCALE_DEBUG_FLAG === '1' ||
  SCALE_DEBUG_FLAG === 'true' ||
  SCALE_DEBUG_FLAG === 'yes';

export function scaleDebug(...args: unknown[]) {
  if (!scaleDebugEnabled) return;
  console.log('[AdaptiveScale]', ...args);
}
