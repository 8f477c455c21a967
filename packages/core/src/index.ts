/**
 * Adaptive Scale
 *
 * Proportional scaling of fixed design measurements (spacing, font size,
 * padding, frame dimensions) to the size of the display being rendered to.
 *
 * @example
 * ```typescript
 * import { initialize, scale, createScaler, createConfiguration } from '@adaptive-scale/core';
 *
 * // Designs authored at 430x932; the display is detected on first use
 * initialize({ currentWidth: 860, currentHeight: 1864 });
 * scale(24);            // 48, height axis
 * scale('width', 16);   // 32
 *
 * // Isolated context, no global state involved
 * const widget = createScaler(
 *   createConfiguration({ width: 182, height: 85 }, { width: 364, height: 170 })
 * );
 * widget.forWidth(20);  // 10
 * ```
 */

export * from './config';
export * from './engine';

export { InvalidConfigurationError } from './errors';
export { scaleDebug, scaleDebugEnabled } from './debug';
