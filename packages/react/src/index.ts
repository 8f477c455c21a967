/**
 * React adapter for @adaptive-scale/core
 *
 * @example
 * ```tsx
 * import { adaptiveFontSize, adaptivePadding, useAdaptiveScale } from '@adaptive-scale/react';
 *
 * function Title({ children }: { children: string }) {
 *   const scaler = useAdaptiveScale();
 *   return (
 *     <h1 style={{ ...adaptiveFontSize(28), ...adaptivePadding(12, 'horizontal') }}>
 *       <span style={{ marginRight: scaler.forWidth(8) }}>{children}</span>
 *     </h1>
 *   );
 * }
 * ```
 */

export type { AdaptiveOptions, AdaptiveFrame, FrameAlignment, PaddingEdge } from './styles';
export {
  adaptiveSpacing,
  adaptiveHSpacing,
  adaptiveVSpacing,
  adaptiveFontSize,
  adaptivePadding,
  adaptiveLineSpacing,
  adaptiveFrame,
} from './styles';

export type { AdaptiveScaleProviderProps } from './AdaptiveScaleProvider';
export {
  AdaptiveScaleProvider,
  useAdaptiveConfiguration,
  useAdaptiveScale,
} from './AdaptiveScaleProvider';

export { subscribeViewport, useViewportSize, useViewportScaler } from './useViewportSize';
