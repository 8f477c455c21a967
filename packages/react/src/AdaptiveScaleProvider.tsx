/**
 * Adaptive scale context
 *
 * Gives a subtree its own scaling configuration, e.g. a widget preview
 * rendered at several sizes on one page.
 */

import { createContext, useContext, useMemo } from 'react';
import type { ReactNode } from 'react';
import { createScaler, getConfiguration } from '@adaptive-scale/core';
import type { AdaptiveScaler, ScalingConfiguration } from '@adaptive-scale/core';

const AdaptiveScaleContext = createContext<ScalingConfiguration | null>(null);

export interface AdaptiveScaleProviderProps {
  /** Configuration for every scaling call inside this provider */
  configuration: ScalingConfiguration;
  children?: ReactNode;
}

export function AdaptiveScaleProvider({ configuration, children }: AdaptiveScaleProviderProps) {
  return (
    <AdaptiveScaleContext.Provider value={configuration}>
      {children}
    </AdaptiveScaleContext.Provider>
  );
}

/**
 * Configuration of the nearest provider, or the process-wide one.
 */
export function useAdaptiveConfiguration(): ScalingConfiguration {
  return useContext(AdaptiveScaleContext) ?? getConfiguration();
}

/**
 * Scaler for the nearest provider. Outside any provider the scaler is
 * unbound and follows the process-wide configuration.
 */
export function useAdaptiveScale(): AdaptiveScaler {
  const configuration = useContext(AdaptiveScaleContext);
  return useMemo(() => createScaler(configuration ?? undefined), [configuration]);
}
