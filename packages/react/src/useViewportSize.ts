/**
 * Viewport tracking hooks
 *
 * Follows window resize events so a subtree can scale against the live
 * viewport instead of the size detected at start-up.
 */

import { useEffect, useMemo, useState } from 'react';
import {
  STANDARD_REFERENCE,
  createConfiguration,
  createScaler,
  detectHostDisplay,
} from '@adaptive-scale/core';
import type { AdaptiveScaler, Dimensions } from '@adaptive-scale/core';

/**
 * Call onChange with the window size now and on every resize.
 * Returns the cleanup that removes the listener; outside a browser
 * nothing is subscribed.
 */
export function subscribeViewport(onChange: (size: Dimensions) => void): () => void {
  if (typeof window === 'undefined') {
    return () => {};
  }

  const handleResize = () => {
    onChange({ width: window.innerWidth, height: window.innerHeight });
  };

  handleResize();
  window.addEventListener('resize', handleResize);
  return () => window.removeEventListener('resize', handleResize);
}

/**
 * Current window size, or null outside a browser.
 */
export function useViewportSize(): Dimensions | null {
  const [size, setSize] = useState<Dimensions | null>(() => detectHostDisplay());

  useEffect(() => subscribeViewport(setSize), []);

  return size;
}

/**
 * Scaler bound to the live viewport and the given reference size.
 * Falls back to the process-wide configuration while no usable viewport
 * is known. Once a viewport is known, a reference dimension that is not a
 * finite number > 0 makes the render throw InvalidConfigurationError.
 */
export function useViewportScaler(reference: Dimensions = STANDARD_REFERENCE): AdaptiveScaler {
  const viewport = useViewportSize();
  const { width: referenceWidth, height: referenceHeight } = reference;

  return useMemo(() => {
    if (!viewport || viewport.width <= 0 || viewport.height <= 0) {
      return createScaler();
    }
    return createScaler(
      createConfiguration(viewport, { width: referenceWidth, height: referenceHeight })
    );
  }, [viewport, referenceWidth, referenceHeight]);
}
