/**
 * AdaptiveScaler — Scales design measurements for one rendering context.
 *
 * A scaler bound to an explicit configuration is independent of the
 * process-wide state, so several can coexist (e.g. a widget rendered at
 * multiple sizes). An unbound scaler reads the process-wide snapshot on
 * every call.
 */

import { createConfiguration, getConfiguration } from '../config/store';
import type { Axis, ScalingConfiguration } from '../config/types';
import { scale } from './scale';

export class AdaptiveScaler {
  constructor(private bound: ScalingConfiguration | null = null) {}

  /** Update the current display size (call on resize). Binds the scaler if it was unbound. */
  resize(width: number, height: number): void {
    this.bound = createConfiguration({ width, height }, this.configuration.reference);
  }

  /** Scale a design measurement along the width axis. */
  forWidth(value: number): number {
    return scale('width', value, this.configuration);
  }

  /** Scale a design measurement along the height axis. */
  forHeight(value: number): number {
    return scale('height', value, this.configuration);
  }

  scale(axis: Axis, value: number): number {
    return scale(axis, value, this.configuration);
  }

  /** Configuration in effect for the next call. */
  get configuration(): ScalingConfiguration {
    return this.bound ?? getConfiguration();
  }

  get isBound(): boolean {
    return this.bound !== null;
  }
}

export function createScaler(configuration?: ScalingConfiguration): AdaptiveScaler {
  return new AdaptiveScaler(configuration ?? null);
}
