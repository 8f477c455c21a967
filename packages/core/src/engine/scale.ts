/**
 * Scaling Engine
 *
 * Pure proportional scaling: value * current[axis] / reference[axis].
 * No rounding or clamping is applied. Dimensions supplied explicitly are
 * not validated, so a zero reference yields Infinity or NaN.
 */

import { getConfiguration } from '../config/store';
import type { Axis, ScalingConfiguration } from '../config/types';

export function scaleWidth(value: number, currentWidth: number, referenceWidth: number): number {
  return (value * currentWidth) / referenceWidth;
}

export function scaleHeight(value: number, currentHeight: number, referenceHeight: number): number {
  return (value * currentHeight) / referenceHeight;
}

function scaleAlong(axis: Axis, value: number, configuration: ScalingConfiguration): number {
  switch (axis) {
    case 'width':
      return scaleWidth(value, configuration.current.width, configuration.reference.width);
    case 'height':
      return scaleHeight(value, configuration.current.height, configuration.reference.height);
  }
}

/** Scale along the height axis using the process-wide configuration. */
export function scale(value: number): number;
/** Scale along an axis using the given configuration, or the process-wide one. */
export function scale(axis: Axis, value: number, configuration?: ScalingConfiguration): number;
/** Scale along an axis using explicit dimensions; reads no global state. */
export function scale(
  axis: Axis,
  value: number,
  currentWidth: number,
  referenceWidth: number,
  currentHeight: number,
  referenceHeight: number
): number;
export function scale(
  axisOrValue: Axis | number,
  value?: number,
  configurationOrCurrentWidth?: ScalingConfiguration | number,
  referenceWidth?: number,
  currentHeight?: number,
  referenceHeight?: number
): number {
  if (typeof axisOrValue === 'number') {
    return scaleAlong('height', axisOrValue, getConfiguration());
  }
  if (value === undefined) {
    throw new TypeError('scale: a value is required after the axis');
  }

  if (typeof configurationOrCurrentWidth === 'number') {
    if (
      referenceWidth === undefined ||
      currentHeight === undefined ||
      referenceHeight === undefined
    ) {
      throw new TypeError('scale: explicit dimensions need all four of width and height');
    }
    return axisOrValue === 'width'
      ? scaleWidth(value, configurationOrCurrentWidth, referenceWidth)
      : scaleHeight(value, currentHeight, referenceHeight);
  }

  return scaleAlong(axisOrValue, value, configurationOrCurrentWidth ?? getConfiguration());
}

/** @deprecated Use {@link scale}. */
export function resized(value: number): number;
/** @deprecated Use {@link scale}. */
export function resized(axis: Axis, value: number, configuration?: ScalingConfiguration): number;
export function resized(
  axisOrValue: Axis | number,
  value?: number,
  configuration?: ScalingConfiguration
): number {
  if (typeof axisOrValue === 'number') {
    return scale(axisOrValue);
  }
  if (value === undefined) {
    throw new TypeError('resized: a value is required after the axis');
  }
  return scale(axisOrValue, value, configuration);
}
