/**
 * Built-in reference sizes.
 */

import type { Dimensions, FormFactor, WidgetPreset } from './types';

/** Reference design size for phones, tablets and desktops. */
export const STANDARD_REFERENCE: Readonly<Dimensions> = Object.freeze({ width: 430, height: 932 });

/** Reference design size for watch-class displays. */
export const WEARABLE_REFERENCE: Readonly<Dimensions> = Object.freeze({ width: 205, height: 251 });

export const WIDGET_PRESETS: Readonly<Record<WidgetPreset, Readonly<Dimensions>>> = Object.freeze({
  small:  Object.freeze({ width: 170, height: 170 }),
  medium: Object.freeze({ width: 364, height: 170 }),
  large:  Object.freeze({ width: 364, height: 382 }),
});

export function resolvePreset(preset: WidgetPreset): Readonly<Dimensions> {
  return WIDGET_PRESETS[preset];
}

export function referenceForFormFactor(formFactor: FormFactor): Readonly<Dimensions> {
  switch (formFactor) {
    case 'wearable':
      return WEARABLE_REFERENCE;
    case 'standard':
      return STANDARD_REFERENCE;
  }
}
