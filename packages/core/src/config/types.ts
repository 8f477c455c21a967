/**
 * Scaling Configuration Types
 *
 * A configuration pairs the extent of the display being rendered to
 * (`current`) with the extent the design was authored against
 * (`reference`). Every scaled value is `value * current[axis] / reference[axis]`.
 */

/** Which dimension pair a scaling call uses as its ratio. */
export type Axis = 'width' | 'height';

export interface Dimensions {
  width: number;
  height: number;
}

/**
 * Immutable snapshot of the scaling inputs.
 * Snapshots are frozen; updates replace the whole object.
 */
export interface ScalingConfiguration {
  /** Extent of the active display, in logical pixels */
  readonly current: Readonly<Dimensions>;
  /** Extent the fixed design measurements were authored against */
  readonly reference: Readonly<Dimensions>;
}

/** Named fixed-size containers used as a reference frame (e.g. embedded widgets). */
export type WidgetPreset = 'small' | 'medium' | 'large';

/** Selects the built-in default reference size. */
export type FormFactor = 'standard' | 'wearable';

export interface InitializeOptions {
  /** Override for the detected display width */
  currentWidth?: number;
  /** Override for the detected display height */
  currentHeight?: number;
  /** Reference width; defaults to the form factor's reference */
  referenceWidth?: number;
  /** Reference height; defaults to the form factor's reference */
  referenceHeight?: number;
  /** Form factor whose reference size fills in missing reference dimensions */
  formFactor?: FormFactor;
}

/**
 * Host display query. Returns null when no display is available
 * (e.g. server-side rendering).
 */
export type DisplayDetector = () => Dimensions | null;
