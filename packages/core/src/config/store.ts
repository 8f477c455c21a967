/**
 * Process-wide scaling configuration.
 *
 * The active snapshot is detected lazily on first read and replaced as a
 * whole by initialize(). Readers always see a complete current/reference
 * pair; they never see a partially applied update.
 */

import { InvalidConfigurationError } from '../errors';
import { scaleDebug } from '../debug';
import { STANDARD_REFERENCE, referenceForFormFactor, resolvePreset } from './presets';
import type {
  Dimensions,
  DisplayDetector,
  InitializeOptions,
  ScalingConfiguration,
  WidgetPreset,
} from './types';

// In-memory snapshot, null until first read
let activeConfiguration: ScalingConfiguration | null = null;

/**
 * Default display query: the browser viewport when there is one.
 */
export function detectHostDisplay(): Dimensions | null {
  if (typeof window === 'undefined') {
    return null;
  }
  return { width: window.innerWidth, height: window.innerHeight };
}

let displayDetector: DisplayDetector = detectHostDisplay;

function assertDimension(field: string, value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new InvalidConfigurationError(
      `${field} must be a finite number greater than 0, got ${value}`,
      field,
      value
    );
  }
}

/**
 * Validate and freeze an explicit configuration.
 */
export function createConfiguration(
  current: Dimensions,
  reference: Dimensions
): ScalingConfiguration {
  assertDimension('currentWidth', current.width);
  assertDimension('currentHeight', current.height);
  assertDimension('referenceWidth', reference.width);
  assertDimension('referenceHeight', reference.height);

  return Object.freeze({
    current: Object.freeze({ width: current.width, height: current.height }),
    reference: Object.freeze({ width: reference.width, height: reference.height }),
  });
}

/**
 * Query the display detector, falling back to the reference size
 */
function detectCurrentDisplay(fallback: Readonly<Dimensions>): Dimensions {
  let detected: Dimensions | null;
  try {
    detected = displayDetector();
  } catch (error) {
    console.warn('[AdaptiveScale] Display detection failed, using reference size:', error);
    return { ...fallback };
  }

  if (!detected) {
    scaleDebug('no display detected, using reference size', fallback);
    return { ...fallback };
  }

  const { width, height } = detected;
  if (!Number.isFinite(width) || width <= 0 || !Number.isFinite(height) || height <= 0) {
    console.warn(
      `[AdaptiveScale] Detected display size ${width}x${height} is not usable, using reference size`
    );
    return { ...fallback };
  }

  return { width, height };
}

/**
 * Get the active configuration, detecting the display on first access
 */
export function getConfiguration(): ScalingConfiguration {
  if (activeConfiguration) {
    return activeConfiguration;
  }

  activeConfiguration = createConfiguration(
    detectCurrentDisplay(STANDARD_REFERENCE),
    STANDARD_REFERENCE
  );
  scaleDebug('detected default configuration', activeConfiguration);
  return activeConfiguration;
}

/**
 * Replace the active configuration.
 *
 * Each dimension left out keeps its previous value. Passing a form factor
 * resets the reference to that form factor's size, except for reference
 * dimensions given explicitly. The display is only detected when a
 * previous value is actually needed. Throws InvalidConfigurationError for
 * non-positive dimensions, in which case the previous snapshot stays active.
 */
export function initialize(options: InitializeOptions = {}): ScalingConfiguration {
  const { currentWidth, currentHeight, formFactor } = options;
  const defaults = formFactor ? referenceForFormFactor(formFactor) : undefined;
  const referenceWidth = options.referenceWidth ?? defaults?.width;
  const referenceHeight = options.referenceHeight ?? defaults?.height;

  const needsPrevious =
    currentWidth === undefined ||
    currentHeight === undefined ||
    referenceWidth === undefined ||
    referenceHeight === undefined;
  const previous = needsPrevious ? getConfiguration() : null;

  const next = createConfiguration(
    {
      width: currentWidth ?? previous?.current.width ?? STANDARD_REFERENCE.width,
      height: currentHeight ?? previous?.current.height ?? STANDARD_REFERENCE.height,
    },
    {
      width: referenceWidth ?? previous?.reference.width ?? STANDARD_REFERENCE.width,
      height: referenceHeight ?? previous?.reference.height ?? STANDARD_REFERENCE.height,
    }
  );

  activeConfiguration = next;
  scaleDebug('initialized', next);
  return next;
}

/**
 * Initialize against a fixed-size widget container instead of a full display
 */
export function initializeForPreset(
  currentWidth: number,
  currentHeight: number,
  preset: WidgetPreset
): ScalingConfiguration {
  const reference = resolvePreset(preset);
  return initialize({
    currentWidth,
    currentHeight,
    referenceWidth: reference.width,
    referenceHeight: reference.height,
  });
}

/**
 * Drop the active configuration; the next read detects the display again
 */
export function resetConfiguration(): void {
  activeConfiguration = null;
}

/**
 * Install the host display query used for the lazily detected default.
 * Takes effect at the next detection (first read, or after a reset).
 */
export function setDisplayDetector(detector: DisplayDetector): void {
  displayDetector = detector;
}
