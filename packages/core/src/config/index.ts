export type {
  Axis,
  Dimensions,
  DisplayDetector,
  FormFactor,
  InitializeOptions,
  ScalingConfiguration,
  WidgetPreset,
} from './types';

export {
  STANDARD_REFERENCE,
  WEARABLE_REFERENCE,
  WIDGET_PRESETS,
  resolvePreset,
  referenceForFormFactor,
} from './presets';

export {
  createConfiguration,
  detectHostDisplay,
  getConfiguration,
  initialize,
  initializeForPreset,
  resetConfiguration,
  setDisplayDetector,
} from './store';
