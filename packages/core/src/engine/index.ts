export { scale, scaleWidth, scaleHeight, resized } from './scale';
export { AdaptiveScaler, createScaler } from './AdaptiveScaler';
export { h, w } from './shorthand';
