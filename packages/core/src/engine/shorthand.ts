import { scale } from './scale';

/** Height-based adaptive value over the process-wide configuration. */
export function h(value: number): number {
  return scale('height', value);
}

/** Width-based adaptive value over the process-wide configuration. */
export function w(value: number): number {
  return scale('width', value);
}
