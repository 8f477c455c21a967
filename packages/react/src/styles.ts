/**
 * Adaptive style helpers
 *
 * Plug scaled design measurements into React inline styles. Each helper
 * scales along the height axis of the process-wide configuration unless an
 * axis or an explicit configuration is given.
 */

import type { CSSProperties } from 'react';
import { scale } from '@adaptive-scale/core';
import type { Axis, ScalingConfiguration } from '@adaptive-scale/core';

export interface AdaptiveOptions {
  /** Axis whose ratio scales the value (default: height) */
  axis?: Axis;
  /** Explicit configuration; the process-wide one is used when omitted */
  configuration?: ScalingConfiguration;
}

export type PaddingEdge = 'all' | 'horizontal' | 'vertical' | 'top' | 'right' | 'bottom' | 'left';

type Side = 'top' | 'right' | 'bottom' | 'left';

const EDGE_SIDES: Record<PaddingEdge, Side[]> = {
  all: ['top', 'right', 'bottom', 'left'],
  horizontal: ['right', 'left'],
  vertical: ['top', 'bottom'],
  top: ['top'],
  right: ['right'],
  bottom: ['bottom'],
  left: ['left'],
};

const PADDING_PROPERTY = {
  top: 'paddingTop',
  right: 'paddingRight',
  bottom: 'paddingBottom',
  left: 'paddingLeft',
} as const satisfies Record<Side, keyof CSSProperties>;

export type FrameAlignment =
  | 'center'
  | 'leading'
  | 'trailing'
  | 'top'
  | 'bottom'
  | 'topLeading'
  | 'topTrailing'
  | 'bottomLeading'
  | 'bottomTrailing';

// [justifyContent, alignItems] for a row flex container
const ALIGNMENT_FLEX: Record<FrameAlignment, [string, string]> = {
  center:         ['center', 'center'],
  leading:        ['flex-start', 'center'],
  trailing:       ['flex-end', 'center'],
  top:            ['center', 'flex-start'],
  bottom:         ['center', 'flex-end'],
  topLeading:     ['flex-start', 'flex-start'],
  topTrailing:    ['flex-end', 'flex-start'],
  bottomLeading:  ['flex-start', 'flex-end'],
  bottomTrailing: ['flex-end', 'flex-end'],
};

const FRAME_PROPERTIES = ['width', 'height', 'minWidth', 'maxWidth', 'minHeight', 'maxHeight'] as const;

type FrameProperty = (typeof FRAME_PROPERTIES)[number];

export interface AdaptiveFrame {
  width?: number;
  height?: number;
  minWidth?: number;
  /** Used as the width when no fixed width is given */
  idealWidth?: number;
  maxWidth?: number;
  minHeight?: number;
  /** Used as the height when no fixed height is given */
  idealHeight?: number;
  maxHeight?: number;
  /** Positions the content with flexbox when set */
  alignment?: FrameAlignment;
}

function scaled(value: number, options: AdaptiveOptions): number {
  return scale(options.axis ?? 'height', value, options.configuration);
}

export function adaptiveSpacing(value: number, options: AdaptiveOptions = {}): number {
  return scaled(value, options);
}

export const adaptiveHSpacing = adaptiveSpacing;
export const adaptiveVSpacing = adaptiveSpacing;

export function adaptiveFontSize(
  value: number,
  options: AdaptiveOptions & { fontFamily?: string } = {}
): CSSProperties {
  const style: CSSProperties = { fontSize: scaled(value, options) };
  if (options.fontFamily) {
    style.fontFamily = options.fontFamily;
  }
  return style;
}

export function adaptivePadding(
  value: number,
  edges: PaddingEdge | PaddingEdge[] = 'all',
  options: AdaptiveOptions = {}
): CSSProperties {
  const amount = scaled(value, options);
  const style: CSSProperties = {};
  for (const edge of Array.isArray(edges) ? edges : [edges]) {
    for (const side of EDGE_SIDES[edge]) {
      style[PADDING_PROPERTY[side]] = amount;
    }
  }
  return style;
}

/** Extra space between lines of text, on top of the font's own line box. */
export function adaptiveLineSpacing(value: number, options: AdaptiveOptions = {}): CSSProperties {
  return { lineHeight: `calc(1em + ${scaled(value, options)}px)` };
}

export function adaptiveFrame(frame: AdaptiveFrame, options: AdaptiveOptions = {}): CSSProperties {
  const dimensions: Record<FrameProperty, number | undefined> = {
    width: frame.width ?? frame.idealWidth,
    height: frame.height ?? frame.idealHeight,
    minWidth: frame.minWidth,
    maxWidth: frame.maxWidth,
    minHeight: frame.minHeight,
    maxHeight: frame.maxHeight,
  };

  const style: CSSProperties = {};
  for (const property of FRAME_PROPERTIES) {
    const value = dimensions[property];
    if (value !== undefined) {
      style[property] = scaled(value, options);
    }
  }

  if (frame.alignment) {
    const [justifyContent, alignItems] = ALIGNMENT_FLEX[frame.alignment];
    style.display = 'flex';
    style.justifyContent = justifyContent;
    style.alignItems = alignItems;
  }
  return style;
}
