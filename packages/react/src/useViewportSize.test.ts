/**
 * subscribeViewport — Pure Logic Tests
 *
 * Drives the resize subscription behind useViewportSize against a stubbed
 * window, without rendering React.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import type { Dimensions } from '@adaptive-scale/core';
import { subscribeViewport } from './useViewportSize';

type Listener = () => void;

function stubWindow(width: number, height: number) {
  const listeners = new Map<string, Listener[]>();
  const fakeWindow = {
    innerWidth: width,
    innerHeight: height,
    addEventListener: vi.fn((type: string, listener: Listener) => {
      listeners.set(type, [...(listeners.get(type) ?? []), listener]);
    }),
    removeEventListener: vi.fn((type: string, listener: Listener) => {
      listeners.set(type, (listeners.get(type) ?? []).filter((l) => l !== listener));
    }),
  };
  vi.stubGlobal('window', fakeWindow);

  const resize = (nextWidth: number, nextHeight: number) => {
    fakeWindow.innerWidth = nextWidth;
    fakeWindow.innerHeight = nextHeight;
    for (const listener of listeners.get('resize') ?? []) {
      listener();
    }
  };

  return { fakeWindow, listeners, resize };
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('subscribeViewport', () => {
  it('reports the current size immediately', () => {
    stubWindow(800, 600);
    const sizes: Dimensions[] = [];

    subscribeViewport((size) => sizes.push(size));

    expect(sizes).toEqual([{ width: 800, height: 600 }]);
  });

  it('reports the new size on resize', () => {
    const { resize } = stubWindow(800, 600);
    const onChange = vi.fn();

    subscribeViewport(onChange);
    resize(1024, 768);

    expect(onChange).toHaveBeenCalledTimes(2);
    expect(onChange).toHaveBeenLastCalledWith({ width: 1024, height: 768 });
  });

  it('removes the resize listener on cleanup', () => {
    const { fakeWindow, listeners, resize } = stubWindow(800, 600);
    const onChange = vi.fn();

    const cleanup = subscribeViewport(onChange);
    const [listener] = listeners.get('resize') ?? [];
    cleanup();
    resize(1024, 768);

    expect(fakeWindow.removeEventListener).toHaveBeenCalledWith('resize', listener);
    expect(listeners.get('resize')).toEqual([]);
    expect(onChange).toHaveBeenCalledTimes(1);
  });

  it('subscribes to nothing outside a browser', () => {
    const onChange = vi.fn();

    const cleanup = subscribeViewport(onChange);
    cleanup();

    expect(onChange).not.toHaveBeenCalled();
  });
});
