import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { AdaptiveScaler, createScaler } from './AdaptiveScaler';
import {
  createConfiguration,
  detectHostDisplay,
  initialize,
  resetConfiguration,
  setDisplayDetector,
} from '../config/store';
import { InvalidConfigurationError } from '../errors';

beforeEach(() => {
  resetConfiguration();
  setDisplayDetector(() => null);
});

afterEach(() => {
  setDisplayDetector(detectHostDisplay);
  resetConfiguration();
});

describe('AdaptiveScaler', () => {
  it('scales against its bound configuration', () => {
    const scaler = createScaler(
      createConfiguration({ width: 182, height: 85 }, { width: 364, height: 170 })
    );

    expect(scaler.isBound).toBe(true);
    expect(scaler.forWidth(20)).toBe(10);
    expect(scaler.forHeight(34)).toBe(17);
    expect(scaler.scale('width', 20)).toBe(10);
  });

  it('follows the process-wide configuration when unbound', () => {
    const scaler = createScaler();
    expect(scaler.isBound).toBe(false);

    initialize({ currentWidth: 860, currentHeight: 1864 });
    expect(scaler.forHeight(24)).toBe(48);

    initialize({ currentWidth: 215, currentHeight: 466 });
    expect(scaler.forHeight(24)).toBe(12);
    expect(scaler.forWidth(16)).toBe(8);
  });

  it('updates the current size on resize', () => {
    const scaler = new AdaptiveScaler(
      createConfiguration({ width: 100, height: 100 }, { width: 100, height: 100 })
    );
    expect(scaler.forWidth(50)).toBe(50);

    scaler.resize(200, 300);

    expect(scaler.forWidth(50)).toBe(100);
    expect(scaler.forHeight(50)).toBe(150);
    expect(scaler.configuration.reference).toEqual({ width: 100, height: 100 });
  });

  it('binds to the process-wide reference on first resize', () => {
    initialize({ referenceWidth: 400, referenceHeight: 800 });
    const scaler = createScaler();

    scaler.resize(800, 1600);
    initialize({ currentWidth: 100, currentHeight: 100 });

    expect(scaler.isBound).toBe(true);
    expect(scaler.configuration.reference).toEqual({ width: 400, height: 800 });
    expect(scaler.forWidth(10)).toBe(20);
  });

  it('keeps independent scalers apart', () => {
    const reference = { width: 364, height: 382 };
    const small = createScaler(createConfiguration({ width: 182, height: 191 }, reference));
    const large = createScaler(createConfiguration({ width: 728, height: 764 }, reference));

    expect(small.forHeight(40)).toBe(20);
    expect(large.forHeight(40)).toBe(80);
  });

  it('rejects a non-positive size on resize', () => {
    const scaler = createScaler(
      createConfiguration({ width: 100, height: 100 }, { width: 100, height: 100 })
    );

    expect(() => scaler.resize(0, 100)).toThrow(InvalidConfigurationError);
    expect(scaler.forWidth(10)).toBe(10);
  });
});
