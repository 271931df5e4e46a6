import { describe, it, expect } from 'vitest';
import { SampleNormalizer, pedalPercent, resolveSector, steerPercent } from '../normalizer';
import { makeSample } from '../../__tests__/helpers';

describe('pedalPercent', () => {
  it('scales fractions to percent', () => {
    expect(pedalPercent(0.5)).toBe(50);
    expect(pedalPercent(1)).toBe(100);
  });

  it('keeps percentages and clamps to 0..100', () => {
    expect(pedalPercent(80)).toBe(80);
    expect(pedalPercent(120)).toBe(100);
    expect(pedalPercent(1.5)).toBe(100);
    expect(pedalPercent(-0.2)).toBe(0);
  });

  it('treats missing values as 0', () => {
    expect(pedalPercent(null)).toBe(0);
  });
});

describe('steerPercent', () => {
  it('scales ratios to percent', () => {
    expect(steerPercent(-0.25)).toBe(-25);
    expect(steerPercent(2)).toBe(100);
  });

  it('keeps percentages and clamps to -100..100', () => {
    expect(steerPercent(-50)).toBe(-50);
    expect(steerPercent(150)).toBe(100);
    expect(steerPercent(-300)).toBe(-100);
    expect(steerPercent(null)).toBe(0);
  });
});

describe('resolveSector', () => {
  it('converts explicit one-based sectors', () => {
    expect(resolveSector(2, 0, null, null)).toBe(1);
    expect(resolveSector(1, 0, null, null)).toBe(0);
    expect(resolveSector(0, 0, null, null)).toBe(0);
    expect(resolveSector(-1, 0, null, null)).toBe(0);
    expect(resolveSector(3.7, 0, null, null)).toBe(2);
  });

  it('prefers an explicit sector over boundaries', () => {
    expect(resolveSector(1, 2500, [1000, 2000, 3000], 3000)).toBe(0);
  });

  it('uses the first boundary beyond the distance', () => {
    const boundaries = [1000, 2000, 3000];
    expect(resolveSector(null, 999, boundaries, null)).toBe(0);
    expect(resolveSector(null, 1000, boundaries, null)).toBe(1);
    expect(resolveSector(null, 1500, boundaries, null)).toBe(1);
    expect(resolveSector(null, 3500, boundaries, null)).toBe(2);
  });

  it('splits the track length in thirds', () => {
    expect(resolveSector(null, 1500, null, 3000)).toBe(1);
    expect(resolveSector(null, 2999, null, 3000)).toBe(2);
    expect(resolveSector(null, 5000, null, 3000)).toBe(2);
    expect(resolveSector(null, -10, null, 3000)).toBe(0);
  });

  it('falls back to 0', () => {
    expect(resolveSector(null, 1500, [], 0)).toBe(0);
  });
});

describe('SampleNormalizer', () => {
  it('fills defaults for missing values', () => {
    const normalized = new SampleNormalizer().normalize(makeSample({
      lap: 2,
      lapDistance: null,
      lapTime: null,
      speed: null,
      engineRevs: null,
      throttle: null,
      gear: null,
    }));

    expect(normalized).toEqual({
      lap: 2,
      lapDistance: 0,
      lapTime: 0,
      sector: 0,
      speed: 0,
      engineRevs: 0,
      throttle: 0,
      brake: 0,
      steer: 0,
      gear: 0,
      x: null,
      y: null,
      z: null,
      sectorSplits: [],
    });
  });

  it('normalizes inputs and rounds the gear', () => {
    const normalized = new SampleNormalizer().normalize(makeSample({
      lapDistance: 1500,
      throttle: 0.75,
      brake: 0.1,
      steer: -0.5,
      gear: 3.6,
      positionX: 12,
      sectorSplits: [31.2],
      trackLength: 3000,
    }));

    expect(normalized.throttle).toBe(75);
    expect(normalized.brake).toBe(10);
    expect(normalized.steer).toBe(-50);
    expect(normalized.gear).toBe(4);
    expect(normalized.x).toBe(12);
    expect(normalized.sector).toBe(1);
    expect(normalized.sectorSplits).toEqual([31.2]);
  });

  it('uses configured boundaries unless the sample carries its own', () => {
    const normalizer = new SampleNormalizer();
    normalizer.setSectorBoundaries([500, 1000, 3000]);

    expect(normalizer.normalize(makeSample({ lapDistance: 700 })).sector).toBe(1);
    expect(normalizer.normalize(makeSample({ lapDistance: 700, sectorBoundaries: [800, 1600] })).sector).toBe(0);

    normalizer.clearSectorBoundaries();
    expect(normalizer.normalize(makeSample({ lapDistance: 700 })).sector).toBe(0);
  });

  it('copies boundary lists in and out', () => {
    const normalizer = new SampleNormalizer();
    const boundaries = [500, 1000];
    normalizer.setSectorBoundaries(boundaries);
    boundaries.push(3000);

    const stored = normalizer.getSectorBoundaries();
    expect(stored).toEqual([500, 1000]);

    normalizer.setSectorBoundaries([]);
    expect(normalizer.getSectorBoundaries()).toBeNull();
  });

  it('does not share the split array with the input', () => {
    const splits = [30];
    const normalized = new SampleNormalizer().normalize(makeSample({ sectorSplits: splits }));
    splits.push(60);

    expect(normalized.sectorSplits).toEqual([30]);
  });
});
