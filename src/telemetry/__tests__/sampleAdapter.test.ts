import { describe, it, expect } from 'vitest';
import { IngestAdapter, createSampleAdapter, detectSchema, toNumber } from '../sampleAdapter';

describe('toNumber', () => {
  it('accepts finite numbers and numeric strings', () => {
    expect(toNumber(12.5)).toBe(12.5);
    expect(toNumber('  42 ')).toBe(42);
  });

  it('rejects everything else', () => {
    expect(toNumber('')).toBeNull();
    expect(toNumber('fast')).toBeNull();
    expect(toNumber(Number.NaN)).toBeNull();
    expect(toNumber(Infinity)).toBeNull();
    expect(toNumber(true)).toBeNull();
    expect(toNumber(undefined)).toBeNull();
  });
});

describe('detectSchema', () => {
  it('recognises channel exports by their distance header', () => {
    expect(detectSchema({ 'LapDistance [m]': 10 })).toBe('channel-export');
    expect(detectSchema({ lap_distance: 10 })).toBe('shared-memory');
    expect(detectSchema({})).toBe('shared-memory');
  });
});

describe('shared-memory adapter', () => {
  const adapt = createSampleAdapter('shared-memory');

  it('maps snake_case keys onto a typed sample', () => {
    const sample = adapt({
      lap: 3,
      lap_distance: 120.5,
      lap_time: '12.5',
      speed: 150,
      rpm: 7000,
      throttle: 0.8,
      steering: -0.1,
      gear: 4,
      sector: 2,
      sector1_time: 30.1,
      sector_boundaries: [1000, 2000, 3000],
      track_name: 'Spa',
      driver_name: 'Remote A',
      control: 2,
      position: 3.4,
    });

    expect(sample.lap).toBe(3);
    expect(sample.lapDistance).toBe(120.5);
    expect(sample.lapTime).toBe(12.5);
    expect(sample.speed).toBe(150);
    expect(sample.engineRevs).toBe(7000);
    expect(sample.throttle).toBe(0.8);
    expect(sample.steer).toBe(-0.1);
    expect(sample.gear).toBe(4);
    expect(sample.sector).toBe(2);
    expect(sample.sectorSplits).toEqual([30.1]);
    expect(sample.sectorBoundaries).toEqual([1000, 2000, 3000]);
    expect(sample.trackName).toBe('Spa');
    expect(sample.driverName).toBe('Remote A');
    expect(sample.control).toBe('remote');
    expect(sample.position).toBe(3);
    expect(sample.brake).toBeNull();
    expect(sample.lastLapTime).toBeNull();
  });

  it('stops reading splits at the first missing one', () => {
    expect(adapt({ sector1_time: 30, sector3_time: 90 }).sectorSplits).toEqual([30]);
    expect(adapt({ sector2_time: 60 }).sectorSplits).toBeNull();
  });

  it('drops boundary lists with invalid entries', () => {
    expect(adapt({ sector_boundaries: [1000, 'x'] }).sectorBoundaries).toBeNull();
    expect(adapt({ sector_boundaries: 'none' }).sectorBoundaries).toBeNull();
  });

  it('defaults the lap to 0 and the control to nobody', () => {
    const sample = adapt({ lap: 'abc' });
    expect(sample.lap).toBe(0);
    expect(sample.control).toBe('nobody');
    expect(adapt({ control: 7 }).control).toBe('nobody');
    expect(adapt({ control: 0 }).control).toBe('local');
    expect(adapt({ control: 1 }).control).toBe('ai');
  });

  it('treats empty text as missing', () => {
    expect(adapt({ player_name: '' }).playerName).toBeNull();
    expect(adapt({ car_name: 911 }).carName).toBe('911');
  });
});

describe('channel-export adapter', () => {
  it('maps channel headers onto a typed sample', () => {
    const sample = createSampleAdapter('channel-export')({
      'Lap [int]': 2,
      'LapDistance [m]': 500,
      'Speed [km/h]': 99,
      'ThrottlePercentage [%]': 85,
      'Sector1Time [s]': 31,
      'Sector2Time [s]': 64,
      'TrackLen [m]': 5400,
      Driver: 'Remote B',
      Event: 'Race',
      'Control [int]': 2,
    });

    expect(sample.lap).toBe(2);
    expect(sample.lapDistance).toBe(500);
    expect(sample.speed).toBe(99);
    expect(sample.throttle).toBe(85);
    expect(sample.sectorSplits).toEqual([31, 64]);
    expect(sample.trackLength).toBe(5400);
    expect(sample.driverName).toBe('Remote B');
    expect(sample.sessionType).toBe('Race');
    expect(sample.control).toBe('remote');
  });
});

describe('IngestAdapter', () => {
  it('locks onto the schema of the first record', () => {
    const ingest = new IngestAdapter();
    expect(ingest.getSchema()).toBeNull();

    expect(ingest.adapt({ lap_distance: 10 }).lapDistance).toBe(10);
    expect(ingest.getSchema()).toBe('shared-memory');

    // Channel keys are not read once locked to shared memory
    expect(ingest.adapt({ 'LapDistance [m]': 20 }).lapDistance).toBeNull();
  });

  it('detects again after reset', () => {
    const ingest = new IngestAdapter();
    ingest.adapt({ lap_distance: 10 });
    ingest.reset();

    expect(ingest.getSchema()).toBeNull();
    expect(ingest.adapt({ 'LapDistance [m]': 20 }).lapDistance).toBe(20);
    expect(ingest.getSchema()).toBe('channel-export');
  });
});
