import type { NormalizedSample, TelemetrySample } from '../types';

export function makeSample(overrides: Partial<TelemetrySample> = {}): TelemetrySample {
  return {
    lap: 1,
    lapDistance: 0,
    lapTime: 0,
    lastLapTime: null,
    speed: 100,
    engineRevs: 6000,
    throttle: 1,
    brake: 0,
    steer: 0,
    gear: 3,
    positionX: null,
    positionY: null,
    positionZ: null,
    sector: null,
    sectorSplits: null,
    sectorBoundaries: null,
    trackLength: null,
    driverName: null,
    playerName: null,
    trackName: null,
    carName: null,
    carModel: null,
    teamName: null,
    manufacturer: null,
    carClass: null,
    sessionType: null,
    control: 'local',
    position: null,
    ...overrides,
  };
}

export function makeNormalized(overrides: Partial<NormalizedSample> = {}): NormalizedSample {
  return {
    lap: 1,
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
    ...overrides,
  };
}
