import type { NormalizedSample, TelemetrySample } from '../types';

// Inputs within these magnitudes are fractions/ratios rather than percentages
const PEDAL_FRACTION_LIMIT = 1.5;
const STEER_RATIO_LIMIT = 2.0;

// Sector count assumed when only the track length is known
const DEFAULT_SECTOR_COUNT = 3;

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

export function pedalPercent(value: number | null): number {
  if (value === null) return 0;
  const scaled = Math.abs(value) <= PEDAL_FRACTION_LIMIT ? value * 100 : value;
  return clamp(scaled, 0, 100);
}

export function steerPercent(value: number | null): number {
  if (value === null) return 0;
  const scaled = Math.abs(value) <= STEER_RATIO_LIMIT ? value * 100 : value;
  return clamp(scaled, -100, 100);
}

/**
 * Resolve the zero-based sector for a lap distance.
 *
 * Order: explicit sector (1-based values are decremented), boundary list,
 * equal thirds of the track length, 0.
 */
export function resolveSector(
  explicitSector: number | null,
  lapDistance: number,
  boundaries: readonly number[] | null,
  trackLength: number | null
): number {
  if (explicitSector !== null) {
    const sector = Math.trunc(explicitSector);
    return Math.max(0, sector > 0 ? sector - 1 : sector);
  }

  if (boundaries && boundaries.length > 0) {
    const index = boundaries.findIndex(boundary => boundary > lapDistance);
    return index === -1 ? boundaries.length - 1 : index;
  }

  if (trackLength !== null && trackLength > 0) {
    const progress = clamp(lapDistance / trackLength, 0, 0.9999);
    return Math.floor(progress * DEFAULT_SECTOR_COUNT);
  }

  return 0;
}

/**
 * Converts typed telemetry samples into the canonical export schema.
 * Never throws: anything missing becomes a typed default.
 */
export class SampleNormalizer {
  private sectorBoundaries: number[] | null = null;

  /** Boundary list used for samples that do not carry their own */
  setSectorBoundaries(boundaries: readonly number[]): void {
    this.sectorBoundaries = boundaries.length > 0 ? [...boundaries] : null;
  }

  clearSectorBoundaries(): void {
    this.sectorBoundaries = null;
  }

  getSectorBoundaries(): number[] | null {
    return this.sectorBoundaries ? [...this.sectorBoundaries] : null;
  }

  normalize(sample: TelemetrySample): NormalizedSample {
    const lapDistance = sample.lapDistance ?? 0;
    const boundaries = sample.sectorBoundaries ?? this.sectorBoundaries;

    return {
      lap: sample.lap,
      lapDistance,
      lapTime: sample.lapTime ?? 0,
      sector: resolveSector(sample.sector, lapDistance, boundaries, sample.trackLength),
      speed: sample.speed ?? 0,
      engineRevs: sample.engineRevs ?? 0,
      throttle: pedalPercent(sample.throttle),
      brake: pedalPercent(sample.brake),
      steer: steerPercent(sample.steer),
      gear: sample.gear === null ? 0 : Math.round(sample.gear),
      x: sample.positionX,
      y: sample.positionY,
      z: sample.positionZ,
      sectorSplits: sample.sectorSplits ? [...sample.sectorSplits] : [],
    };
  }
}
