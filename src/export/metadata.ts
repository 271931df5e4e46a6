import type { NormalizedSample, SectorLayout, VehicleMetadata } from '../types';
import { formatDecimal } from './csvFormatter';
import type { LapMetadata } from './csvFormatter';

export const CSV_FORMAT = 'LMUTelemetry v2';
export const CSV_FORMAT_VERSION = '1';

/** Everything known about the lap's owner and session when it is exported */
export interface LapMetadataInput {
  playerName?: string | null;
  trackName?: string | null;
  carName?: string | null;
  sessionType?: string | null;
  trackLength?: number | null;
  sessionUtc?: Date;
  sectors?: SectorLayout | null;
  vehicle?: VehicleMetadata | null;

  // Values reported by the telemetry itself win over the REST lookup
  carModel?: string | null;
  carClass?: string | null;
  manufacturer?: string | null;
  teamName?: string | null;
}

/** 2025-01-01T00:00:00Z */
export function formatSessionUtc(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

function maxOf(samples: readonly NormalizedSample[], pick: (s: NormalizedSample) => number): number {
  return samples.reduce((max, s) => Math.max(max, pick(s)), 0);
}

function firstText(...values: Array<string | null | undefined>): string | null {
  for (const value of values) {
    if (value) return value;
  }
  return null;
}

export function buildMetadataBlock(input: LapMetadataInput, samples: readonly NormalizedSample[]): LapMetadata {
  const metadata: LapMetadata = new Map();
  const vehicle = input.vehicle ?? null;

  metadata.set('Format', CSV_FORMAT);
  metadata.set('Version', CSV_FORMAT_VERSION);
  metadata.set('Player', input.playerName || 'Unknown Driver');
  metadata.set('TrackName', input.trackName || 'Unknown Track');

  const carModel = firstText(input.carModel, vehicle?.carModel);
  const carClass = firstText(input.carClass, vehicle?.vehicleClass);
  const manufacturer = firstText(input.manufacturer, vehicle?.manufacturer);
  const teamName = firstText(input.teamName, vehicle?.team);
  if (carModel) metadata.set('CarModel', carModel);
  if (carClass) metadata.set('CarClass', carClass);
  if (manufacturer) metadata.set('Manufacturer', manufacturer);
  if (teamName) metadata.set('TeamName', teamName);

  metadata.set('CarName', input.carName || 'Unknown Car');
  metadata.set('SessionUTC', formatSessionUtc(input.sessionUtc ?? new Date()));
  metadata.set('LapTime [s]', formatDecimal(maxOf(samples, s => s.lapTime), 3));

  const trackLength = input.trackLength && input.trackLength > 0
    ? input.trackLength
    : maxOf(samples, s => s.lapDistance);
  metadata.set('TrackLen [m]', formatDecimal(trackLength, 2));

  if (input.sessionType) {
    metadata.set('Event', input.sessionType);
  }

  const sectors = input.sectors;
  if (sectors && sectors.boundaries.length > 0) {
    metadata.set('SectorCount', String(sectors.count));
    metadata.set('SectorBoundaries [m]', sectors.boundaries.map(b => formatDecimal(b, 2)).join(';'));
  }

  return metadata;
}
