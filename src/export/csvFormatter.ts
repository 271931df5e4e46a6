import type { NormalizedSample } from '../types';

// ============================================================================
// Lap CSV layout
// ============================================================================

export const LAP_CSV_HEADER = [
  'LapDistance [m]',
  'LapTime [s]',
  'Sector [int]',
  'Speed [km/h]',
  'EngineRevs [rpm]',
  'ThrottlePercentage [%]',
  'BrakePercentage [%]',
  'Steer [%]',
  'Gear [int]',
  'X [m]',
  'Y [m]',
  'Z [m]',
] as const;

// Preamble keys that always come first, in this order
export const METADATA_ORDER = [
  'Format',
  'Version',
  'Player',
  'TrackName',
  'CarModel',
  'CarClass',
  'Manufacturer',
  'TeamName',
  'CarName',
  'SessionUTC',
  'LapTime [s]',
  'TrackLen [m]',
];

/** Ordered key/value rows of the preamble */
export type LapMetadata = Map<string, string>;

type ColumnFormat = 'distance' | 'real' | 'int';

interface Column {
  format: ColumnFormat;
  value: (sample: NormalizedSample) => number | null;
}

const COLUMNS: Column[] = [
  { format: 'distance', value: s => s.lapDistance },
  { format: 'distance', value: s => s.lapTime },
  { format: 'int', value: s => s.sector },
  { format: 'real', value: s => s.speed },
  { format: 'real', value: s => s.engineRevs },
  { format: 'real', value: s => s.throttle },
  { format: 'real', value: s => s.brake },
  { format: 'real', value: s => s.steer },
  { format: 'int', value: s => s.gear },
  { format: 'real', value: s => s.x },
  { format: 'real', value: s => s.y },
  { format: 'real', value: s => s.z },
];

/**
 * Fixed-point formatting, halves rounded away from zero (2.345 -> "2.35")
 */
export function formatDecimal(value: number, decimals: number): string {
  if (!Number.isFinite(value)) return (0).toFixed(decimals);

  const factor = 10 ** decimals;
  const rounded = Math.round((Math.abs(value) + Number.EPSILON) * factor) / factor;
  const signed = value < 0 && rounded !== 0 ? -rounded : rounded;
  return signed.toFixed(decimals);
}

function formatCell(column: Column, sample: NormalizedSample): string {
  const value = column.value(sample);
  if (value === null) return '';

  switch (column.format) {
    case 'distance':
      return formatDecimal(value, 3);
    case 'real':
      return formatDecimal(value, 2);
    case 'int':
      return formatDecimal(value, 0);
  }
}

/**
 * Render a lap as CSV text: metadata preamble, blank line, header, then one
 * row per sample ordered by lap distance. An empty lap renders as ''.
 */
export function formatLapCsv(samples: readonly NormalizedSample[], metadata: LapMetadata): string {
  if (samples.length === 0) return '';

  const lines: string[] = [];

  for (const key of METADATA_ORDER) {
    const value = metadata.get(key);
    if (value !== undefined) {
      lines.push(`${key},${value}`);
    }
  }
  for (const [key, value] of metadata) {
    if (!METADATA_ORDER.includes(key)) {
      lines.push(`${key},${value}`);
    }
  }

  lines.push('');
  lines.push(LAP_CSV_HEADER.join(','));

  // Array.prototype.sort is stable, equal distances keep their order
  const ordered = [...samples].sort((a, b) => a.lapDistance - b.lapDistance);
  for (const sample of ordered) {
    lines.push(COLUMNS.map(column => formatCell(column, sample)).join(','));
  }

  return lines.join('\n') + '\n';
}
