import type { ControlType, RawTelemetryRecord, TelemetrySample } from '../types';

// ============================================================================
// Source schemas
// ============================================================================

/**
 * Known layouts of raw telemetry records:
 * - shared-memory: snake_case keys from the live shared memory reader
 * - channel-export: channel header keys ("LapDistance [m]") from exported captures
 */
export type SourceSchema = 'shared-memory' | 'channel-export';

type NumericField =
  | 'lap'
  | 'lapDistance'
  | 'lapTime'
  | 'lastLapTime'
  | 'speed'
  | 'engineRevs'
  | 'throttle'
  | 'brake'
  | 'steer'
  | 'gear'
  | 'positionX'
  | 'positionY'
  | 'positionZ'
  | 'sector'
  | 'trackLength'
  | 'control'
  | 'position';

type TextField =
  | 'driverName'
  | 'playerName'
  | 'trackName'
  | 'carName'
  | 'carModel'
  | 'teamName'
  | 'manufacturer'
  | 'carClass'
  | 'sessionType';

interface SchemaKeys {
  numeric: Record<NumericField, string>;
  text: Record<TextField, string>;
  sectorSplits: string[];
  sectorBoundaries: string;
}

const SCHEMA_KEYS: Record<SourceSchema, SchemaKeys> = {
  'shared-memory': {
    numeric: {
      lap: 'lap',
      lapDistance: 'lap_distance',
      lapTime: 'lap_time',
      lastLapTime: 'last_lap_time',
      speed: 'speed',
      engineRevs: 'rpm',
      throttle: 'throttle',
      brake: 'brake',
      steer: 'steering',
      gear: 'gear',
      positionX: 'position_x',
      positionY: 'position_y',
      positionZ: 'position_z',
      sector: 'sector',
      trackLength: 'track_length',
      control: 'control',
      position: 'position',
    },
    text: {
      driverName: 'driver_name',
      playerName: 'player_name',
      trackName: 'track_name',
      carName: 'car_name',
      carModel: 'car_model',
      teamName: 'team_name',
      manufacturer: 'manufacturer',
      carClass: 'car_class',
      sessionType: 'session_type',
    },
    sectorSplits: ['sector1_time', 'sector2_time', 'sector3_time'],
    sectorBoundaries: 'sector_boundaries',
  },
  'channel-export': {
    numeric: {
      lap: 'Lap [int]',
      lapDistance: 'LapDistance [m]',
      lapTime: 'LapTime [s]',
      lastLapTime: 'LastLapTime [s]',
      speed: 'Speed [km/h]',
      engineRevs: 'EngineRevs [rpm]',
      throttle: 'ThrottlePercentage [%]',
      brake: 'BrakePercentage [%]',
      steer: 'Steer [%]',
      gear: 'Gear [int]',
      positionX: 'X [m]',
      positionY: 'Y [m]',
      positionZ: 'Z [m]',
      sector: 'Sector [int]',
      trackLength: 'TrackLen [m]',
      control: 'Control [int]',
      position: 'Position [int]',
    },
    text: {
      driverName: 'Driver',
      playerName: 'Player',
      trackName: 'TrackName',
      carName: 'CarName',
      carModel: 'CarModel',
      teamName: 'TeamName',
      manufacturer: 'Manufacturer',
      carClass: 'CarClass',
      sessionType: 'Event',
    },
    sectorSplits: ['Sector1Time [s]', 'Sector2Time [s]', 'Sector3Time [s]'],
    sectorBoundaries: 'SectorBoundaries [m]',
  },
};

// Simulator control codes: -1 nobody, 0 local player, 1 AI, 2 remote, 3 replay
const CONTROL_CODES: Record<number, ControlType> = {
  [-1]: 'nobody',
  0: 'local',
  1: 'ai',
  2: 'remote',
  3: 'replay',
};

// ============================================================================
// Value coercion
// ============================================================================

export function toNumber(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value.trim());
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

function toText(value: unknown): string | null {
  if (typeof value === 'string') {
    return value.length > 0 ? value : null;
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }
  return null;
}

function toNumberList(value: unknown): number[] | null {
  if (!Array.isArray(value)) return null;

  const numbers: number[] = [];
  for (const item of value) {
    const n = toNumber(item);
    if (n === null) return null;
    numbers.push(n);
  }
  return numbers;
}

function toControl(value: number | null): ControlType {
  if (value === null) return 'nobody';
  return CONTROL_CODES[Math.round(value)] ?? 'nobody';
}

// ============================================================================
// Adapters
// ============================================================================

/**
 * Pick the schema of a record. Channel exports are recognised by their
 * distance header, everything else is treated as shared memory output.
 */
export function detectSchema(record: RawTelemetryRecord): SourceSchema {
  return 'LapDistance [m]' in record ? 'channel-export' : 'shared-memory';
}

export type SampleAdapter = (record: RawTelemetryRecord) => TelemetrySample;

export function createSampleAdapter(schema: SourceSchema): SampleAdapter {
  const keys = SCHEMA_KEYS[schema];

  return (record: RawTelemetryRecord): TelemetrySample => {
    const num = (field: NumericField): number | null => toNumber(record[keys.numeric[field]]);
    const text = (field: TextField): string | null => toText(record[keys.text[field]]);
    const int = (field: NumericField): number | null => {
      const n = num(field);
      return n === null ? null : Math.round(n);
    };

    const splits: number[] = [];
    for (const key of keys.sectorSplits) {
      const split = toNumber(record[key]);
      if (split === null) break;
      splits.push(split);
    }

    return {
      lap: int('lap') ?? 0,
      lapDistance: num('lapDistance'),
      lapTime: num('lapTime'),
      lastLapTime: num('lastLapTime'),
      speed: num('speed'),
      engineRevs: num('engineRevs'),
      throttle: num('throttle'),
      brake: num('brake'),
      steer: num('steer'),
      gear: num('gear'),
      positionX: num('positionX'),
      positionY: num('positionY'),
      positionZ: num('positionZ'),
      sector: num('sector'),
      sectorSplits: splits.length > 0 ? splits : null,
      sectorBoundaries: toNumberList(record[keys.sectorBoundaries]),
      trackLength: num('trackLength'),
      driverName: text('driverName'),
      playerName: text('playerName'),
      trackName: text('trackName'),
      carName: text('carName'),
      carModel: text('carModel'),
      teamName: text('teamName'),
      manufacturer: text('manufacturer'),
      carClass: text('carClass'),
      sessionType: text('sessionType'),
      control: toControl(num('control')),
      position: int('position'),
    };
  };
}

/**
 * Adapter that locks onto the schema of the first record it sees.
 * Call reset() when the source changes (new process, new capture).
 */
export class IngestAdapter {
  private schema: SourceSchema | null = null;
  private adapter: SampleAdapter | null = null;

  adapt(record: RawTelemetryRecord): TelemetrySample {
    if (!this.adapter) {
      this.schema = detectSchema(record);
      this.adapter = createSampleAdapter(this.schema);
    }
    return this.adapter(record);
  }

  getSchema(): SourceSchema | null {
    return this.schema;
  }

  reset(): void {
    this.schema = null;
    this.adapter = null;
  }
}
