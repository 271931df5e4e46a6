// ============================================================================
// Telemetry input
// ============================================================================

/** Raw record as handed over by the acquisition layer (one per car per tick) */
export type RawTelemetryRecord = Record<string, unknown>;

/** Who is driving a car, as reported by the simulator's control field */
export type ControlType = 'nobody' | 'local' | 'ai' | 'remote' | 'replay';

/**
 * Typed view of one raw record. Every field the source failed to provide
 * (or provided in a form that does not parse) is null.
 */
export interface TelemetrySample {
  lap: number;
  lapDistance: number | null;
  lapTime: number | null;
  lastLapTime: number | null;   // Time of the previously completed lap
  speed: number | null;         // km/h
  engineRevs: number | null;
  throttle: number | null;      // fraction or percent, see normalizer
  brake: number | null;
  steer: number | null;
  gear: number | null;
  positionX: number | null;
  positionY: number | null;
  positionZ: number | null;

  sector: number | null;                  // Explicit sector, usually 1-based
  sectorSplits: number[] | null;          // Cumulative split per sector, 0 until completed
  sectorBoundaries: number[] | null;      // Sector end distances, if the source knows them
  trackLength: number | null;

  // Identity
  driverName: string | null;
  playerName: string | null;
  trackName: string | null;
  carName: string | null;       // Team entry name, e.g. "Action Express Racing #311:LM"
  carModel: string | null;
  teamName: string | null;
  manufacturer: string | null;
  carClass: string | null;
  sessionType: string | null;
  control: ControlType;
  position: number | null;
}

// ============================================================================
// Normalized samples and laps
// ============================================================================

export interface NormalizedSample {
  lap: number;
  lapDistance: number;   // m
  lapTime: number;       // s
  sector: number;        // zero-based
  speed: number;         // km/h
  engineRevs: number;    // rpm
  throttle: number;      // 0..100
  brake: number;         // 0..100
  steer: number;         // -100..100
  gear: number;
  x: number | null;
  y: number | null;
  z: number | null;
  sectorSplits: number[];
}

export type StopReason = 'lap_distance_reset' | 'idle_timeout';

/** Summary derived purely from a lap buffer */
export interface BufferSummary {
  lap: number;
  lapTime: number;
  samplesCount: number;
  lapDistance: number;
}

export interface LapSummary extends BufferSummary {
  lapCompleted: boolean;
  stopReason: StopReason | null;
}

export interface SectorLayout {
  boundaries: number[];
  count: number;
}

export interface OpponentLapRecord {
  driverName: string;
  lapNumber: number;
  lapTime: number;
  samples: NormalizedSample[];
  isFastest: boolean;
  position: number | null;
  carName: string | null;
  carModel: string | null;
  teamName: string | null;
  manufacturer: string | null;
  carClass: string | null;
}

// ============================================================================
// Session / orchestration
// ============================================================================

export type SessionState = 'idle' | 'detected' | 'logging' | 'paused' | 'error';

/** Identity of the local player's session, captured from the latest samples */
export interface SessionInfo {
  sessionId: string | null;
  playerName: string | null;
  trackName: string | null;
  carName: string | null;
  sessionType: string | null;
  trackLength: number;
}

export type LapEvent =
  | {
      kind: 'player';
      samples: NormalizedSample[];
      summary: LapSummary;
      sectors: SectorLayout;
      session: SessionInfo;
    }
  | {
      kind: 'opponent';
      record: OpponentLapRecord;
      sectors: SectorLayout;
      session: SessionInfo;
    };

export interface TickStatus {
  state: SessionState;
  processDetected: boolean;
  telemetryAvailable: boolean;
  lap: number;
  samplesBuffered: number;
  lapCompleted: boolean;
  sessionStopped: boolean;
  stopReason: StopReason | null;
  suspended: boolean;
  paused: boolean;
  opponentsTracked: number;
  sessionId: string | null;
  error: string | null;
}

// ============================================================================
// Vehicle metadata (simulator REST API)
// ============================================================================

export interface VehicleMetadata {
  carModel: string;
  manufacturer: string;
  team: string;
  vehicleClass: string;
  fullPathTree: string;
}
