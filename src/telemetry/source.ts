import type { RawTelemetryRecord } from '../types';

/**
 * Acquisition layer seen from the logger.
 *
 * Any method may throw; the orchestrator turns read failures into its
 * error state.
 */
export interface TelemetrySource {
  /** Called once at the start of every tick, before any other method */
  beginTick(): void;

  /** Is the simulator process running */
  isProcessRunning(): boolean;

  /** Is telemetry (shared memory) readable right now */
  isAvailable(): boolean;

  /** Local player sample, or null when the source has nothing this tick */
  read(): RawTelemetryRecord | null;

  /** Samples of every other car currently visible */
  readOpponents(): RawTelemetryRecord[];
}
