import type {
  BufferSummary,
  NormalizedSample,
  StopReason,
  TelemetrySample,
} from '../types';
import { SampleNormalizer } from '../telemetry/normalizer';

// ============================================================================
// Configuration
// ============================================================================

export interface SessionManagerOptions {
  normalizer?: SampleNormalizer;
  idleTimeout?: number;          // seconds, <= 0 disables idle detection
  minSpeedKmh?: number;
  lapResetTolerance?: number;    // metres
}

export interface SessionEvents {
  lapCompleted: boolean;
  stopReason: StopReason | null;
}

// The source under-reports lap time at lap boundary instants by about this much
const LAP_TIME_SLACK = 0.02;

// Minimum distance gain that counts as forward progress (m)
const PROGRESS_EPSILON = 0.1;

let sessionIdSequence = 0;

function pad(value: number, length: number = 2): string {
  return value.toString().padStart(length, '0');
}

// ============================================================================
// Session Manager
// ============================================================================

/**
 * Owns the local driver's lap buffer.
 *
 * Detects lap changes and stop conditions, reconstructs a monotonic lap
 * time and drops frames the source re-emits unchanged.
 */
export class SessionManager {
  readonly normalizer: SampleNormalizer;
  readonly idleTimeout: number;
  readonly minSpeedKmh: number;
  readonly lapResetTolerance: number;

  currentLap = 0;
  currentSessionId: string | null = null;
  lastLapDistance: number | null = null;

  private lapSamples: NormalizedSample[] = [];
  private lastProgressTime: number | null = null;
  private lapStartTime: number | null = null;
  private trackLength = 0;
  private lastAssignedLapTime = 0;
  // Last buffered record as normalized, before its lap time was reconstructed
  private lastReported: string | null = null;

  constructor(options: SessionManagerOptions = {}) {
    this.normalizer = options.normalizer ?? new SampleNormalizer();
    this.idleTimeout = Math.max(0, options.idleTimeout ?? 5.0);
    this.minSpeedKmh = Math.max(0, options.minSpeedKmh ?? 1.0);
    this.lapResetTolerance = Math.max(0, options.lapResetTolerance ?? 5.0);
  }

  /**
   * Feed one sample of the local driver.
   * Reports a completed lap and/or a stop condition.
   */
  update(sample: TelemetrySample, timestamp?: number): SessionEvents {
    const newLap = sample.lap;
    const lapAdvanced = newLap > this.currentLap;
    const lapCompleted = lapAdvanced && this.currentLap > 0;

    if (newLap !== this.currentLap || this.lapStartTime === null) {
      this.lapStartTime = timestamp ?? null;
    }
    this.currentLap = newLap;

    const observedLength = Math.max(sample.trackLength ?? 0, sample.lapDistance ?? 0);
    if (observedLength > this.trackLength) {
      this.trackLength = observedLength;
    }

    return {
      lapCompleted,
      stopReason: this.detectStopConditions(sample, timestamp, lapAdvanced),
    };
  }

  /**
   * Normalize and buffer a sample.
   * Returns false when the normalized record repeats the last buffered one.
   * Records are compared as reported, so a frame re-emitted later is still a repeat.
   */
  addSample(sample: TelemetrySample, timestamp?: number): boolean {
    const normalized = this.normalizer.normalize(sample);
    const reported = JSON.stringify(normalized);
    if (reported === this.lastReported) {
      return false;
    }

    const last: NormalizedSample | undefined = this.lapSamples[this.lapSamples.length - 1];
    const sameLap = last !== undefined && last.lap === normalized.lap;
    normalized.lapTime = this.reconstructLapTime(normalized.lapTime, timestamp, sameLap);

    this.lapSamples.push(normalized);
    this.lastAssignedLapTime = normalized.lapTime;
    this.lastReported = reported;
    return true;
  }

  getLapData(): NormalizedSample[] {
    return this.lapSamples.map(sample => ({ ...sample, sectorSplits: [...sample.sectorSplits] }));
  }

  getSampleCount(): number {
    return this.lapSamples.length;
  }

  /**
   * Summary of the buffered lap, built from buffer contents only
   */
  getLapSummary(): BufferSummary | null {
    if (this.lapSamples.length === 0) {
      return null;
    }

    const lastSample = this.lapSamples[this.lapSamples.length - 1];

    return {
      lap: lastSample.lap,
      lapTime: lastSample.lapTime,
      samplesCount: this.lapSamples.length,
      lapDistance: lastSample.lapDistance,
    };
  }

  clearLapBuffer(): void {
    this.lapSamples = [];
    this.lastAssignedLapTime = 0;
    this.lastReported = null;
  }

  getTrackLength(): number {
    return this.trackLength;
  }

  /**
   * Generate a unique, timestamp based session ID (YYYYMMDDHHmmssSSS + sequence)
   */
  generateSessionId(): string {
    const now = new Date();
    sessionIdSequence = (sessionIdSequence + 1) % 1000;

    return (
      now.getFullYear().toString() +
      pad(now.getMonth() + 1) +
      pad(now.getDate()) +
      pad(now.getHours()) +
      pad(now.getMinutes()) +
      pad(now.getSeconds()) +
      pad(now.getMilliseconds(), 3) +
      pad(sessionIdSequence, 3)
    );
  }

  /**
   * Forget everything about the current track and lap
   */
  reset(): void {
    this.clearLapBuffer();
    this.currentLap = 0;
    this.currentSessionId = null;
    this.lastLapDistance = null;
    this.lastProgressTime = null;
    this.lapStartTime = null;
    this.trackLength = 0;
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private reconstructLapTime(reported: number, timestamp: number | undefined, sameLap: boolean): number {
    let lapTime = reported;

    if (timestamp !== undefined && this.lapStartTime !== null) {
      const elapsed = timestamp - this.lapStartTime;
      lapTime = elapsed > reported + LAP_TIME_SLACK ? elapsed : Math.max(reported, elapsed);
    }

    // Never run backwards within a lap
    if (sameLap && lapTime < this.lastAssignedLapTime) {
      lapTime = this.lastAssignedLapTime;
    }

    return lapTime;
  }

  private detectStopConditions(
    sample: TelemetrySample,
    timestamp: number | undefined,
    lapAdvanced: boolean
  ): StopReason | null {
    const lapDistance = sample.lapDistance;
    const speed = sample.speed;
    let reason: StopReason | null = null;

    if (timestamp !== undefined && this.lastProgressTime === null) {
      this.lastProgressTime = timestamp;
    }

    // Abrupt backwards jump: teleport to the pits, session restart.
    // The wrap at the finish line comes with a new lap number and is expected.
    if (
      !lapAdvanced &&
      lapDistance !== null &&
      this.lastLapDistance !== null &&
      lapDistance + this.lapResetTolerance < this.lastLapDistance
    ) {
      reason = 'lap_distance_reset';
    }

    if (lapDistance !== null) {
      if (
        timestamp !== undefined &&
        (this.lastLapDistance === null || lapDistance > this.lastLapDistance + PROGRESS_EPSILON)
      ) {
        this.lastProgressTime = timestamp;
      }
      this.lastLapDistance = lapDistance;
    }

    if (speed !== null && speed >= this.minSpeedKmh && timestamp !== undefined) {
      this.lastProgressTime = timestamp;
    }

    if (
      reason === null &&
      this.idleTimeout > 0 &&
      timestamp !== undefined &&
      this.lastProgressTime !== null &&
      timestamp - this.lastProgressTime >= this.idleTimeout
    ) {
      reason = 'idle_timeout';
    }

    if (reason !== null && timestamp !== undefined) {
      // Do not fire again on the next sample
      this.lastProgressTime = timestamp;
    }

    return reason;
  }
}
