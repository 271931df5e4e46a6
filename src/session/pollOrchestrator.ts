import type {
  LapEvent,
  NormalizedSample,
  SessionInfo,
  SessionState,
  StopReason,
  TelemetrySample,
  TickStatus,
} from '../types';
import type { TelemetrySource } from '../telemetry/source';
import { IngestAdapter } from '../telemetry/sampleAdapter';
import { SampleNormalizer } from '../telemetry/normalizer';
import { detectSectorBoundaries } from '../telemetry/sectorBoundaries';
import { SessionManager } from './sessionManager';
import { OpponentTracker } from './opponentTracker';
import logger, { describeError } from '../utils/logger';

// ============================================================================
// Configuration
// ============================================================================

export interface PollOrchestratorOptions {
  idleTimeout?: number;
  minSpeedKmh?: number;
  lapResetTolerance?: number;
  trackOpponents?: boolean;
  trackOpponentAi?: boolean;
}

interface SessionIdentity {
  playerName: string | null;
  trackName: string | null;
  carName: string | null;
  sessionType: string | null;
}

const EMPTY_IDENTITY: SessionIdentity = {
  playerName: null,
  trackName: null,
  carName: null,
  sessionType: null,
};

export function describeState(state: SessionState): string {
  switch (state) {
    case 'idle':
      return 'Waiting for simulator';
    case 'detected':
      return 'Simulator detected';
    case 'logging':
      return 'Logging';
    case 'paused':
      return 'Paused';
    case 'error':
      return 'Error';
    default: {
      const unreachable: never = state;
      return unreachable;
    }
  }
}

// ============================================================================
// Poll Orchestrator
// ============================================================================

/**
 * Outer state machine, driven once per poll tick.
 *
 * Reads the source, feeds the Session Manager and Opponent Tracker and
 * turns their results into queued lap events. Finished laps are never
 * delivered from inside a tick: callers drain them with drainEvents().
 */
export class PollOrchestrator {
  readonly normalizer: SampleNormalizer;
  readonly sessionManager: SessionManager;
  readonly opponentTracker: OpponentTracker;
  readonly trackOpponents: boolean;

  private state: SessionState = 'idle';
  private stateBeforePause: SessionState | null = null;
  private running = false;
  private paused = false;
  private suspended = false;
  private identity: SessionIdentity = { ...EMPTY_IDENTITY };
  private events: LapEvent[] = [];
  private readonly ingest = new IngestAdapter();

  constructor(
    private readonly source: TelemetrySource,
    options: PollOrchestratorOptions = {}
  ) {
    this.normalizer = new SampleNormalizer();
    this.sessionManager = new SessionManager({
      normalizer: this.normalizer,
      idleTimeout: options.idleTimeout,
      minSpeedKmh: options.minSpeedKmh,
      lapResetTolerance: options.lapResetTolerance,
    });
    this.opponentTracker = new OpponentTracker({
      normalizer: this.normalizer,
      trackAi: options.trackOpponentAi ?? false,
    });
    this.trackOpponents = options.trackOpponents ?? true;
  }

  // ==========================================================================
  // Control
  // ==========================================================================

  start(): void {
    this.running = true;
    this.paused = false;
  }

  stop(): void {
    this.running = false;
  }

  /** Stop collecting local player data; opponents keep being tracked */
  pause(): void {
    this.paused = true;
    this.enterPausedState();
  }

  resume(): void {
    this.paused = false;
    if (this.state === 'paused') {
      this.state = this.stateBeforePause ?? 'detected';
    }
    this.stateBeforePause = null;
  }

  isRunning(): boolean {
    return this.running;
  }

  isPaused(): boolean {
    return this.paused;
  }

  isSuspended(): boolean {
    return this.suspended;
  }

  getState(): SessionState {
    return this.state;
  }

  /** Hand over every lap finished since the last call, oldest first */
  drainEvents(): LapEvent[] {
    const drained = this.events;
    this.events = [];
    return drained;
  }

  getSessionInfo(): SessionInfo {
    return {
      sessionId: this.sessionManager.currentSessionId,
      ...this.identity,
      trackLength: this.sessionManager.getTrackLength(),
    };
  }

  // ==========================================================================
  // Tick
  // ==========================================================================

  /**
   * Run one iteration of the loop.
   * Returns a fresh status record, or null when the loop is not running.
   */
  runOnce(now: number = Date.now() / 1000): TickStatus | null {
    if (!this.running) {
      return null;
    }

    const status = this.createStatus();

    try {
      this.source.beginTick();

      status.processDetected = this.source.isProcessRunning();
      if (!status.processDetected) {
        this.handleProcessLost();
        return this.finishStatus(status);
      }

      if (this.state === 'idle') {
        this.state = 'detected';
        logger.info('Simulator process detected');
      }
      if (this.paused) {
        this.enterPausedState();
      }

      // Terminal until the process goes away
      if (this.state === 'error') {
        return this.finishStatus(status);
      }

      status.telemetryAvailable = this.source.isAvailable();
      if (!status.telemetryAvailable) {
        return this.finishStatus(status);
      }

      this.updateOpponents(now);

      if (this.paused) {
        return this.finishStatus(status);
      }

      const record = this.source.read();
      if (record === null) {
        return this.finishStatus(status);
      }

      const sample = this.ingest.adapt(record);
      this.captureIdentity(sample);

      const events = this.sessionManager.update(sample, now);

      if (events.lapCompleted) {
        status.lapCompleted = true;
        this.flushLap(null);
      }

      if (events.stopReason !== null) {
        this.flushLap(events.stopReason);
        status.sessionStopped = true;
        status.stopReason = events.stopReason;
        this.suspended = true;
        if (this.state === 'logging') {
          this.state = 'detected';
        }
        logger.warn(`Logging suspended: ${events.stopReason}`, { lap: sample.lap });
      }

      if (this.suspended) {
        if ((sample.speed ?? 0) < this.sessionManager.minSpeedKmh) {
          return this.finishStatus(status);
        }
        this.suspended = false;
        logger.info('Activity resumed, logging continues');
      }

      if (this.state === 'detected') {
        this.state = 'logging';
        this.sessionManager.currentSessionId = this.sessionManager.generateSessionId();
        logger.info(`Logging session ${this.sessionManager.currentSessionId}`);
      }

      this.sessionManager.addSample(sample, now);
    } catch (e) {
      this.state = 'error';
      status.error = describeError(e);
      logger.error('Telemetry read failed', e);
    }

    return this.finishStatus(status);
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private createStatus(): TickStatus {
    return {
      state: this.state,
      processDetected: false,
      telemetryAvailable: false,
      lap: this.sessionManager.currentLap,
      samplesBuffered: this.sessionManager.getSampleCount(),
      lapCompleted: false,
      sessionStopped: false,
      stopReason: null,
      suspended: this.suspended,
      paused: this.paused,
      opponentsTracked: this.opponentTracker.getOpponentCount(),
      sessionId: this.sessionManager.currentSessionId,
      error: null,
    };
  }

  private finishStatus(status: TickStatus): TickStatus {
    return {
      ...status,
      state: this.state,
      lap: this.sessionManager.currentLap,
      samplesBuffered: this.sessionManager.getSampleCount(),
      suspended: this.suspended,
      paused: this.paused,
      opponentsTracked: this.opponentTracker.getOpponentCount(),
      sessionId: this.sessionManager.currentSessionId,
    };
  }

  private enterPausedState(): void {
    if (this.state === 'detected' || this.state === 'logging') {
      this.stateBeforePause = this.state;
      this.state = 'paused';
    }
  }

  private handleProcessLost(): void {
    if (this.state !== 'idle') {
      logger.info('Simulator process gone, discarding buffered lap');
      this.state = 'idle';
      this.stateBeforePause = null;
      this.sessionManager.reset();
      this.opponentTracker.reset();
      this.normalizer.clearSectorBoundaries();
      this.ingest.reset();
      this.identity = { ...EMPTY_IDENTITY };
    }
    this.suspended = false;
  }

  private captureIdentity(sample: TelemetrySample): void {
    this.identity = {
      playerName: sample.playerName ?? sample.driverName ?? this.identity.playerName,
      trackName: sample.trackName ?? this.identity.trackName,
      carName: sample.carName ?? this.identity.carName,
      sessionType: sample.sessionType ?? this.identity.sessionType,
    };
  }

  private updateOpponents(now: number): void {
    if (!this.trackOpponents) return;

    for (const record of this.source.readOpponents()) {
      const sample = this.ingest.adapt(record);

      for (const lap of this.opponentTracker.updateOpponent(sample, now)) {
        logger.info(`Opponent fastest lap: ${lap.driverName}`, {
          lap: lap.lapNumber,
          lapTime: lap.lapTime,
          samples: lap.samples.length,
        });
        this.events.push({
          kind: 'opponent',
          record: lap,
          sectors: detectSectorBoundaries(lap.samples, this.trackLengthFor(lap.samples)),
          session: this.getSessionInfo(),
        });
      }
    }
  }

  private trackLengthFor(samples: readonly NormalizedSample[]): number {
    const known = this.sessionManager.getTrackLength();
    if (known > 0) return known;
    return samples.reduce((max, s) => Math.max(max, s.lapDistance), 0);
  }

  /**
   * Queue the buffered lap as an event and clear the buffer.
   * A null reason marks a completed lap.
   */
  private flushLap(reason: StopReason | null): boolean {
    const summary = this.sessionManager.getLapSummary();
    if (!summary) {
      this.sessionManager.clearLapBuffer();
      return false;
    }

    const samples = this.sessionManager.getLapData();
    const sectors = detectSectorBoundaries(samples, this.sessionManager.getTrackLength());

    if (reason === null && sectors.boundaries.length > 0) {
      this.normalizer.setSectorBoundaries(sectors.boundaries);
    }

    this.events.push({
      kind: 'player',
      samples,
      summary: { ...summary, lapCompleted: reason === null, stopReason: reason },
      sectors,
      session: this.getSessionInfo(),
    });

    logger.info(reason === null ? `Lap ${summary.lap} completed` : `Lap ${summary.lap} incomplete`, {
      lapTime: summary.lapTime,
      samples: summary.samplesCount,
      reason,
    });

    this.sessionManager.clearLapBuffer();
    return true;
  }
}
