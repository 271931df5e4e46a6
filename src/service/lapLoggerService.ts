import type { LapEvent, TickStatus } from '../types';
import type { TelemetrySource } from '../telemetry/source';
import { PollOrchestrator } from '../session/pollOrchestrator';
import type { PollOrchestratorOptions } from '../session/pollOrchestrator';
import type { LapExporter } from '../export/lapExporter';
import logger from '../utils/logger';

export interface LapLoggerServiceOptions extends PollOrchestratorOptions {
  /** Delay between ticks; a function is asked again after every tick */
  pollIntervalMs?: number | (() => number);
  /** Timestamp (seconds) handed to each tick */
  clock?: () => number;
  onTick?: (status: TickStatus) => void;
}

export interface LapLoggerStats {
  ticks: number;
  playerLapsSaved: number;
  playerLapsDiscarded: number;
  opponentLapsSaved: number;
  exportErrors: number;
}

const DEFAULT_POLL_INTERVAL_MS = 10;

function delay(ms: number): Promise<void> {
  if (ms <= 0) {
    return new Promise(resolve => setImmediate(resolve));
  }
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Persistent polling loop around the orchestrator.
 *
 * Ticks run strictly one after another; finished laps are drained after
 * each tick and handed to the exporter before the next one starts.
 */
export class LapLoggerService {
  readonly orchestrator: PollOrchestrator;

  private isRunning = false;
  private lastStatus: TickStatus | null = null;
  private stats: LapLoggerStats = {
    ticks: 0,
    playerLapsSaved: 0,
    playerLapsDiscarded: 0,
    opponentLapsSaved: 0,
    exportErrors: 0,
  };
  private readonly pollInterval: () => number;
  private readonly clock: () => number;
  private readonly onTick: ((status: TickStatus) => void) | null;

  constructor(
    source: TelemetrySource,
    private readonly exporter: LapExporter,
    options: LapLoggerServiceOptions = {}
  ) {
    this.orchestrator = new PollOrchestrator(source, options);

    const interval = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.pollInterval = typeof interval === 'function' ? interval : () => interval;
    this.clock = options.clock ?? (() => Date.now() / 1000);
    this.onTick = options.onTick ?? null;
  }

  /**
   * Run until stop() is called. Resolves once the last tick has finished.
   */
  async start(): Promise<void> {
    if (this.isRunning) {
      logger.warn('Lap logger already running');
      return;
    }

    this.isRunning = true;
    this.orchestrator.start();
    logger.info('Lap logger started');

    while (this.isRunning) {
      this.tick();

      if (this.isRunning) {
        await delay(this.pollInterval());
      }
    }

    this.orchestrator.stop();
    logger.info('Lap logger stopped', this.stats);
  }

  stop(): void {
    if (this.isRunning) {
      logger.info('Stop requested');
    }
    this.isRunning = false;
  }

  pause(): void {
    this.orchestrator.pause();
    logger.info('Lap logger paused');
  }

  resume(): void {
    this.orchestrator.resume();
    logger.info('Lap logger resumed');
  }

  getStatus(): TickStatus | null {
    return this.lastStatus ? { ...this.lastStatus } : null;
  }

  getStats(): LapLoggerStats {
    return { ...this.stats };
  }

  private tick(): void {
    const status = this.orchestrator.runOnce(this.clock());
    if (status === null) return;

    this.stats.ticks += 1;
    this.lastStatus = status;

    for (const event of this.orchestrator.drainEvents()) {
      this.exportEvent(event);
    }

    this.onTick?.(status);
  }

  private exportEvent(event: LapEvent): void {
    try {
      const saved = this.exporter.exportLap(event) !== null;

      if (event.kind === 'opponent') {
        if (saved) this.stats.opponentLapsSaved += 1;
      } else if (saved) {
        this.stats.playerLapsSaved += 1;
      } else {
        this.stats.playerLapsDiscarded += 1;
      }
    } catch (error) {
      this.stats.exportErrors += 1;
      logger.error('Failed to export lap', error);
    }
  }
}
