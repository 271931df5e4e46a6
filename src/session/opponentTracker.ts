import type { ControlType, NormalizedSample, OpponentLapRecord, TelemetrySample } from '../types';
import { SampleNormalizer } from '../telemetry/normalizer';

export interface OpponentTrackerOptions {
  trackAi?: boolean;             // Also track AI controlled cars (remote players always are)
  normalizer?: SampleNormalizer;
}

interface OpponentState {
  driverName: string;
  currentLap: number;
  samples: NormalizedSample[];
  fastestLapTime: number;        // Best emitted lap, Infinity until the first one
  lapsEmitted: number;
  lapStartTimestamp: number | null;
}

export interface OpponentStatus {
  driverName: string;
  currentLap: number;
  samplesBuffered: number;
  fastestLapTime: number;
  lapsEmitted: number;
  lapStartTimestamp: number | null;
}

/**
 * Tracks opponent laps during multiplayer sessions.
 *
 * "Fastest lap only": the first completed lap of each driver is returned,
 * after that only laps that beat the best lap returned so far.
 */
export class OpponentTracker {
  readonly trackAi: boolean;
  private readonly normalizer: SampleNormalizer;

  // Driver name -> slot in `opponents`; both only shrink on reset()
  private readonly slots = new Map<string, number>();
  private opponents: OpponentState[] = [];

  constructor(options: OpponentTrackerOptions = {}) {
    this.trackAi = options.trackAi ?? false;
    this.normalizer = options.normalizer ?? new SampleNormalizer();
  }

  /**
   * Feed one opponent sample.
   * Returns the laps this sample completed that should be saved.
   */
  updateOpponent(sample: TelemetrySample, timestamp?: number): OpponentLapRecord[] {
    const driverName = sample.driverName;
    if (!driverName || !this.shouldTrack(sample.control)) {
      return [];
    }

    let slot = this.slots.get(driverName);
    if (slot === undefined) {
      slot = this.opponents.length;
      this.slots.set(driverName, slot);
      this.opponents.push({
        driverName,
        currentLap: 0,
        samples: [],
        fastestLapTime: Infinity,
        lapsEmitted: 0,
        lapStartTimestamp: timestamp ?? null,
      });
    }

    const opponent = this.opponents[slot];
    const currentLap = sample.lap;
    const completed: OpponentLapRecord[] = [];

    if (currentLap > opponent.currentLap && opponent.currentLap > 0) {
      // lapTime is already time into the new lap here; the finished lap
      // is only available as last lap time
      const lapTime = sample.lastLapTime ?? 0;

      // Out-lap or invalid lap: nothing to compare
      if (lapTime > 0 && (opponent.lapsEmitted === 0 || lapTime < opponent.fastestLapTime)) {
        opponent.fastestLapTime = lapTime;
        opponent.lapsEmitted += 1;

        completed.push({
          driverName,
          lapNumber: opponent.currentLap,
          lapTime,
          samples: opponent.samples.map(s => ({ ...s, sectorSplits: [...s.sectorSplits] })),
          isFastest: true,
          position: sample.position,
          carName: sample.carName,
          carModel: sample.carModel,
          teamName: sample.teamName,
          manufacturer: sample.manufacturer,
          carClass: sample.carClass,
        });
      }

      opponent.samples = [];
      opponent.lapStartTimestamp = timestamp ?? null;
    }

    opponent.currentLap = currentLap;

    if (currentLap > 0) {
      opponent.samples.push(this.normalizer.normalize(sample));
    }

    return completed;
  }

  /**
   * Local player, empty slots and replays are never tracked; AI only on request
   */
  shouldTrack(control: ControlType): boolean {
    switch (control) {
      case 'remote':
        return true;
      case 'ai':
        return this.trackAi;
      case 'local':
      case 'nobody':
      case 'replay':
        return false;
    }
  }

  getOpponentCount(): number {
    return this.slots.size;
  }

  getOpponentStatus(driverName: string): OpponentStatus | null {
    const slot = this.slots.get(driverName);
    if (slot === undefined) return null;

    const opponent = this.opponents[slot];
    return {
      driverName: opponent.driverName,
      currentLap: opponent.currentLap,
      samplesBuffered: opponent.samples.length,
      fastestLapTime: opponent.fastestLapTime,
      lapsEmitted: opponent.lapsEmitted,
      lapStartTimestamp: opponent.lapStartTimestamp,
    };
  }

  /** Clear all opponent tracking data */
  reset(): void {
    this.slots.clear();
    this.opponents = [];
  }
}
