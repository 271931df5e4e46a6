import { describe, it, expect } from 'vitest';
import { OpponentTracker } from '../opponentTracker';
import type { TelemetrySample } from '../../types';
import { makeSample } from '../../__tests__/helpers';

function remote(overrides: Partial<TelemetrySample> = {}): TelemetrySample {
  return makeSample({ driverName: 'Remote A', control: 'remote', ...overrides });
}

/**
 * Drive one opponent through laps 1..n+1, completing lap i with times[i-1]
 */
function driveLaps(tracker: OpponentTracker, times: number[]): number[] {
  const emitted: number[] = [];
  let t = 0;

  for (let lap = 1; lap <= times.length + 1; lap++) {
    const lastLapTime = lap > 1 ? times[lap - 2] : null;
    for (const distance of [0, 1500]) {
      const laps = tracker.updateOpponent(remote({ lap, lapDistance: distance, lastLapTime }), t++);
      emitted.push(...laps.map(l => l.lapTime));
    }
  }

  return emitted;
}

describe('OpponentTracker', () => {
  it('returns the first lap and then only laps that beat the best', () => {
    const tracker = new OpponentTracker();
    expect(driveLaps(tracker, [95.2, 101.0, 88.4, 140.0, 80.0])).toEqual([95.2, 88.4, 80.0]);
  });

  it('returns the finished lap number with its buffered samples', () => {
    const tracker = new OpponentTracker();

    tracker.updateOpponent(remote({ lap: 1, lapDistance: 0 }), 0);
    tracker.updateOpponent(remote({ lap: 1, lapDistance: 1000 }), 1);
    tracker.updateOpponent(remote({ lap: 1, lapDistance: 2000 }), 2);
    const laps = tracker.updateOpponent(remote({
      lap: 2,
      lapDistance: 5,
      lastLapTime: 92.5,
      position: 4,
      carName: 'Team #7:LM',
      carClass: 'Hypercar',
    }), 3);

    expect(laps).toHaveLength(1);
    expect(laps[0].driverName).toBe('Remote A');
    expect(laps[0].lapNumber).toBe(1);
    expect(laps[0].lapTime).toBe(92.5);
    expect(laps[0].isFastest).toBe(true);
    expect(laps[0].position).toBe(4);
    expect(laps[0].carName).toBe('Team #7:LM');
    expect(laps[0].carClass).toBe('Hypercar');
    expect(laps[0].carModel).toBeNull();
    expect(laps[0].samples.map(s => s.lapDistance)).toEqual([0, 1000, 2000]);

    // The sample that started lap 2 is already buffered
    expect(tracker.getOpponentStatus('Remote A')).toEqual({
      driverName: 'Remote A',
      currentLap: 2,
      samplesBuffered: 1,
      fastestLapTime: 92.5,
      lapsEmitted: 1,
      lapStartTimestamp: 3,
    });
  });

  it('skips the out-lap and laps without a valid time', () => {
    const tracker = new OpponentTracker();

    expect(tracker.updateOpponent(remote({ lap: 0, lapDistance: 2500 }), 0)).toEqual([]);
    expect(tracker.getOpponentStatus('Remote A')?.samplesBuffered).toBe(0);

    // Leaving lap 0 completes nothing
    expect(tracker.updateOpponent(remote({ lap: 1, lapDistance: 0 }), 1)).toEqual([]);
    expect(tracker.updateOpponent(remote({ lap: 2, lapDistance: 0, lastLapTime: 0 }), 2)).toEqual([]);
    expect(tracker.updateOpponent(remote({ lap: 3, lapDistance: 0, lastLapTime: null }), 3)).toEqual([]);

    const laps = tracker.updateOpponent(remote({ lap: 4, lapDistance: 0, lastLapTime: 101.3 }), 4);
    expect(laps.map(l => [l.lapNumber, l.lapTime])).toEqual([[3, 101.3]]);
  });

  it('tracks remote players and AI only on request', () => {
    const tracker = new OpponentTracker();

    tracker.updateOpponent(makeSample({ driverName: 'Bot', control: 'ai' }));
    tracker.updateOpponent(makeSample({ driverName: 'Me', control: 'local' }));
    tracker.updateOpponent(makeSample({ driverName: 'Ghost', control: 'replay' }));
    tracker.updateOpponent(makeSample({ driverName: null, control: 'remote' }));
    expect(tracker.getOpponentCount()).toBe(0);

    tracker.updateOpponent(remote());
    expect(tracker.getOpponentCount()).toBe(1);

    const withAi = new OpponentTracker({ trackAi: true });
    withAi.updateOpponent(makeSample({ driverName: 'Bot', control: 'ai' }));
    expect(withAi.getOpponentCount()).toBe(1);
  });

  it('keeps drivers apart', () => {
    const tracker = new OpponentTracker();

    tracker.updateOpponent(remote({ lap: 1 }), 0);
    tracker.updateOpponent(remote({ driverName: 'Remote B', lap: 1 }), 0);
    const laps = tracker.updateOpponent(remote({ driverName: 'Remote B', lap: 2, lastLapTime: 99 }), 1);

    expect(laps.map(l => l.driverName)).toEqual(['Remote B']);
    expect(tracker.getOpponentStatus('Remote A')?.currentLap).toBe(1);
    expect(tracker.getOpponentCount()).toBe(2);
  });

  it('forgets all drivers on reset', () => {
    const tracker = new OpponentTracker();
    tracker.updateOpponent(remote({ lap: 1 }), 0);
    tracker.reset();

    expect(tracker.getOpponentCount()).toBe(0);
    expect(tracker.getOpponentStatus('Remote A')).toBeNull();
  });
});
