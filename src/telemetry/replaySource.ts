import * as fs from 'fs';
import type { RawTelemetryRecord } from '../types';
import type { TelemetrySource } from './source';
import { toNumber } from './sampleAdapter';

/**
 * One recorded poll tick:
 * {"t": 12.34, "process": true, "available": true, "player": {...}, "opponents": [...]}
 */
export interface ReplayFrame {
  t: number;
  process: boolean;
  available: boolean;
  player: RawTelemetryRecord | null;
  opponents: RawTelemetryRecord[];
}

function isRecord(value: unknown): value is RawTelemetryRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseFrame(line: string, lineNumber: number): ReplayFrame {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch (e) {
    throw new Error(`Line ${lineNumber}: invalid JSON (${e instanceof Error ? e.message : String(e)})`);
  }

  if (!isRecord(parsed)) {
    throw new Error(`Line ${lineNumber}: expected an object`);
  }

  const t = toNumber(parsed.t);
  if (t === null) {
    throw new Error(`Line ${lineNumber}: missing numeric "t" timestamp`);
  }

  const rawPlayer = parsed.player;
  let player: RawTelemetryRecord | null = null;
  if (rawPlayer !== undefined && rawPlayer !== null) {
    if (!isRecord(rawPlayer)) {
      throw new Error(`Line ${lineNumber}: "player" must be an object or null`);
    }
    player = rawPlayer;
  }

  const rawOpponents = parsed.opponents ?? [];
  if (!Array.isArray(rawOpponents)) {
    throw new Error(`Line ${lineNumber}: "opponents" must be an array`);
  }
  const opponents: RawTelemetryRecord[] = [];
  for (const item of rawOpponents) {
    if (!isRecord(item)) {
      throw new Error(`Line ${lineNumber}: "opponents" must only contain objects`);
    }
    opponents.push(item);
  }

  return {
    t,
    process: parsed.process !== false,
    available: parsed.available !== false,
    player,
    opponents,
  };
}

/**
 * Plays back a JSON-lines capture as if it were the live simulator.
 * Once the capture is exhausted the process is reported as gone.
 */
export class ReplaySource implements TelemetrySource {
  private index = -1;

  constructor(private readonly frames: readonly ReplayFrame[]) {}

  static fromLines(text: string): ReplaySource {
    const frames: ReplayFrame[] = [];

    text.split(/\r?\n/).forEach((line, i) => {
      if (line.trim() === '') return;
      frames.push(parseFrame(line, i + 1));
    });

    return new ReplaySource(frames);
  }

  static fromFile(filePath: string): ReplaySource {
    if (!fs.existsSync(filePath)) {
      throw new Error(`Capture file not found: ${filePath}`);
    }
    return ReplaySource.fromLines(fs.readFileSync(filePath, 'utf-8'));
  }

  get frameCount(): number {
    return this.frames.length;
  }

  /** True once every frame has been played */
  get finished(): boolean {
    return this.index >= this.frames.length;
  }

  /** Timestamp of the current frame (seconds) */
  currentTime(): number {
    if (this.frames.length === 0) return 0;
    const clamped = Math.min(Math.max(this.index, 0), this.frames.length - 1);
    return this.frames[clamped].t;
  }

  /** Timestamp of the frame the next beginTick() steps to */
  upcomingTime(): number {
    const next = this.frames[this.index + 1];
    return next ? next.t : this.currentTime();
  }

  /** Seconds between the current frame and the next one, 0 at the end */
  timeToNextFrame(): number {
    const next = this.frames[this.index + 1];
    const current = this.frames[this.index];
    if (!next || !current) return 0;
    return Math.max(0, next.t - current.t);
  }

  beginTick(): void {
    if (this.index < this.frames.length) {
      this.index += 1;
    }
  }

  isProcessRunning(): boolean {
    return this.currentFrame()?.process ?? false;
  }

  isAvailable(): boolean {
    return this.currentFrame()?.available ?? false;
  }

  read(): RawTelemetryRecord | null {
    const player = this.currentFrame()?.player ?? null;
    return player ? { ...player } : null;
  }

  readOpponents(): RawTelemetryRecord[] {
    return (this.currentFrame()?.opponents ?? []).map(record => ({ ...record }));
  }

  private currentFrame(): ReplayFrame | undefined {
    return this.index >= 0 ? this.frames[this.index] : undefined;
  }
}
