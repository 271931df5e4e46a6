import * as fs from 'fs';
import * as path from 'path';

export const DEFAULT_OUTPUT_DIR = './telemetry_output';

/** What a filename is built from */
export interface LapFileInfo {
  lap: number;
  lapTime: number | null;
  trackName?: string | null;
  carName?: string | null;
  carModel?: string | null;
  carClass?: string | null;
  driverName?: string | null;
  date?: Date;
  /** Replaces the date and time prefix when set */
  sessionId?: string | null;
}

const INVALID_FIELD_CHARS = /[<>:"\/\\|?*_\s]/g;
const INVALID_FILENAME_CHARS = /[<>:"\/\\|?*]/g;

/**
 * Lower-case a value and make it safe inside one filename field.
 * Fields are joined with '_', so '_' never appears inside one.
 *
 * "Le Mans_24h" -> "le-mans-24h"
 */
export function sanitizeField(value: string): string {
  return value
    .toLowerCase()
    .replace(INVALID_FIELD_CHARS, '-')
    .replace(/-{2,}/g, '-')
    .replace(/^-+|-+$/g, '');
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * {date}_{time}_{track}_{car}_{driver}_lap{lap}_t{lapTime}s.csv
 * {sessionId}_{track}_{car}_{driver}_lap{lap}_t{lapTime}s.csv when a session id is given
 *
 * Date and time are local; the car is prefixed with its class when known.
 */
export function buildLapFilename(info: LapFileInfo): string {
  const sessionId = info.sessionId ? sanitizeField(info.sessionId) : '';
  let prefix = sessionId;
  if (!prefix) {
    const date = info.date ?? new Date();
    const dateStr = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
    const timeStr = `${pad(date.getHours())}-${pad(date.getMinutes())}`;
    prefix = `${dateStr}_${timeStr}`;
  }

  const track = sanitizeField(info.trackName || 'unknown-track');
  const driver = sanitizeField(info.driverName || 'unknown-driver');
  const car = sanitizeField(info.carModel || info.carName || 'unknown-car');
  const carClass = sanitizeField(info.carClass || '');
  const carField = carClass ? `${carClass}_${car}` : car;

  const lapTime = info.lapTime !== null && Number.isFinite(info.lapTime) ? Math.round(info.lapTime) : 0;

  const filename = `${prefix}_${track}_${carField}_${driver}_lap${info.lap}_t${lapTime}s.csv`;
  return filename.replace(INVALID_FILENAME_CHARS, '_');
}

/**
 * Lap CSV files in one output directory
 */
export class LapFileStore {
  readonly outputDir: string;

  constructor(outputDir: string = DEFAULT_OUTPUT_DIR) {
    this.outputDir = path.resolve(outputDir);
  }

  /**
   * Write a lap file, creating the directory on first use.
   * Returns the full path of the written file.
   */
  saveLap(csvContent: string, info: LapFileInfo): string {
    if (!fs.existsSync(this.outputDir)) {
      fs.mkdirSync(this.outputDir, { recursive: true });
    }

    const filePath = path.join(this.outputDir, buildLapFilename(info));
    fs.writeFileSync(filePath, csvContent, 'utf-8');
    return filePath;
  }

  listSavedLaps(): string[] {
    if (!fs.existsSync(this.outputDir)) {
      return [];
    }

    return fs.readdirSync(this.outputDir)
      .filter(file => file.endsWith('.csv'))
      .sort();
  }

  /**
   * Lap files whose name contains the filter (a date, a session time, a track...)
   */
  getSessionLaps(filter: string): string[] {
    return this.listSavedLaps().filter(file => file.includes(filter));
  }

  deleteLap(filename: string): boolean {
    const filePath = path.join(this.outputDir, path.basename(filename));
    if (!fs.existsSync(filePath)) {
      return false;
    }

    fs.unlinkSync(filePath);
    return true;
  }

  clearAllLaps(): number {
    const files = this.listSavedLaps();
    for (const file of files) {
      fs.unlinkSync(path.join(this.outputDir, file));
    }
    return files.length;
  }
}
