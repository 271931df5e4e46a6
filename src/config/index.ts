import { defaultLogDir } from '../utils/logger';
import { DEFAULT_OUTPUT_DIR } from '../export/fileManager';
import { DEFAULT_REST_URL } from '../api/vehicleMetadataClient';

// ============================================================================
// Configuration (environment / .env)
// ============================================================================

export interface LapLoggerConfig {
  idleTimeout: number;        // s, 0 disables
  minSpeedKmh: number;
  lapResetTolerance: number;  // m
  trackOpponents: boolean;
  trackOpponentAi: boolean;
  pollIntervalMs: number;
  outputDir: string;
  restUrl: string;
  logDir: string;
}

export const DEFAULT_CONFIG: Omit<LapLoggerConfig, 'logDir'> = {
  idleTimeout: 5,
  minSpeedKmh: 1,
  lapResetTolerance: 5,
  trackOpponents: true,
  trackOpponentAi: false,
  pollIntervalMs: 10,
  outputDir: DEFAULT_OUTPUT_DIR,
  restUrl: DEFAULT_REST_URL,
};

type Env = Record<string, string | undefined>;

function readNumber(raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  return Number.isFinite(value) ? value : fallback;
}

function readNonNegative(raw: string | undefined, fallback: number): number {
  return Math.max(0, readNumber(raw, fallback));
}

/** 'off' disables a default-on switch */
function readEnabled(raw: string | undefined): boolean {
  return raw?.trim().toLowerCase() !== 'off';
}

/** 'on' enables a default-off switch */
function readOptIn(raw: string | undefined): boolean {
  return raw?.trim().toLowerCase() === 'on';
}

function readText(raw: string | undefined, fallback: string): string {
  const value = raw?.trim();
  return value ? value : fallback;
}

export function loadConfig(env: Env = process.env): LapLoggerConfig {
  return {
    idleTimeout: readNonNegative(env.LAPLOG_IDLE_TIMEOUT, DEFAULT_CONFIG.idleTimeout),
    minSpeedKmh: readNonNegative(env.LAPLOG_MIN_SPEED_KMH, DEFAULT_CONFIG.minSpeedKmh),
    lapResetTolerance: readNonNegative(env.LAPLOG_LAP_RESET_TOLERANCE, DEFAULT_CONFIG.lapResetTolerance),
    trackOpponents: readEnabled(env.LAPLOG_TRACK_OPPONENTS),
    trackOpponentAi: readOptIn(env.LAPLOG_TRACK_OPPONENT_AI),
    pollIntervalMs: readNonNegative(env.LAPLOG_POLL_INTERVAL_MS, DEFAULT_CONFIG.pollIntervalMs),
    outputDir: readText(env.LAPLOG_OUTPUT_DIR, DEFAULT_CONFIG.outputDir),
    restUrl: readText(env.LAPLOG_REST_URL, DEFAULT_CONFIG.restUrl),
    logDir: readText(env.LAPLOG_LOG_DIR, defaultLogDir()),
  };
}
