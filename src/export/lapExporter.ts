import type { LapEvent, VehicleMetadata } from '../types';
import { formatLapCsv } from './csvFormatter';
import { buildMetadataBlock } from './metadata';
import { LapFileStore } from './fileManager';
import logger from '../utils/logger';

/**
 * Receives every lap event the loop drains.
 * Returns the written location, or null when the lap was not kept.
 */
export interface LapExporter {
  exportLap(event: LapEvent): string | null;
}

/** Cache-only vehicle lookup, see VehicleMetadataClient */
export interface VehicleLookup {
  lookupVehicle(vehicleName: string): VehicleMetadata | null;
}

/** Opponent laps shorter than this are out-laps or partial laps */
export const MIN_OPPONENT_LAP_TIME = 30.0;
export const MIN_OPPONENT_LAP_SAMPLES = 10;

export interface CsvLapExporterOptions {
  store?: LapFileStore;
  vehicles?: VehicleLookup;
  clock?: () => Date;
}

/**
 * Writes completed player laps and opponent fastest laps as CSV files.
 * Incomplete player laps and opponent laps below the minimum time or sample count are dropped.
 * Opponent files are named after the session id, player files after the save time.
 */
export class CsvLapExporter implements LapExporter {
  readonly store: LapFileStore;
  private readonly vehicles: VehicleLookup | null;
  private readonly clock: () => Date;

  constructor(options: CsvLapExporterOptions = {}) {
    this.store = options.store ?? new LapFileStore();
    this.vehicles = options.vehicles ?? null;
    this.clock = options.clock ?? (() => new Date());
  }

  exportLap(event: LapEvent): string | null {
    const now = this.clock();

    switch (event.kind) {
      case 'player': {
        const { summary, session } = event;
        if (!summary.lapCompleted) {
          logger.info(`Discarding incomplete lap ${summary.lap}`, { reason: summary.stopReason });
          return null;
        }

        const vehicle = session.carName ? this.lookup(session.carName) : null;
        const metadata = buildMetadataBlock({
          playerName: session.playerName,
          trackName: session.trackName,
          carName: session.carName,
          sessionType: session.sessionType,
          trackLength: session.trackLength,
          sessionUtc: now,
          sectors: event.sectors,
          vehicle,
        }, event.samples);

        const filePath = this.store.saveLap(formatLapCsv(event.samples, metadata), {
          lap: summary.lap,
          lapTime: summary.lapTime,
          trackName: session.trackName,
          carName: session.carName,
          carModel: vehicle?.carModel,
          carClass: vehicle?.vehicleClass,
          driverName: session.playerName,
          date: now,
        });
        logger.info(`Saved lap ${summary.lap} to ${filePath}`);
        return filePath;
      }

      case 'opponent': {
        const { record, session } = event;
        if (record.lapTime < MIN_OPPONENT_LAP_TIME || record.samples.length < MIN_OPPONENT_LAP_SAMPLES) {
          logger.debug(`Skipping opponent lap ${record.lapNumber} of ${record.driverName}`, {
            lapTime: record.lapTime,
            samples: record.samples.length,
          });
          return null;
        }

        const vehicle = record.carName ? this.lookup(record.carName) : null;
        const carModel = record.carModel ?? vehicle?.carModel;
        const carClass = record.carClass ?? vehicle?.vehicleClass;

        const metadata = buildMetadataBlock({
          playerName: record.driverName,
          trackName: session.trackName,
          carName: record.carName,
          sessionType: session.sessionType,
          trackLength: session.trackLength,
          sessionUtc: now,
          sectors: event.sectors,
          vehicle,
          carModel: record.carModel,
          carClass: record.carClass,
          manufacturer: record.manufacturer,
          teamName: record.teamName,
        }, record.samples);

        const filePath = this.store.saveLap(formatLapCsv(record.samples, metadata), {
          lap: record.lapNumber,
          lapTime: record.lapTime,
          trackName: session.trackName,
          carName: record.carName,
          carModel,
          carClass,
          driverName: record.driverName,
          date: now,
          sessionId: session.sessionId,
        });
        logger.info(`Saved opponent lap of ${record.driverName} to ${filePath}`);
        return filePath;
      }
    }
  }

  private lookup(carName: string): VehicleMetadata | null {
    return this.vehicles?.lookupVehicle(carName) ?? null;
  }
}
