#!/usr/bin/env node
import { Command } from 'commander';
import * as dotenv from 'dotenv';
import { loadConfig } from './config';
import type { LapLoggerConfig } from './config';
import { ReplaySource } from './telemetry/replaySource';
import { LapLoggerService } from './service/lapLoggerService';
import { CsvLapExporter } from './export/lapExporter';
import { LapFileStore } from './export/fileManager';
import { VehicleMetadataClient } from './api/vehicleMetadataClient';
import { describeState } from './session/pollOrchestrator';
import logger, { describeError, initLogger } from './utils/logger';

// Load environment variables
dotenv.config();

const program = new Command();

program
  .name('laplogger')
  .description('Lap segmentation and CSV export for Le Mans Ultimate telemetry')
  .version('0.1.0');

function fail(message: string): never {
  console.error(`Error: ${message}`);
  process.exit(1);
}

/**
 * Replay a recorded capture through the logger
 */
program
  .command('replay <file>')
  .description('Replay a JSON-lines telemetry capture and export its laps')
  .option('--output <dir>', 'Output directory for lap CSV files')
  .option('--realtime', 'Play frames at their recorded pace')
  .option('--no-opponents', 'Do not track opponent laps')
  .option('--ai', 'Also track AI-driven opponents')
  .option('--fetch-vehicles', 'Load vehicle metadata from the simulator REST API first')
  .action(async (file: string, options: {
    output?: string;
    realtime?: boolean;
    opponents: boolean;
    ai?: boolean;
    fetchVehicles?: boolean;
  }) => {
    const config = loadConfig();
    initLogger({ logDir: config.logDir });

    let source: ReplaySource;
    try {
      source = ReplaySource.fromFile(file);
    } catch (error) {
      fail(describeError(error));
    }

    const vehicles = new VehicleMetadataClient(config.restUrl);
    if (options.fetchVehicles) {
      await vehicles.fetchVehicleData();
    }

    const store = new LapFileStore(options.output ?? config.outputDir);
    const exporter = new CsvLapExporter({ store, vehicles });

    let lastState = '';
    const service: LapLoggerService = new LapLoggerService(source, exporter, {
      idleTimeout: config.idleTimeout,
      minSpeedKmh: config.minSpeedKmh,
      lapResetTolerance: config.lapResetTolerance,
      trackOpponents: options.opponents && config.trackOpponents,
      trackOpponentAi: options.ai === true || config.trackOpponentAi,
      pollIntervalMs: options.realtime ? () => source.timeToNextFrame() * 1000 : 0,
      clock: () => source.upcomingTime(),
      onTick: status => {
        const state = describeState(status.state);
        if (state !== lastState) {
          logger.info(`State: ${state}`);
          lastState = state;
        }
        if (source.finished) {
          service.stop();
        }
      },
    });

    console.log(`Replaying ${source.frameCount} frames from ${file}`);
    await service.start();

    const stats = service.getStats();
    console.log(`\nLaps saved: ${stats.playerLapsSaved} (discarded ${stats.playerLapsDiscarded})`);
    console.log(`Opponent laps saved: ${stats.opponentLapsSaved}`);
    if (stats.exportErrors > 0) {
      console.log(`Export errors: ${stats.exportErrors}`);
    }
    console.log(`Output: ${store.outputDir}`);
    logger.close();
  });

/**
 * List saved lap files
 */
program
  .command('list')
  .description('List saved lap CSV files')
  .option('--output <dir>', 'Output directory for lap CSV files')
  .option('--filter <text>', 'Only files whose name contains this text')
  .action((options: { output?: string; filter?: string }) => {
    const store = new LapFileStore(options.output ?? loadConfig().outputDir);
    const files = options.filter ? store.getSessionLaps(options.filter) : store.listSavedLaps();

    if (files.length === 0) {
      console.log(`No lap files in ${store.outputDir}`);
      return;
    }
    for (const file of files) {
      console.log(file);
    }
  });

/**
 * Delete saved lap files
 */
program
  .command('clean')
  .description('Delete every saved lap CSV file')
  .option('--output <dir>', 'Output directory for lap CSV files')
  .action((options: { output?: string }) => {
    const store = new LapFileStore(options.output ?? loadConfig().outputDir);
    const count = store.clearAllLaps();
    console.log(`Deleted ${count} lap files from ${store.outputDir}`);
  });

/**
 * Show effective configuration
 */
program
  .command('config')
  .description('Show the effective configuration')
  .action(() => {
    const config: LapLoggerConfig = loadConfig();
    for (const [key, value] of Object.entries(config)) {
      console.log(`${key.padEnd(18)} ${String(value)}`);
    }
  });

program.parseAsync().catch((error: unknown) => {
  fail(describeError(error));
});
