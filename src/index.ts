// LMU Lap Logger - lap segmentation and normalization for simulator telemetry
// Main entry point for programmatic usage

export { IngestAdapter, createSampleAdapter, detectSchema } from './telemetry/sampleAdapter';
export type { SampleAdapter, SourceSchema } from './telemetry/sampleAdapter';
export { SampleNormalizer, pedalPercent, steerPercent, resolveSector } from './telemetry/normalizer';
export { detectSectorBoundaries } from './telemetry/sectorBoundaries';
export type { TelemetrySource } from './telemetry/source';
export { ReplaySource } from './telemetry/replaySource';
export type { ReplayFrame } from './telemetry/replaySource';
export { SessionManager } from './session/sessionManager';
export type { SessionManagerOptions, SessionEvents } from './session/sessionManager';
export { OpponentTracker } from './session/opponentTracker';
export type { OpponentTrackerOptions, OpponentStatus } from './session/opponentTracker';
export { PollOrchestrator, describeState } from './session/pollOrchestrator';
export type { PollOrchestratorOptions } from './session/pollOrchestrator';
export { LapLoggerService } from './service/lapLoggerService';
export type { LapLoggerServiceOptions, LapLoggerStats } from './service/lapLoggerService';
export { formatLapCsv, formatDecimal, LAP_CSV_HEADER } from './export/csvFormatter';
export type { LapMetadata } from './export/csvFormatter';
export { buildMetadataBlock, formatSessionUtc } from './export/metadata';
export type { LapMetadataInput } from './export/metadata';
export { LapFileStore, buildLapFilename, sanitizeField } from './export/fileManager';
export type { LapFileInfo } from './export/fileManager';
export { CsvLapExporter, MIN_OPPONENT_LAP_TIME, MIN_OPPONENT_LAP_SAMPLES } from './export/lapExporter';
export type { LapExporter, VehicleLookup } from './export/lapExporter';
export { VehicleMetadataClient, extractCarModel, extractVehicleClass } from './api/vehicleMetadataClient';
export { loadConfig } from './config';
export type { LapLoggerConfig } from './config';
export * from './types';
