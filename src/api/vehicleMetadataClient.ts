import axios, { AxiosInstance } from 'axios';
import type { VehicleMetadata } from '../types';
import logger, { describeError } from '../utils/logger';

export const DEFAULT_REST_URL = 'http://localhost:6397';

// Human readable classes, in the order they are preferred
const READABLE_CLASSES = ['Hypercar', 'LMP2', 'LMP3', 'GTE', 'GT3', 'LMGT3'];

/** Entry of /rest/sessions/getAllVehicles (only the fields we use) */
interface RestVehicle {
  vehicle?: string;
  fullPathTree?: string;
  classes?: string[];
  manufacturer?: string;
  team?: string;
}

function asString(value: unknown): string {
  return typeof value === 'string' ? value : '';
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asRestVehicle(entry: unknown): RestVehicle | null {
  if (!isObject(entry)) return null;

  return {
    vehicle: asString(entry.vehicle),
    fullPathTree: asString(entry.fullPathTree),
    classes: Array.isArray(entry.classes) ? entry.classes.filter((c): c is string => typeof c === 'string') : [],
    manufacturer: asString(entry.manufacturer),
    team: asString(entry.team),
  };
}

/**
 * "WEC 2023, Hypercar, Cadillac V-Series.R" -> "Cadillac V-Series.R"
 */
export function extractCarModel(fullPathTree: string): string {
  if (!fullPathTree) return '';

  const parts = fullPathTree.split(',').map(p => p.trim());
  return parts.length >= 3 ? parts[parts.length - 1] : fullPathTree;
}

/**
 * ["Cadillac_V_lmdh", "Hypercar", "WEC2023"] -> "Hypercar"
 */
export function extractVehicleClass(classes: string[]): string {
  if (classes.length === 0) return '';

  const readable = classes.find(c => READABLE_CLASSES.includes(c));
  if (readable) return readable;

  return classes.length >= 2 ? classes[1] : classes[0];
}

/**
 * Client for the simulator's local REST API.
 *
 * Shared memory only knows the entry name of a car ("Team #7:LM"); the REST
 * API maps it to make/model, manufacturer, team and class. Vehicles are
 * fetched once per session and looked up from the cache during logging.
 */
export class VehicleMetadataClient {
  private client: AxiosInstance;
  private vehicleCache: Map<string, VehicleMetadata> | null = null;

  constructor(private readonly baseUrl: string = DEFAULT_REST_URL, client?: AxiosInstance) {
    this.client = client ?? axios.create({
      headers: {
        'Content-Type': 'application/json',
      },
    });
  }

  /**
   * Check if the REST API answers
   */
  async isAvailable(): Promise<boolean> {
    try {
      const response = await this.client.get(`${this.baseUrl}/rest/sessions`, { timeout: 1000 });
      return response.status === 200;
    } catch (error) {
      logger.debug('Vehicle REST API not reachable', describeError(error));
      return false;
    }
  }

  /**
   * Fetch all vehicles of the current session, keyed by entry name.
   * Results are cached; an unreachable API yields an empty map.
   */
  async fetchVehicleData(forceRefresh: boolean = false): Promise<Map<string, VehicleMetadata>> {
    if (!forceRefresh && this.vehicleCache) {
      return this.vehicleCache;
    }

    try {
      const response = await this.client.get<unknown>(`${this.baseUrl}/rest/sessions/getAllVehicles`, {
        timeout: 2000,
      });

      const lookup = new Map<string, VehicleMetadata>();
      const entries: unknown[] = Array.isArray(response.data) ? response.data : [];

      for (const raw of entries) {
        const vehicle = asRestVehicle(raw);
        if (!vehicle?.vehicle) continue;

        const fullPathTree = vehicle.fullPathTree ?? '';
        lookup.set(vehicle.vehicle, {
          carModel: extractCarModel(fullPathTree),
          manufacturer: vehicle.manufacturer ?? '',
          team: vehicle.team ?? '',
          vehicleClass: extractVehicleClass(vehicle.classes ?? []),
          fullPathTree,
        });
      }

      this.vehicleCache = lookup;
      logger.info(`Loaded metadata for ${lookup.size} vehicles`);
      return lookup;
    } catch (error) {
      logger.warn('Could not fetch vehicle data from REST API', describeError(error));
      return new Map();
    }
  }

  /**
   * Look up a vehicle by entry name (cache only, never blocks)
   */
  lookupVehicle(vehicleName: string): VehicleMetadata | null {
    return this.vehicleCache?.get(vehicleName) ?? null;
  }

  hasCache(): boolean {
    return this.vehicleCache !== null;
  }

  clearCache(): void {
    this.vehicleCache = null;
  }
}
