import { Knex } from 'knex';
import { getDb } from '../config/database';
import { StationRepository } from '../repositories/station.repository';
import { Station, StationDistance } from '../types';
import { Errors } from '../utils/error-handler.util';

const EARTH_RADIUS_KM = 6371;
export const MAX_NEARBY_LIMIT = 50;

const toRadians = (degrees: number) => (degrees * Math.PI) / 180;

/**
 * Great-circle distance in kilometres (haversine).
 */
export function haversineKm(lat1: number, lon1: number, lat2: number, lon2: number): number {
  const dLat = toRadians(lat2 - lat1);
  const dLon = toRadians(lon2 - lon1);
  const a =
    Math.sin(dLat / 2) ** 2 + Math.cos(toRadians(lat1)) * Math.cos(toRadians(lat2)) * Math.sin(dLon / 2) ** 2;
  return 2 * EARTH_RADIUS_KM * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));
}

/**
 * Order stations by distance from a point; equal distances fall back to station code.
 */
export function rankByDistance(stations: Station[], latitude: number, longitude: number): StationDistance[] {
  return stations
    .map((station) => ({
      station,
      distance_km: haversineKm(latitude, longitude, station.latitude, station.longitude),
    }))
    .sort((a, b) => a.distance_km - b.distance_km || a.station.code.localeCompare(b.station.code));
}

export interface NearbyOptions {
  limit?: number;
  max_distance_km?: number;
}

export class StationService {
  private repository: StationRepository;

  constructor(db: Knex = getDb()) {
    this.repository = new StationRepository(db);
  }

  async nearestStations(latitude: number, longitude: number, options: NearbyOptions = {}): Promise<StationDistance[]> {
    if (!Number.isFinite(latitude) || latitude < -90 || latitude > 90) {
      throw Errors.invalidInput('Latitude must be between -90 and 90');
    }
    if (!Number.isFinite(longitude) || longitude < -180 || longitude > 180) {
      throw Errors.invalidInput('Longitude must be between -180 and 180');
    }

    const limit = Math.min(MAX_NEARBY_LIMIT, Math.max(1, Math.trunc(options.limit ?? 5)));
    const stations = await this.repository.findActiveWithInventory();
    const ranked = rankByDistance(stations, latitude, longitude);
    const maxDistance = options.max_distance_km;
    const inRange = maxDistance === undefined ? ranked : ranked.filter((entry) => entry.distance_km <= maxDistance);

    return inRange.slice(0, limit).map((entry) => ({
      station: entry.station,
      distance_km: Math.round(entry.distance_km * 100) / 100,
    }));
  }

  /**
   * Active station by id, or NOT_FOUND.
   */
  async requireStation(stationId: string, executor?: Knex): Promise<Station> {
    const station = await this.repository.findById(stationId, executor);
    if (!station || !station.is_active) {
      throw Errors.notFound('Station', stationId);
    }
    return station;
  }

  async getByCode(code: string): Promise<Station> {
    const station = await this.repository.findByCode(code.trim().toUpperCase());
    if (!station) {
      throw Errors.notFound('Station', code);
    }
    return station;
  }
}
