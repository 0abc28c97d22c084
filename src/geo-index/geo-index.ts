/**
 * Geo Index
 * In-memory spatial index over registered locations answering radius queries
 */

import { Coordinates, Location, NearbyLocation } from '../types';
import { EARTH_RADIUS_KM } from '../shared/config/constants';
import { ValidationError, errorMessage } from '../shared/utils/errors';
import { assertValidCoordinates, assertLocationId } from '../shared/utils/validation';
import { Logger, createLogger } from '../shared/utils/logger';
import { LocationEnumerator } from '../data-access/weather-store';

// Kilometres per degree of latitude
const KM_PER_DEGREE = (Math.PI * EARTH_RADIUS_KM) / 180;

function toRadians(degrees: number): number {
  return (degrees * Math.PI) / 180;
}

function compareIds(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/**
 * Great-circle distance in kilometres
 */
export function haversineKm(from: Coordinates, to: Coordinates): number {
  const dLat = toRadians(to.latitude - from.latitude);
  const dLon = toRadians(to.longitude - from.longitude);
  const a =
    Math.sin(dLat / 2) ** 2 +
    Math.cos(toRadians(from.latitude)) * Math.cos(toRadians(to.latitude)) * Math.sin(dLon / 2) ** 2;
  const c = 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));
  return EARTH_RADIUS_KM * c;
}

export class GeoIndex {
  private locations = new Map<string, Location>();
  private logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger ?? createLogger('GeoIndex');
  }

  /**
   * Build an index from every location the store knows about
   */
  static async rebuild(source: LocationEnumerator, logger?: Logger): Promise<GeoIndex> {
    const index = new GeoIndex(logger);
    const locations = await source.listLocations();
    let skipped = 0;
    for (const location of locations) {
      try {
        index.register(location);
      } catch (error) {
        skipped++;
        index.logger.warn('Skipping location with invalid coordinates', {
          locationId: location.locationId,
          reason: errorMessage(error),
        });
      }
    }
    index.logger.info('Geo index rebuilt', { registered: index.size, skipped });
    return index;
  }

  /**
   * Add or replace a location. Nothing is mutated when validation fails.
   */
  register(location: Location): void {
    assertLocationId(location.locationId);
    assertValidCoordinates(location);
    this.locations.set(location.locationId, { ...location });
  }

  unregister(locationId: string): boolean {
    return this.locations.delete(locationId);
  }

  get(locationId: string): Location | undefined {
    return this.locations.get(locationId);
  }

  get size(): number {
    return this.locations.size;
  }

  /**
   * Locations within `radiusKm` of `center`, nearest first, ties broken by id
   */
  nearby(center: Coordinates, radiusKm: number): NearbyLocation[] {
    assertValidCoordinates(center);
    if (!Number.isFinite(radiusKm) || radiusKm < 0) {
      throw new ValidationError(`Radius must be a non-negative number of kilometres, got ${radiusKm}`, { radiusKm });
    }

    // Latitude band pre-filter; longitude is left to the exact distance
    const latitudeSpan = radiusKm / KM_PER_DEGREE;
    const minLatitude = center.latitude - latitudeSpan;
    const maxLatitude = center.latitude + latitudeSpan;

    const matches: NearbyLocation[] = [];
    for (const location of this.locations.values()) {
      if (location.latitude < minLatitude || location.latitude > maxLatitude) continue;
      const distanceKm = haversineKm(center, location);
      if (distanceKm <= radiusKm) {
        matches.push({ location, distanceKm });
      }
    }

    return matches.sort((a, b) => a.distanceKm - b.distanceKm || compareIds(a.location.locationId, b.location.locationId));
  }
}
