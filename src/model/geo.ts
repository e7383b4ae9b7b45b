import { CanonicalEntity, EntityPayload, GeoPoint } from '../types/canonical';

const EARTH_RADIUS_METERS = 6371000;

const toRadians = (degrees: number): number => (degrees * Math.PI) / 180;

/** Great-circle distance in meters */
export function haversineMeters(a: GeoPoint, b: GeoPoint): number {
  const dLat = toRadians(b.latitude - a.latitude);
  const dLon = toRadians(b.longitude - a.longitude);
  const h =
    Math.sin(dLat / 2) ** 2 +
    Math.cos(toRadians(a.latitude)) * Math.cos(toRadians(b.latitude)) * Math.sin(dLon / 2) ** 2;
  return 2 * EARTH_RADIUS_METERS * Math.asin(Math.min(1, Math.sqrt(h)));
}

export function roundCoordinate(value: number): number {
  return Math.round(value * 1e6) / 1e6;
}

/** Coordinates carried by an entity, if its kind has any */
export function coordinatesOf(entity: EntityPayload | CanonicalEntity): GeoPoint | undefined {
  switch (entity.kind) {
    case 'File':
      return entity.attributes.geo;
    case 'Event': {
      const location = entity.attributes.location;
      if (location && location.latitude !== undefined && location.longitude !== undefined) {
        return { latitude: location.latitude, longitude: location.longitude };
      }
      return undefined;
    }
    case 'LocationSample':
      return { latitude: entity.attributes.latitude, longitude: entity.attributes.longitude };
    default:
      return undefined;
  }
}
