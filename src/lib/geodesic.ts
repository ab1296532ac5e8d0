/**
 * Direct geodesic problem on a spherical Earth.
 */
import { assertFinite } from './errors';
import type { GeoPosition } from './types';

export const EARTH_RADIUS_M = 6_371_000;

const toRadians = (deg: number) => (deg * Math.PI) / 180;
const toDegrees = (rad: number) => (rad * 180) / Math.PI;

/**
 * Point reached from (lat, lon) after travelling distanceMeters along the
 * initial bearing (degrees clockwise from north).
 *
 * Longitude is returned unwrapped and can leave [-180, 180]; use
 * wrapLongitude() where a normalized value is required.
 */
export function destination(
  lat: number,
  lon: number,
  bearingDeg: number,
  distanceMeters: number,
  radius: number = EARTH_RADIUS_M
): GeoPosition {
  assertFinite('latitude', lat);
  assertFinite('longitude', lon);
  assertFinite('bearing', bearingDeg);
  assertFinite('distance', distanceMeters);
  assertFinite('radius', radius);

  const lat1 = toRadians(lat);
  const lon1 = toRadians(lon);
  const theta = toRadians(bearingDeg);
  const delta = distanceMeters / radius;

  const lat2 = Math.asin(
    Math.sin(lat1) * Math.cos(delta) + Math.cos(lat1) * Math.sin(delta) * Math.cos(theta)
  );
  const lon2 =
    lon1 +
    Math.atan2(
      Math.sin(theta) * Math.sin(delta) * Math.cos(lat1),
      Math.cos(delta) - Math.sin(lat1) * Math.sin(lat2)
    );

  return { latitude: toDegrees(lat2), longitude: toDegrees(lon2) };
}

export function wrapLongitude(lon: number): number {
  const wrapped = ((((lon + 180) % 360) + 360) % 360) - 180;
  return wrapped === -180 && lon > 0 ? 180 : wrapped;
}
