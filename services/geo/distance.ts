import type { BoundingBox, GeoPoint } from "../search/types.js";

/** Mean Earth radius. */
export const EARTH_RADIUS_KM = 6371;

const toRad = (deg: number): number => (deg * Math.PI) / 180;
const toDeg = (rad: number): number => (rad * 180) / Math.PI;

/** Great-circle distance in kilometers (haversine). */
export function haversineKm(a: GeoPoint, b: GeoPoint): number {
  const dLat = toRad(b.lat - a.lat);
  const dLon = toRad(b.lon - a.lon);
  const h =
    Math.sin(dLat / 2) ** 2 +
    Math.cos(toRad(a.lat)) * Math.cos(toRad(b.lat)) * Math.sin(dLon / 2) ** 2;
  return 2 * EARTH_RADIUS_KM * Math.atan2(Math.sqrt(h), Math.sqrt(1 - h));
}

/** Display rounding: one decimal place. */
export function roundKm(km: number): number {
  return Math.round(km * 10) / 10;
}

/**
 * Latitude/longitude box containing every point within `radiusKm` of `center`.
 *
 * The longitude half-width is asin(sin(d) / cos(lat)), which covers the
 * circle's widest point poleward of the center. When the circle reaches a
 * pole or the box crosses ±180° the longitude bounds are left open.
 */
export function boundingBox(center: GeoPoint, radiusKm: number): BoundingBox {
  const angular = radiusKm / EARTH_RADIUS_KM;
  const dLat = toDeg(angular);
  const minLat = center.lat - dLat;
  const maxLat = center.lat + dLat;

  if (minLat <= -90 || maxLat >= 90) {
    return { minLat: Math.max(minLat, -90), maxLat: Math.min(maxLat, 90), minLon: null, maxLon: null };
  }

  const ratio = Math.sin(angular) / Math.cos(toRad(center.lat));
  if (ratio >= 1) {
    return { minLat, maxLat, minLon: null, maxLon: null };
  }

  const dLon = toDeg(Math.asin(ratio));
  const minLon = center.lon - dLon;
  const maxLon = center.lon + dLon;
  if (minLon < -180 || maxLon > 180) {
    return { minLat, maxLat, minLon: null, maxLon: null };
  }

  return { minLat, maxLat, minLon, maxLon };
}
