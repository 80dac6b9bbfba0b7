import type { GeoPoint } from "../types.js";

/** Mean Earth radius used for all great-circle distances. */
export const EARTH_RADIUS_KM = 6371.0;

const toRadians = (deg: number) => (deg * Math.PI) / 180;

/**
 * Great-circle distance in kilometers (haversine). Symmetric and never negative.
 * Coordinates must already be validated; out-of-range input is not checked here.
 */
export function haversineKm(a: GeoPoint, b: GeoPoint): number {
  const lat1 = toRadians(a.latitude);
  const lat2 = toRadians(b.latitude);
  const dLat = lat2 - lat1;
  const dLon = toRadians(b.longitude - a.longitude);

  const h =
    Math.sin(dLat / 2) ** 2 +
    Math.cos(lat1) * Math.cos(lat2) * Math.sin(dLon / 2) ** 2;

  return EARTH_RADIUS_KM * 2 * Math.atan2(Math.sqrt(h), Math.sqrt(1 - h));
}
