/**
 * Spherical-earth geodesy helpers.
 */

/** Mean earth radius in km. */
export const EARTH_RADIUS_KM = 6371;

export const SECONDS_PER_DAY = 86400;

const RAD = Math.PI / 180;

/**
 * Great-circle distance in km between two lat/lng points (haversine).
 * Longitudes may be given on either side of the antimeridian.
 */
export function haversineKm(
  lat1: number,
  lng1: number,
  lat2: number,
  lng2: number,
): number {
  const sinDLat = Math.sin(((lat2 - lat1) * RAD) / 2);
  const sinDLng = Math.sin(((lng2 - lng1) * RAD) / 2);
  const h =
    sinDLat * sinDLat +
    Math.cos(lat1 * RAD) * Math.cos(lat2 * RAD) * sinDLng * sinDLng;
  // Rounding can push h past 1 for antipodal pairs
  return 2 * EARTH_RADIUS_KM * Math.asin(Math.sqrt(Math.min(1, h)));
}

/** Distance between two entries of an interleaved [lng0, lat0, lng1, lat1, ...] buffer. */
export function coordDistanceKm(
  coords: Float64Array,
  a: number,
  b: number,
): number {
  return haversineKm(
    coords[a * 2 + 1],
    coords[a * 2],
    coords[b * 2 + 1],
    coords[b * 2],
  );
}
