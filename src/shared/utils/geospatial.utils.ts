/**
 * =============================================================================
 * GEOSPATIAL UTILITIES - Haversine Distance & Bounding Boxes
 * =============================================================================
 *
 * Pure functions, no I/O. Shared by route matching, mesh selection and the
 * great-circle engine.
 *
 * =============================================================================
 */

import { NAVIGATION } from '../../core/constants';
import { BoundingBox, GeoPoint } from '../types/geo.types';

/**
 * Great-circle distance in nautical miles
 */
export function haversineDistanceNm(a: GeoPoint, b: GeoPoint): number {
  return centralAngle(a.lat, a.lon, b.lat, b.lon) * NAVIGATION.EARTH_RADIUS_NM;
}

/**
 * Angle subtended at the Earth's centre by two points (radians)
 */
function centralAngle(lat1: number, lon1: number, lat2: number, lon2: number): number {
  const dLat = toRadians(lat2 - lat1);
  const dLon = toRadians(lon2 - lon1);

  const a =
    Math.sin(dLat / 2) * Math.sin(dLat / 2) +
    Math.cos(toRadians(lat1)) *
      Math.cos(toRadians(lat2)) *
      Math.sin(dLon / 2) *
      Math.sin(dLon / 2);

  return 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));
}

/**
 * Inclusive containment: a point on any edge of the box is inside it
 */
export function boxContains(box: BoundingBox, point: GeoPoint): boolean {
  return (
    box.latMin <= point.lat &&
    point.lat <= box.latMax &&
    box.lonMin <= point.lon &&
    point.lon <= box.lonMax
  );
}

/**
 * Area of a box in square degrees
 */
export function boxArea(box: BoundingBox): number {
  return (box.latMax - box.latMin) * (box.lonMax - box.lonMin);
}

/**
 * Smallest box holding every point
 */
export function boundingBoxOf(points: GeoPoint[]): BoundingBox {
  if (points.length === 0) {
    throw new Error('Cannot compute the bounding box of zero points');
  }
  return {
    latMin: Math.min(...points.map(p => p.lat)),
    latMax: Math.max(...points.map(p => p.lat)),
    lonMin: Math.min(...points.map(p => p.lon)),
    lonMax: Math.max(...points.map(p => p.lon)),
  };
}

/**
 * Point at `fraction` (0..1) of the way along the great circle from a to b
 */
export function interpolateGreatCircle(a: GeoPoint, b: GeoPoint, fraction: number): GeoPoint {
  const delta = centralAngle(a.lat, a.lon, b.lat, b.lon);
  if (delta === 0) return { lat: a.lat, lon: a.lon };

  const lat1 = toRadians(a.lat);
  const lon1 = toRadians(a.lon);
  const lat2 = toRadians(b.lat);
  const lon2 = toRadians(b.lon);

  const wa = Math.sin((1 - fraction) * delta) / Math.sin(delta);
  const wb = Math.sin(fraction * delta) / Math.sin(delta);

  const x = wa * Math.cos(lat1) * Math.cos(lon1) + wb * Math.cos(lat2) * Math.cos(lon2);
  const y = wa * Math.cos(lat1) * Math.sin(lon1) + wb * Math.cos(lat2) * Math.sin(lon2);
  const z = wa * Math.sin(lat1) + wb * Math.sin(lat2);

  return {
    lat: toDegrees(Math.atan2(z, Math.sqrt(x * x + y * y))),
    lon: toDegrees(Math.atan2(y, x)),
  };
}

/**
 * Convert degrees to radians
 */
function toRadians(degrees: number): number {
  return degrees * (Math.PI / 180);
}

function toDegrees(radians: number): number {
  return radians * (180 / Math.PI);
}
