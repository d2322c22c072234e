/**
 * =============================================================================
 * GEO TYPES - Coordinates, waypoints and GeoJSON route shapes
 * =============================================================================
 *
 * GeoJSON positions are [longitude, latitude]. Everything else in the code
 * base passes latitude first.
 * =============================================================================
 */

export interface GeoPoint {
  lat: number;
  lon: number;
}

/** [longitude, latitude] */
export type Position = [number, number];

export interface LineStringGeometry {
  type: 'LineString';
  coordinates: Position[];
}

export interface RouteFeature {
  type: 'Feature';
  geometry: LineStringGeometry;
  properties: Record<string, unknown>;
}

export interface RouteFeatureCollection {
  type: 'FeatureCollection';
  features: RouteFeature[];
}

/**
 * Opaque mesh document - only the navigation engine looks inside
 */
export type MeshDocument = Record<string, unknown>;

/**
 * A named point handed to the navigation engine
 */
export interface Waypoint extends GeoPoint {
  name: string;
  isSource: boolean;
  isDestination: boolean;
}

/**
 * Axis-aligned latitude/longitude box (inclusive bounds)
 */
export interface BoundingBox {
  latMin: number;
  latMax: number;
  lonMin: number;
  lonMax: number;
}
