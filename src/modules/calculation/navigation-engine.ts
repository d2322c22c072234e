/**
 * =============================================================================
 * NAVIGATION ENGINE - Boundary to the path-optimization library
 * =============================================================================
 *
 * The optimizer is a black box. It is split in two calls so the caller can
 * persist the unsmoothed path before smoothing starts:
 *
 *   computeUnsmoothed(mesh, waypoints)  → shortest path through the mesh
 *   smooth(mesh, unsmoothed, waypoints) → final route
 *
 * `evaluate` runs a fixed route over a mesh and annotates every position with
 * cumulative travel time (days) and fuel (tonnes).
 *
 * Calls may be long and CPU bound and expose no cancellation point. The
 * server runs them on worker threads (ThreadedNavigationEngine).
 * =============================================================================
 */

import { MeshDocument, RouteFeatureCollection, Waypoint } from '../../shared/types/geo.types';

export interface NavigationEngine {
  /** Stored on every route the engine produced */
  readonly version: string;

  computeUnsmoothed(mesh: MeshDocument, waypoints: Waypoint[]): Promise<RouteFeatureCollection>;

  smooth(
    mesh: MeshDocument,
    unsmoothed: RouteFeatureCollection,
    waypoints: Waypoint[]
  ): Promise<RouteFeatureCollection>;

  /**
   * Returns the route with `traveltime` and `fuel` arrays (one entry per
   * position, cumulative) in the first feature's properties
   */
  evaluate(mesh: MeshDocument, route: RouteFeatureCollection): Promise<RouteFeatureCollection>;

  /** Release threads or other resources held by the engine */
  close?(): Promise<void>;
}

/**
 * Start → End waypoint pair for a single route request
 */
export function buildWaypoints(
  start: { lat: number; lon: number; name?: string | null },
  end: { lat: number; lon: number; name?: string | null }
): Waypoint[] {
  return [
    { name: start.name || 'Start', lat: start.lat, lon: start.lon, isSource: true, isDestination: false },
    { name: end.name || 'End', lat: end.lat, lon: end.lon, isSource: false, isDestination: true },
  ];
}
