/**
 * =============================================================================
 * GREAT-CIRCLE ENGINE - Fallback navigation engine
 * =============================================================================
 *
 * Used when no mesh-aware optimizer is plugged in (same idea as a Haversine
 * fallback for a road-routing API). It ignores the mesh content:
 *
 * - Unsmoothed: one straight segment per source → destination pair
 * - Smoothed:   the same segments densified along the great circle every
 *               `segmentNm` nautical miles
 * - Evaluate:   constant speed and constant fuel burn per day
 * =============================================================================
 */

import { z } from 'zod';
import {
  GeoPoint,
  MeshDocument,
  Position,
  RouteFeature,
  RouteFeatureCollection,
  Waypoint
} from '../../shared/types/geo.types';
import { haversineDistanceNm, interpolateGreatCircle } from '../../shared/utils/geospatial.utils';
import { NavigationEngine } from './navigation-engine';

export const greatCircleEngineOptionsSchema = z.object({
  segmentNm: z.number().positive(),
  speedKnots: z.number().positive(),
  fuelTonnesPerDay: z.number().nonnegative(),
});

export type GreatCircleEngineOptions = z.infer<typeof greatCircleEngineOptionsSchema>;

export const GREAT_CIRCLE_ENGINE_VERSION = 'great-circle/1.0.0';

const toPoint = ([lon, lat]: Position): GeoPoint => ({ lat, lon });
const toPosition = (point: GeoPoint): Position => [point.lon, point.lat];

/**
 * Cumulative distance (nm) at each position of a line
 */
export function cumulativeDistancesNm(coordinates: Position[]): number[] {
  const distances: number[] = [];
  let total = 0;
  coordinates.forEach((position, i) => {
    if (i > 0) {
      total += haversineDistanceNm(toPoint(coordinates[i - 1]), toPoint(position));
    }
    distances.push(total);
  });
  return distances;
}

export class GreatCircleEngine implements NavigationEngine {
  readonly version = GREAT_CIRCLE_ENGINE_VERSION;

  constructor(private readonly options: GreatCircleEngineOptions) {}

  async computeUnsmoothed(_mesh: MeshDocument, waypoints: Waypoint[]): Promise<RouteFeatureCollection> {
    const sources = waypoints.filter(w => w.isSource);
    const destinations = waypoints.filter(w => w.isDestination);

    if (sources.length === 0 || destinations.length === 0) {
      throw new Error('At least one source and one destination waypoint are required');
    }

    const features: RouteFeature[] = [];
    for (const source of sources) {
      for (const destination of destinations) {
        const distance = haversineDistanceNm(source, destination);
        features.push({
          type: 'Feature',
          geometry: {
            type: 'LineString',
            coordinates: [toPosition(source), toPosition(destination)],
          },
          properties: {
            from: source.name,
            to: destination.name,
            distance_nm: distance,
          },
        });
      }
    }

    return { type: 'FeatureCollection', features };
  }

  async smooth(
    _mesh: MeshDocument,
    unsmoothed: RouteFeatureCollection,
    _waypoints: Waypoint[]
  ): Promise<RouteFeatureCollection> {
    return {
      type: 'FeatureCollection',
      features: unsmoothed.features.map(feature => {
        const coordinates = this.densify(feature.geometry.coordinates);
        const distances = cumulativeDistancesNm(coordinates);
        return {
          type: 'Feature',
          geometry: { type: 'LineString', coordinates },
          properties: {
            ...feature.properties,
            distance_nm: distances[distances.length - 1],
          },
        };
      }),
    };
  }

  async evaluate(_mesh: MeshDocument, route: RouteFeatureCollection): Promise<RouteFeatureCollection> {
    const hoursPerDay = 24;
    return {
      type: 'FeatureCollection',
      features: route.features.map(feature => {
        const distances = cumulativeDistancesNm(feature.geometry.coordinates);
        const traveltime = distances.map(d => d / this.options.speedKnots / hoursPerDay);
        const fuel = traveltime.map(days => days * this.options.fuelTonnesPerDay);
        return {
          ...feature,
          properties: {
            ...feature.properties,
            distance: distances,
            traveltime,
            fuel,
          },
        };
      }),
    };
  }

  /**
   * Insert great-circle points so no step is longer than segmentNm
   */
  private densify(coordinates: Position[]): Position[] {
    if (coordinates.length < 2) return [...coordinates];

    const result: Position[] = [coordinates[0]];
    for (let i = 1; i < coordinates.length; i++) {
      const from = toPoint(coordinates[i - 1]);
      const to = toPoint(coordinates[i]);
      const steps = Math.max(1, Math.ceil(haversineDistanceNm(from, to) / this.options.segmentNm));
      for (let step = 1; step < steps; step++) {
        result.push(toPosition(interpolateGreatCircle(from, to, step / steps)));
      }
      result.push(coordinates[i]);
    }
    return result;
  }
}
