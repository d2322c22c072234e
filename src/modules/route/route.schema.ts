/**
 * =============================================================================
 * ROUTE MODULE - SCHEMAS & TYPES
 * =============================================================================
 *
 * Wire format is snake_case; records are camelCase.
 *
 * EXAMPLE request:
 *   POST /api/route
 *   { "start_lat": -51.7, "start_lon": -57.8, "end_lat": -67.6, "end_lon": -68.1,
 *     "start_name": "Stanley", "end_name": "Rothera" }
 * =============================================================================
 */

import { z } from 'zod';
import { TaskState } from '../../core/constants';
import { RouteInfo, RouteRecord } from '../../shared/database/db';
import { Position, RouteFeatureCollection } from '../../shared/types/geo.types';

// =============================================================================
// REQUEST SCHEMAS
// =============================================================================

const latitudeSchema = z.number().min(-90).max(90);
const longitudeSchema = z.number().min(-180).max(180);
const placeNameSchema = z.string().max(200).nullish().transform(name => name ?? null);

export const routeRequestSchema = z.object({
  start_lat: latitudeSchema,
  start_lon: longitudeSchema,
  end_lat: latitudeSchema,
  end_lon: longitudeSchema,
  start_name: placeNameSchema,
  end_name: placeNameSchema,
  force_recalculate: z.boolean().default(false),
});

export type RouteRequest = z.infer<typeof routeRequestSchema>;

/**
 * GeoJSON position: [lon, lat, ...extra]. Extra ordinates are dropped.
 */
const positionSchema = z
  .array(z.number())
  .min(2)
  .transform((values): Position => [values[0], values[1]]);

const routeFeatureSchema = z.object({
  type: z.literal('Feature'),
  geometry: z.object({
    type: z.literal('LineString'),
    coordinates: z.array(positionSchema).min(1),
  }),
  properties: z.record(z.unknown()).nullish().transform(
    (properties): Record<string, unknown> => properties ?? { from: 'Start', to: 'End' }
  ),
});

export const evaluateRouteRequestSchema = z.object({
  route: z.object({
    type: z.literal('FeatureCollection'),
    features: z.array(routeFeatureSchema).min(1),
  }),
});

export type EvaluateRouteRequest = z.infer<typeof evaluateRouteRequestSchema>;

// =============================================================================
// RESPONSE SHAPES
// =============================================================================

export interface RoutePayload {
  id: number;
  requested: string;
  calculated: string | null;
  file: string | null;
  info: RouteInfo | null;
  mesh: number | null;
  start_lat: number;
  start_lon: number;
  end_lat: number;
  end_lon: number;
  start_name: string | null;
  end_name: string | null;
  json: RouteFeatureCollection | null;
  json_unsmoothed: RouteFeatureCollection | null;
  engine_version: string | null;
}

/**
 * Status of one job: `id` is the job id, `route_id` the route it computes
 */
export interface RouteStatus extends Omit<RoutePayload, 'id'> {
  id: string;
  route_id: number;
  status: TaskState;
  error?: string | null;
}

export interface NoMeshResponse {
  status: TaskState.FAILURE;
  info: { error: string };
}

export interface ExistingRouteResponse extends Omit<RoutePayload, 'id' | 'info'> {
  id: string;
  route_id: number;
  info: { info: string };
  'status-url': string;
}

export interface DispatchedRouteResponse {
  id: string;
  'status-url': string;
}

export interface RouteEvaluation {
  route: RouteFeatureCollection;
  time_days: number;
  time_str: string;
  fuel_tonnes: number;
}

export const NO_SUITABLE_MESH = 'No suitable mesh available.';

export const EXISTING_ROUTE_NOTE =
  "Pre-existing route found and returned. To force new calculation, include 'force_recalculate': true in POST request.";

export function toRoutePayload(route: RouteRecord): RoutePayload {
  return {
    id: route.id,
    requested: route.requested,
    calculated: route.calculated,
    file: route.file,
    info: route.info,
    mesh: route.meshId,
    start_lat: route.startLat,
    start_lon: route.startLon,
    end_lat: route.endLat,
    end_lon: route.endLon,
    start_name: route.startName,
    end_name: route.endName,
    json: route.json,
    json_unsmoothed: route.jsonUnsmoothed,
    engine_version: route.engineVersion,
  };
}
