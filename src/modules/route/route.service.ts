/**
 * =============================================================================
 * ROUTE SERVICE - Request resolution and route evaluation
 * =============================================================================
 *
 * requestRoute:
 *   select meshes → none?              → FAILURE payload (not an error)
 *                 → existing route?    → return it (unless forced)
 *                 → else               → create route on the preferred mesh,
 *                                        dispatch a calculation job
 *
 * There is no lock between "look for an existing route" and "create one":
 * two identical requests arriving together may both dispatch.
 * =============================================================================
 */

import { ErrorCode, HTTP_STATUS, TaskState } from '../../core/constants';
import { AppError, errorMessage } from '../../core/errors/AppError';
import { IJobRepository, IRouteRepository } from '../../shared/database/repository.interface';
import { logger } from '../../shared/services/logger.service';
import { RouteFeatureCollection } from '../../shared/types/geo.types';
import { boundingBoxOf } from '../../shared/utils/geospatial.utils';
import { NavigationEngine } from '../calculation/navigation-engine';
import { JobService } from '../job/job.service';
import { MeshService } from '../mesh/mesh.service';
import { RouteMatcherService } from './route-matcher.service';
import {
  DispatchedRouteResponse,
  EvaluateRouteRequest,
  EXISTING_ROUTE_NOTE,
  ExistingRouteResponse,
  NO_SUITABLE_MESH,
  NoMeshResponse,
  RouteEvaluation,
  RouteRequest,
  toRoutePayload
} from './route.schema';

export type RouteRequestOutcome =
  | { kind: 'no-mesh'; body: NoMeshResponse }
  | { kind: 'existing'; body: ExistingRouteResponse }
  | { kind: 'dispatched'; body: DispatchedRouteResponse };

export interface RouteServiceDeps {
  meshService: MeshService;
  matcher: RouteMatcherService;
  jobService: JobService;
  routes: IRouteRepository;
  jobs: IJobRepository;
  engine: NavigationEngine;
}

export const noSuitableMesh = (): NoMeshResponse => ({
  status: TaskState.FAILURE,
  info: { error: NO_SUITABLE_MESH },
});

/**
 * Decimal days → "<d> days <h> hours <m> minutes"
 *
 * @example
 * formatDecimalDays(1.5)  // "1 days 12 hours 0 minutes"
 */
export function formatDecimalDays(decimalDays: number): string {
  const totalMinutes = Math.round(decimalDays * 24 * 60);
  const days = Math.floor(totalMinutes / (24 * 60));
  const hours = Math.floor((totalMinutes % (24 * 60)) / 60);
  const minutes = totalMinutes % 60;
  return `${days} days ${hours} hours ${minutes} minutes`;
}

function lastNumber(value: unknown): number {
  if (!Array.isArray(value) || value.length === 0) {
    throw new Error('Evaluated route is missing cumulative values');
  }
  const last: unknown = value[value.length - 1];
  if (typeof last !== 'number') {
    throw new Error('Evaluated route is missing cumulative values');
  }
  return last;
}

export class RouteService {
  constructor(private readonly deps: RouteServiceDeps) {}

  async requestRoute(
    request: RouteRequest,
    statusUrl: (jobId: string) => string
  ): Promise<RouteRequestOutcome> {
    const { meshService, matcher, jobService, routes, jobs } = this.deps;
    const { start_lat, start_lon, end_lat, end_lon } = request;

    const meshes = await meshService.selectMesh(start_lat, start_lon, end_lat, end_lon);
    if (meshes.length === 0) {
      logger.info(`[RouteService] No suitable mesh for (${start_lat}, ${start_lon}) → (${end_lat}, ${end_lon})`);
      return { kind: 'no-mesh', body: noSuitableMesh() };
    }

    const existing = await matcher.findExistingRoute(meshes, start_lat, start_lon, end_lat, end_lon);

    if (existing && !request.force_recalculate) {
      const job = await jobs.findLatestForRoute(existing.id);
      if (job) {
        logger.info(`[RouteService] Returning existing route ${existing.id} (job ${job.id})`);
        const { id: routeId, ...payload } = toRoutePayload(existing);
        return {
          kind: 'existing',
          body: {
            ...payload,
            id: job.id,
            route_id: routeId,
            info: { info: EXISTING_ROUTE_NOTE },
            'status-url': statusUrl(job.id),
          },
        };
      }
      // A route without any job cannot be polled; calculate it afresh
      logger.warn(`[RouteService] Existing route ${existing.id} has no job, recalculating`);
    } else if (existing) {
      logger.info(`[RouteService] Route ${existing.id} exists but force_recalculate set, recalculating`);
    }

    const route = await routes.create({
      requested: new Date().toISOString(),
      calculated: null,
      file: null,
      info: null,
      meshId: meshes[0].id,
      startLat: start_lat,
      startLon: start_lon,
      endLat: end_lat,
      endLon: end_lon,
      startName: request.start_name,
      endName: request.end_name,
      jsonUnsmoothed: null,
      json: null,
      engineVersion: null,
    });

    const job = await jobService.dispatch(route);
    return {
      kind: 'dispatched',
      body: { id: job.id, 'status-url': statusUrl(job.id) },
    };
  }

  /**
   * Travel time and fuel of a given route, on the best mesh covering all of
   * its coordinates. Runs inline.
   */
  async evaluateRoute(request: EvaluateRouteRequest): Promise<RouteEvaluation | NoMeshResponse> {
    const { meshService, engine } = this.deps;
    const route: RouteFeatureCollection = request.route;

    const box = boundingBoxOf(
      route.features[0].geometry.coordinates.map(([lon, lat]) => ({ lat, lon }))
    );
    const meshes = await meshService.selectMesh(box.latMin, box.lonMin, box.latMax, box.lonMax);
    if (meshes.length === 0) {
      return noSuitableMesh();
    }

    const mesh = meshes[0];
    try {
      const evaluated = await engine.evaluate(mesh.json, route);
      const properties = evaluated.features[0]?.properties ?? {};
      const timeDays = lastNumber(properties.traveltime);
      const fuel = lastNumber(properties.fuel);

      return {
        route: evaluated,
        time_days: timeDays,
        time_str: formatDecimalDays(timeDays),
        fuel_tonnes: Math.round(fuel * 100) / 100,
      };
    } catch (error) {
      logger.error(`[RouteService] Route evaluation on mesh ${mesh.id} failed: ${errorMessage(error)}`);
      throw new AppError(
        'Route evaluation failed',
        HTTP_STATUS.UNPROCESSABLE,
        ErrorCode.CALCULATION_FAILED,
        true,
        { meshId: mesh.id, reason: errorMessage(error) }
      );
    }
  }
}
