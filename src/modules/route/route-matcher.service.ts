/**
 * =============================================================================
 * ROUTE MATCHER - Reuse of already requested routes
 * =============================================================================
 *
 * Candidate meshes come in preference order. The FIRST mesh that has any
 * route at all decides the outcome:
 *
 *   - exact match on all four coordinates → lowest id
 *   - otherwise the closest route within tolerance on that same mesh
 *
 * Later meshes are never consulted once one with routes was found, even if
 * the tolerance search on it comes back empty.
 * =============================================================================
 */

import { MeshRecord, RouteRecord } from '../../shared/database/db';
import { IRouteRepository } from '../../shared/database/repository.interface';
import { logger } from '../../shared/services/logger.service';
import { haversineDistanceNm } from '../../shared/utils/geospatial.utils';

/**
 * Closest route whose start AND end are each strictly within `toleranceNm`
 * of the requested ones. Several qualifiers: smallest summed distance wins,
 * then lowest id.
 */
export function closestWithinTolerance(
  routes: RouteRecord[],
  startLat: number,
  startLon: number,
  endLat: number,
  endLon: number,
  toleranceNm: number
): RouteRecord | null {
  const start = { lat: startLat, lon: startLon };
  const end = { lat: endLat, lon: endLon };

  let best: { route: RouteRecord; total: number } | null = null;

  for (const route of routes) {
    const startDistance = haversineDistanceNm(start, { lat: route.startLat, lon: route.startLon });
    const endDistance = haversineDistanceNm(end, { lat: route.endLat, lon: route.endLon });
    if (startDistance >= toleranceNm || endDistance >= toleranceNm) continue;

    const total = startDistance + endDistance;
    if (
      best === null ||
      total < best.total ||
      (total === best.total && route.id < best.route.id)
    ) {
      best = { route, total };
    }
  }

  return best?.route ?? null;
}

const isExactMatch = (
  route: RouteRecord,
  startLat: number,
  startLon: number,
  endLat: number,
  endLon: number
): boolean =>
  route.startLat === startLat &&
  route.startLon === startLon &&
  route.endLat === endLat &&
  route.endLon === endLon;

export class RouteMatcherService {
  constructor(
    private readonly routes: IRouteRepository,
    private readonly toleranceNm: number
  ) {}

  async findExistingRoute(
    meshCandidates: MeshRecord[],
    startLat: number,
    startLon: number,
    endLat: number,
    endLon: number
  ): Promise<RouteRecord | null> {
    for (const mesh of meshCandidates) {
      const routes = await this.routes.findByMesh(mesh.id);
      if (routes.length === 0) continue;

      const exact = routes
        .filter(route => isExactMatch(route, startLat, startLon, endLat, endLon))
        .sort((a, b) => a.id - b.id);

      if (exact.length > 0) {
        if (exact.length > 1) {
          logger.warn(`[RouteMatcher] ${exact.length} identical routes on mesh ${mesh.id}, using ${exact[0].id}`);
        }
        return exact[0];
      }

      const close = closestWithinTolerance(routes, startLat, startLon, endLat, endLon, this.toleranceNm);
      if (close) {
        logger.debug(`[RouteMatcher] Route ${close.id} within ${this.toleranceNm} nm on mesh ${mesh.id}`);
      }
      return close;
    }

    return null;
  }
}
