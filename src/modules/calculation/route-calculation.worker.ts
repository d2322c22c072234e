/**
 * =============================================================================
 * ROUTE CALCULATION WORKER
 * =============================================================================
 *
 * Executes one queued route calculation:
 *
 *   1. Load route + mesh
 *   2. Unsmoothed path → persisted immediately (checkpoint)
 *   3. Smoothed path  → persisted as the final result
 *
 * The server hands this worker a ThreadedNavigationEngine; engine calls here
 * only wait on a thread.
 *
 * A smoothing failure never loses the checkpoint. Every failure is written
 * to the route's info as { error } and reported to the queue as a terminal
 * FAILURE (no retry).
 * =============================================================================
 */

import * as fs from 'fs';
import { promisify } from 'util';
import * as zlib from 'zlib';
import { z } from 'zod';
import { errorMessage } from '../../core/errors/AppError';
import { QUEUES } from '../../core/constants';
import { IMeshRepository, IRouteRepository } from '../../shared/database/repository.interface';
import { logger } from '../../shared/services/logger.service';
import { JobProcessor, QueueJob } from '../../shared/services/queue.service';
import { meshDocumentSchema } from '../../shared/types/geo.schema';
import { MeshDocument, RouteFeatureCollection } from '../../shared/types/geo.types';
import { buildWaypoints, NavigationEngine } from './navigation-engine';

// =============================================================================
// TYPES
// =============================================================================

/**
 * Where the worker reads the mesh from
 */
export type MeshSource =
  | { kind: 'file'; path: string }
  | { kind: 'mesh'; meshId: number };

export type CalculationResult =
  | { ok: true; geometry: RouteFeatureCollection }
  | { ok: false; error: string };

export const CALCULATE_ROUTE_TASK = 'calculate-route';

/**
 * Payload carried by a queued calculation
 */
export const calculationPayloadSchema = z.object({
  routeId: z.number().int().positive(),
  meshSource: z.discriminatedUnion('kind', [
    z.object({ kind: z.literal('file'), path: z.string().min(1) }),
    z.object({ kind: z.literal('mesh'), meshId: z.number().int().positive() }),
  ]),
});

export type CalculationPayload = z.infer<typeof calculationPayloadSchema>;

export interface RouteCalculationWorkerDeps {
  routes: IRouteRepository;
  meshes: IMeshRepository;
  engine: NavigationEngine;
}

// =============================================================================
// MESH LOADING
// =============================================================================

const gunzip = promisify(zlib.gunzip);

/**
 * Read a mesh document from disk (.gz files are decompressed)
 */
export async function loadMeshFile(filePath: string): Promise<MeshDocument> {
  const raw = await fs.promises.readFile(filePath);
  const text = filePath.endsWith('.gz')
    ? (await gunzip(raw)).toString('utf-8')
    : raw.toString('utf-8');
  return meshDocumentSchema.parse(JSON.parse(text));
}

// =============================================================================
// WORKER
// =============================================================================

export class RouteCalculationWorker {
  constructor(private readonly deps: RouteCalculationWorkerDeps) {}

  async run(routeId: number, meshSource: MeshSource): Promise<CalculationResult> {
    const { routes, engine } = this.deps;

    const route = await routes.findById(routeId);
    if (!route) {
      const error = `Route ${routeId} not found`;
      logger.error(`[RouteWorker] ${error}`);
      return { ok: false, error };
    }

    try {
      const mesh = await this.loadMesh(meshSource);
      const waypoints = buildWaypoints(
        { lat: route.startLat, lon: route.startLon, name: route.startName },
        { lat: route.endLat, lon: route.endLon, name: route.endName }
      );

      logger.info(`[RouteWorker] Calculating route ${routeId}`, { meshSource });
      const unsmoothed = await engine.computeUnsmoothed(mesh, waypoints);

      // Checkpoint before smoothing
      await routes.update(routeId, {
        jsonUnsmoothed: unsmoothed,
        calculated: new Date().toISOString(),
        engineVersion: engine.version,
      });
      logger.debug(`[RouteWorker] Unsmoothed path saved for route ${routeId}`);

      const smoothed = await engine.smooth(mesh, unsmoothed, waypoints);

      await routes.update(routeId, {
        json: smoothed,
        calculated: new Date().toISOString(),
        engineVersion: engine.version,
      });
      logger.info(`[RouteWorker] Route ${routeId} calculated`);

      return { ok: true, geometry: smoothed };
    } catch (error) {
      const message = errorMessage(error);
      logger.error(`[RouteWorker] Route ${routeId} failed: ${message}`);
      await this.recordFailure(routeId, message);
      return { ok: false, error: message };
    }
  }

  private async loadMesh(source: MeshSource): Promise<MeshDocument> {
    if (source.kind === 'file') {
      return loadMeshFile(source.path);
    }

    const mesh = await this.deps.meshes.findById(source.meshId);
    if (!mesh) {
      throw new Error(`Mesh ${source.meshId} not found`);
    }
    return mesh.json;
  }

  private async recordFailure(routeId: number, message: string): Promise<void> {
    try {
      await this.deps.routes.update(routeId, { info: { error: message } });
    } catch (error) {
      logger.error(`[RouteWorker] Could not record failure on route ${routeId}: ${errorMessage(error)}`);
    }
  }
}

// =============================================================================
// QUEUE PROCESSOR
// =============================================================================

/**
 * Adapts the worker to the task queue. Invalid payloads fail without retry.
 */
export function createRouteCalculationProcessor(
  worker: RouteCalculationWorker
): JobProcessor<RouteFeatureCollection> {
  return async (job: QueueJob) => {
    const parsed = calculationPayloadSchema.safeParse(job.data);
    if (!parsed.success) {
      return { ok: false, error: `Invalid ${QUEUES.ROUTE_CALCULATION} payload: ${parsed.error.message}` };
    }

    const result = await worker.run(parsed.data.routeId, parsed.data.meshSource);
    return result.ok
      ? { ok: true, value: result.geometry }
      : { ok: false, error: result.error };
  };
}
