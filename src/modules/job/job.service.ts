/**
 * =============================================================================
 * JOB SERVICE - Lifecycle of route calculations
 * =============================================================================
 *
 * A Job row links a task-queue id to the route it computes. Its state is
 * never stored: it is read live from the queue on every status request.
 *
 *   dispatch   → reserve id, persist Job, enqueue (returns immediately)
 *   getStatus  → live state + current route fields (+ error on FAILURE)
 *   cancel     → best-effort revoke, always acknowledged
 *   listRecent → latest job of every route requested today (UTC)
 * =============================================================================
 */

import { v4 as uuidv4 } from 'uuid';
import { ErrorCode, HTTP_STATUS, QUEUES, TaskState } from '../../core/constants';
import { AppError, JobNotFoundError, RouteNotFoundError } from '../../core/errors/AppError';
import { JobRecord, RouteRecord } from '../../shared/database/db';
import { IJobRepository, IRouteRepository } from '../../shared/database/repository.interface';
import { logger } from '../../shared/services/logger.service';
import { RevokeOutcome, StatusProvider, TaskDispatcher } from '../../shared/services/queue.service';
import { CalculationPayload, CALCULATE_ROUTE_TASK, MeshSource } from '../calculation/route-calculation.worker';
import { RouteStatus, toRoutePayload } from '../route/route.schema';

export interface JobServiceDeps {
  jobs: IJobRepository;
  routes: IRouteRepository;
  dispatcher: TaskDispatcher;
  statusProvider: StatusProvider;
  /** Mesh file used for routes that carry no mesh id */
  defaultMeshPath: string | null;
}

const DAY_MS = 24 * 60 * 60 * 1000;

function startOfUtcDay(date: Date): Date {
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));
}

export class JobService {
  constructor(private readonly deps: JobServiceDeps) {}

  /**
   * Queue a calculation for a route. The Job row exists before the task can
   * start, so a status request never sees an enqueued task without its Job.
   */
  async dispatch(route: RouteRecord, meshSource?: MeshSource): Promise<JobRecord> {
    const source = meshSource ?? this.meshSourceFor(route);
    const jobId = uuidv4();

    const job = await this.deps.jobs.create({
      id: jobId,
      created: new Date().toISOString(),
      routeId: route.id,
    });

    const payload: CalculationPayload = { routeId: route.id, meshSource: source };
    await this.deps.dispatcher.add(QUEUES.ROUTE_CALCULATION, CALCULATE_ROUTE_TASK, payload, {
      id: jobId,
      maxAttempts: 1,
    });

    logger.info(`[JobService] Dispatched job ${jobId} for route ${route.id}`, { meshSource: source });
    return job;
  }

  async getStatus(jobId: string): Promise<RouteStatus> {
    const job = await this.deps.jobs.findById(jobId);
    if (!job) {
      throw new JobNotFoundError(jobId);
    }

    const route = await this.deps.routes.findById(job.routeId);
    if (!route) {
      throw new RouteNotFoundError(job.routeId);
    }

    return this.toStatus(job, route);
  }

  cancel(jobId: string): RevokeOutcome {
    const outcome = this.deps.dispatcher.revoke(jobId);
    logger.info(`[JobService] Cancel requested for job ${jobId}: ${outcome}`);
    return outcome;
  }

  async listRecent(now: Date = new Date()): Promise<RouteStatus[]> {
    const from = startOfUtcDay(now);
    const to = new Date(from.getTime() + DAY_MS);
    const routes = await this.deps.routes.findRequestedBetween(from, to);

    const statuses: RouteStatus[] = [];
    for (const route of routes) {
      const job = await this.deps.jobs.findLatestForRoute(route.id);
      if (!job) {
        // Route row written but its Job not (yet) persisted
        logger.warn(`[JobService] Route ${route.id} has no job`);
        continue;
      }
      statuses.push(this.toStatus(job, route));
    }
    return statuses;
  }

  private toStatus(job: JobRecord, route: RouteRecord): RouteStatus {
    const status = this.deps.statusProvider.query(job.id);
    const { id: routeId, ...payload } = toRoutePayload(route);

    return {
      id: job.id,
      status,
      route_id: routeId,
      ...payload,
      ...(status === TaskState.FAILURE && { error: route.info?.error ?? null }),
    };
  }

  private meshSourceFor(route: RouteRecord): MeshSource {
    if (route.meshId !== null) {
      return { kind: 'mesh', meshId: route.meshId };
    }
    if (this.deps.defaultMeshPath) {
      return { kind: 'file', path: this.deps.defaultMeshPath };
    }
    throw new AppError(
      `No mesh available to calculate route ${route.id}`,
      HTTP_STATUS.INTERNAL_ERROR,
      ErrorCode.CALCULATION_FAILED
    );
  }
}
