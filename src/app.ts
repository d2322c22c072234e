/**
 * =============================================================================
 * APPLICATION - Service wiring and Express app
 * =============================================================================
 *
 * createServices() builds every service over one DatabaseService and one
 * task queue; createApp() mounts them behind the middleware stack. Neither
 * listens nor schedules anything, so tests can build a full app in memory.
 * =============================================================================
 */

import express, { Express } from 'express';
import cors from 'cors';
import compression from 'compression';

import { config } from './config/environment';
import { API_PREFIX, QUEUES } from './core/constants';
import { DatabaseService } from './shared/database/db';
import { JsonJobRepository, JsonMeshRepository, JsonRouteRepository } from './shared/database/json.repository';
import { InMemoryQueue, QueueOptions } from './shared/services/queue.service';

// Middleware
import { errorHandler, notFoundHandler } from './shared/middleware/error.middleware';
import { requestLogger } from './shared/middleware/request-logger.middleware';
import { evaluationRateLimiter, rateLimiter } from './shared/middleware/rate-limiter.middleware';
import {
  blockSuspiciousRequests,
  requestIdMiddleware,
  securityHeaders
} from './shared/middleware/security.middleware';

// Modules
import {
  createGreatCircleThreadEngine,
  createRouteCalculationProcessor,
  GreatCircleEngine,
  NavigationEngine,
  RouteCalculationWorker
} from './modules/calculation';
import { JobService } from './modules/job';
import { createMeshRouter, MeshIngestService, MeshService } from './modules/mesh';
import { createRouteRouter, RouteMatcherService, RouteService } from './modules/route';
import { createHealthRouter } from './shared/routes/health.routes';

export interface ServiceOptions {
  db: DatabaseService;
  /** Defaults to the great-circle engine from config, on worker threads */
  engine?: NavigationEngine;
  queue?: QueueOptions;
  meshDir?: string;
  defaultMeshPath?: string | null;
  waypointToleranceNm?: number;
}

export interface Services {
  db: DatabaseService;
  queue: InMemoryQueue;
  engine: NavigationEngine;
  meshService: MeshService;
  meshIngest: MeshIngestService;
  jobService: JobService;
  routeService: RouteService;
  worker: RouteCalculationWorker;
}

function defaultEngine(): NavigationEngine {
  const engineOptions = {
    segmentNm: config.routing.smoothingSegmentNm,
    speedKnots: config.routing.vesselSpeedKnots,
    fuelTonnesPerDay: config.routing.fuelTonnesPerDay,
  };

  if (config.routing.engineThreads === 0) {
    return new GreatCircleEngine(engineOptions);
  }
  return createGreatCircleThreadEngine(engineOptions, {
    size: config.routing.engineThreads,
    timeoutMs: config.routing.engineTimeoutMs,
  });
}

export function createServices(options: ServiceOptions): Services {
  const { db } = options;

  const meshes = new JsonMeshRepository(db);
  const routes = new JsonRouteRepository(db);
  const jobs = new JsonJobRepository(db);

  const engine = options.engine ?? defaultEngine();

  const queue = new InMemoryQueue(options.queue ?? {
    concurrency: config.queue.concurrency,
    pollInterval: config.queue.pollIntervalMs,
  });

  const worker = new RouteCalculationWorker({ routes, meshes, engine });
  queue.process(QUEUES.ROUTE_CALCULATION, createRouteCalculationProcessor(worker));

  const meshService = new MeshService(meshes);
  const meshIngest = new MeshIngestService(meshes, options.meshDir ?? config.mesh.dir);

  const jobService = new JobService({
    jobs,
    routes,
    dispatcher: queue,
    statusProvider: queue,
    defaultMeshPath: options.defaultMeshPath !== undefined ? options.defaultMeshPath : config.mesh.defaultPath,
  });

  const routeService = new RouteService({
    meshService,
    matcher: new RouteMatcherService(routes, options.waypointToleranceNm ?? config.routing.waypointToleranceNm),
    jobService,
    routes,
    jobs,
    engine,
  });

  return { db, queue, engine, meshService, meshIngest, jobService, routeService, worker };
}

export function createApp(services: Services): Express {
  const app = express();

  // Required for correct client IPs (rate limiting) behind a reverse proxy
  app.set('trust proxy', 1);

  // Request ID for tracking (must be first)
  app.use(requestIdMiddleware);

  // Route GeoJSON can be large
  app.use(compression({ threshold: 1024 }));

  if (config.security.enableHeaders) {
    app.use(securityHeaders);
  }

  app.use(cors({
    origin: config.cors.origin,
    methods: ['GET', 'POST', 'DELETE'],
    allowedHeaders: ['Content-Type', 'X-Request-ID'],
    maxAge: 86400 // 24 hours preflight cache
  }));

  app.use(express.json({ limit: '10mb' }));
  app.use(blockSuspiciousRequests);

  if (config.security.enableRequestLogging) {
    app.use(requestLogger);
  }

  // Health & monitoring (not rate limited)
  app.use('/', createHealthRouter({
    storeStats: () => services.db.getStats(),
    queueStats: () => services.queue.getStats(),
    queueRunning: () => services.queue.isProcessing(),
  }));

  app.use(API_PREFIX, rateLimiter);
  app.use(API_PREFIX, createRouteRouter(services.routeService, services.jobService, {
    evaluationLimiter: evaluationRateLimiter,
  }));
  app.use(`${API_PREFIX}/mesh`, createMeshRouter(services.meshService));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
