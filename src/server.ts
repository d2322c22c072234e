/**
 * =============================================================================
 * VESSEL ROUTE SERVER - MAIN SERVER
 * =============================================================================
 *
 * MODULES:
 * ┌─────────────────────────────────────────────────────────────────────────┐
 * │ ROUTE       │ Route requests, reuse of existing routes, evaluation      │
 * │ JOB         │ Status and cancellation of route calculations             │
 * │ MESH        │ Mesh selection, listing and scheduled import              │
 * │ CALCULATION │ Queue worker running the navigation engine                │
 * └─────────────────────────────────────────────────────────────────────────┘
 *
 * Startup: validate env → load JSON store → start queue → listen →
 * start mesh import schedule. SIGTERM/SIGINT: stop accepting requests,
 * stop the schedule, queue and engine threads, then exit. Store writes are
 * already on disk.
 * =============================================================================
 */

import path from 'path';
import { createServer } from 'http';

import { validateAndLogEnvironment } from './core/config/env.validation';
import { config } from './config/environment';
import { errorMessage } from './core/errors/AppError';
import { logger } from './shared/services/logger.service';
import { DatabaseService } from './shared/database/db';
import { startMeshImportJob } from './shared/jobs/import-meshes.job';
import { createApp, createServices } from './app';

// =============================================================================
// ENVIRONMENT VALIDATION (Fail fast if config is invalid)
// =============================================================================
validateAndLogEnvironment();

const db = new DatabaseService({ filePath: path.join(config.dataDir, 'vessel-route-db.json') });
const services = createServices({ db });
const app = createApp(services);
const server = createServer(app);

let stopMeshImport: (() => void) | null = null;

server.listen(config.port, config.host, () => {
  // keepAliveTimeout must exceed a typical load balancer idle timeout (60s)
  server.keepAliveTimeout = 65000;
  server.headersTimeout = 66000;

  const stats = db.getStats();
  logger.info(`🚢 Vessel route server listening on http://${config.host}:${config.port}`, {
    environment: config.nodeEnv,
    meshes: stats.meshes,
    routes: stats.routes,
    engine: services.engine.version,
  });

  if (config.mesh.importEnabled) {
    stopMeshImport = startMeshImportJob(services.meshIngest, config.mesh.importIntervalMs);
  } else {
    logger.info('Mesh import schedule disabled (MESH_IMPORT_ENABLED=false)');
  }
});

// Handle uncaught errors
process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception', error);
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error(`Unhandled rejection: ${errorMessage(reason)}`);
  process.exit(1);
});

// =============================================================================
// GRACEFUL SHUTDOWN
// =============================================================================

const gracefulShutdown = (signal: string): void => {
  logger.info(`${signal} received. Starting graceful shutdown...`);

  stopMeshImport?.();
  services.queue.stop();
  services.engine.close?.().catch((error) => {
    logger.error(`Error stopping navigation threads: ${errorMessage(error)}`);
  });

  server.close((error) => {
    if (error) {
      logger.error(`Error closing HTTP server: ${error.message}`);
    }
    logger.info('Shutdown complete');
    process.exit(error ? 1 : 0);
  });

  // Force exit if connections do not drain
  setTimeout(() => {
    logger.warn('Forcing shutdown after timeout');
    process.exit(1);
  }, 10000).unref();
};

process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => gracefulShutdown('SIGINT'));

export { app, server };
