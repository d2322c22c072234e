/**
 * =============================================================================
 * HEALTH CHECK ROUTES - Monitoring Endpoints
 * =============================================================================
 *
 * ENDPOINTS:
 * - GET /health          - Quick health check (for load balancers)
 * - GET /health/live     - Liveness probe (is the process running?)
 * - GET /health/ready    - Readiness probe (store loaded, queue processing)
 * - GET /health/detailed - Store, queue and process statistics
 * =============================================================================
 */

import { Router, Request, Response } from 'express';
import { HTTP_STATUS } from '../../core/constants';
import { QueueStats } from '../services/queue.service';

export interface HealthDependencies {
  storeStats: () => { meshes: number; routes: number; jobs: number };
  queueStats: () => QueueStats;
  queueRunning: () => boolean;
}

// Track server start time
const startTime = Date.now();

export function createHealthRouter(deps: HealthDependencies): Router {
  const router = Router();

  /**
   * Basic health check - for load balancers
   */
  router.get('/health', (_req: Request, res: Response) => {
    res.status(HTTP_STATUS.OK).json({
      status: 'healthy',
      timestamp: new Date().toISOString()
    });
  });

  /**
   * Liveness probe - is the process alive?
   */
  router.get('/health/live', (_req: Request, res: Response) => {
    res.status(HTTP_STATUS.OK).json({
      status: 'alive',
      pid: process.pid,
      uptime: Math.floor((Date.now() - startTime) / 1000)
    });
  });

  /**
   * Readiness probe - can the service accept traffic?
   */
  router.get('/health/ready', (_req: Request, res: Response) => {
    const checks: Record<string, boolean> = {};

    try {
      deps.storeStats();
      checks.store = true;
    } catch {
      checks.store = false;
    }
    checks.queue = deps.queueRunning();

    const isReady = Object.values(checks).every(v => v);

    res.status(isReady ? HTTP_STATUS.OK : HTTP_STATUS.SERVICE_UNAVAILABLE).json({
      status: isReady ? 'ready' : 'not_ready',
      checks,
      timestamp: new Date().toISOString()
    });
  });

  /**
   * Detailed health - internal diagnostics
   */
  router.get('/health/detailed', (_req: Request, res: Response) => {
    const memUsage = process.memoryUsage();
    const uptimeSeconds = Math.floor((Date.now() - startTime) / 1000);

    res.json({
      status: 'healthy',
      environment: process.env.NODE_ENV || 'development',
      timestamp: new Date().toISOString(),
      server: {
        pid: process.pid,
        uptime: formatUptime(uptimeSeconds),
        uptimeSeconds,
        nodeVersion: process.version
      },
      memory: {
        heapUsed: formatBytes(memUsage.heapUsed),
        rss: formatBytes(memUsage.rss)
      },
      store: deps.storeStats(),
      queue: deps.queueStats()
    });
  });

  return router;
}

// =============================================================================
// HELPER FUNCTIONS
// =============================================================================

export function formatBytes(bytes: number): string {
  const units = ['B', 'KB', 'MB', 'GB'];
  let value = bytes;
  let unitIndex = 0;

  while (value >= 1024 && unitIndex < units.length - 1) {
    value /= 1024;
    unitIndex++;
  }

  return `${value.toFixed(2)} ${units[unitIndex]}`;
}

export function formatUptime(seconds: number): string {
  const days = Math.floor(seconds / 86400);
  const hours = Math.floor((seconds % 86400) / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  const secs = seconds % 60;

  const parts: string[] = [];
  if (days > 0) parts.push(`${days}d`);
  if (hours > 0) parts.push(`${hours}h`);
  if (minutes > 0) parts.push(`${minutes}m`);
  parts.push(`${secs}s`);

  return parts.join(' ');
}
