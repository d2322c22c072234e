/**
 * =============================================================================
 * REQUEST LOOP STAYS FREE DURING CALCULATIONS
 * =============================================================================
 *
 * The engine thread spins for BUSY_MS on every call. Requests made while it
 * spins must answer long before that.
 * =============================================================================
 */

import request from 'supertest';
import { Worker } from 'worker_threads';
import { createApp, createServices, Services } from '../app';
import { TaskState } from '../core/constants';
import { ThreadedNavigationEngine } from '../modules/calculation/threaded.engine';
import { RouteFeatureCollection } from '../shared/types/geo.types';
import { memoryDb, meshFixture } from './helpers';

jest.mock('../shared/services/logger.service', () => ({
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

const BUSY_MS = 1500;

const ROUTE: RouteFeatureCollection = {
  type: 'FeatureCollection',
  features: [{
    type: 'Feature',
    geometry: { type: 'LineString', coordinates: [[2, 1], [4, 3]] },
    properties: { from: 'North Quay', to: 'South Quay' },
  }],
};

const BUSY_ENGINE_SOURCE = `
  const { parentPort } = require('worker_threads');
  parentPort.on('message', (request) => {
    const until = Date.now() + ${BUSY_MS};
    while (Date.now() < until) {}
    parentPort.postMessage({ id: request.id, ok: true, result: ${JSON.stringify(ROUTE)} });
  });
`;

async function waitFor(condition: () => boolean, timeoutMs: number): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!condition()) {
    if (Date.now() > deadline) {
      throw new Error(`Condition not met within ${timeoutMs} ms`);
    }
    await new Promise(resolve => setTimeout(resolve, 10));
  }
}

async function timed<T>(action: () => Promise<T>): Promise<{ result: T; ms: number }> {
  const started = Date.now();
  const result = await action();
  return { result, ms: Date.now() - started };
}

describe('Route calculation off the request loop', () => {
  let services: Services;

  beforeEach(() => {
    services = createServices({
      db: memoryDb(),
      queue: { concurrency: 1, pollInterval: 10 },
      defaultMeshPath: null,
      engine: new ThreadedNavigationEngine({
        version: 'busy/1',
        createWorker: () => new Worker(BUSY_ENGINE_SOURCE, { eval: true }),
      }),
    });
    services.db.insertMeshIfAbsent(meshFixture({ checksum: 'loop-mesh' }));
  });

  afterEach(async () => {
    services.queue.stop();
    await services.engine.close?.();
  });

  it('answers the dispatching request and health checks while the engine runs', async () => {
    const app = createApp(services);

    const post = await timed(() => request(app).post('/api/route').send({
      start_lat: 1,
      start_lon: 2,
      end_lat: 3,
      end_lon: 4,
      start_name: 'North Quay',
      end_name: 'South Quay',
    }));

    expect(post.result.status).toBe(202);
    expect(post.ms).toBeLessThan(BUSY_MS / 2);
    const jobId: string = post.result.body.data.id;
    expect(services.queue.query(jobId)).not.toBe(TaskState.SUCCESS);

    await waitFor(() => services.queue.query(jobId) === TaskState.RUNNING, BUSY_MS);
    const live = await timed(() => request(app).get('/health/live'));

    expect(live.result.status).toBe(200);
    expect(live.ms).toBeLessThan(BUSY_MS / 2);
    expect(services.queue.query(jobId)).toBe(TaskState.RUNNING);

    await waitFor(() => services.queue.query(jobId) === TaskState.SUCCESS, 4 * BUSY_MS);
    const [route] = services.db.findRoutes(() => true);
    expect(route.json).toEqual(ROUTE);
    expect(route.jsonUnsmoothed).toEqual(ROUTE);
    expect(route.engineVersion).toBe('busy/1');
  }, 20000);
});
