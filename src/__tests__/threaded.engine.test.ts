/**
 * =============================================================================
 * NAVIGATION THREADS
 * =============================================================================
 *
 * Threads here run small scripted engines (eval'd JavaScript), since worker
 * threads cannot load the TypeScript sources.
 * =============================================================================
 */

import { Worker } from 'worker_threads';
import { answerEngineRequest } from '../modules/calculation/engine-thread.protocol';
import { GreatCircleEngine } from '../modules/calculation/great-circle.engine';
import { buildWaypoints } from '../modules/calculation/navigation-engine';
import { ThreadedNavigationEngine } from '../modules/calculation/threaded.engine';
import { RouteFeatureCollection } from '../shared/types/geo.types';

jest.mock('../shared/services/logger.service', () => ({
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

const ROUTE: RouteFeatureCollection = {
  type: 'FeatureCollection',
  features: [{
    type: 'Feature',
    geometry: { type: 'LineString', coordinates: [[2, 1], [4, 3]] },
    properties: { from: 'Start', to: 'End' },
  }],
};

const WAYPOINTS = buildWaypoints({ lat: 1, lon: 2 }, { lat: 3, lon: 4 });

/**
 * Thread whose message handler is `onRequest(request, reply)`
 */
function scriptedThread(onRequest: string): () => Worker {
  const source = `
    const { parentPort } = require('worker_threads');
    const ROUTE = ${JSON.stringify(ROUTE)};
    const reply = (message) => parentPort.postMessage(message);
    parentPort.on('message', (request) => { (${onRequest})(request, reply); });
  `;
  return () => new Worker(source, { eval: true });
}

const answerWithRoute = scriptedThread('(request, reply) => reply({ id: request.id, ok: true, result: ROUTE })');

describe('answerEngineRequest', () => {
  const engine = new GreatCircleEngine({ segmentNm: 10, speedKnots: 10, fuelTonnesPerDay: 24 });

  it('runs the requested engine method', async () => {
    const expected = await engine.computeUnsmoothed({}, WAYPOINTS);

    const response = await answerEngineRequest(engine, {
      id: 'call-1',
      method: 'computeUnsmoothed',
      mesh: {},
      waypoints: WAYPOINTS,
    });

    expect(response).toEqual({ id: 'call-1', ok: true, result: expected });
  });

  it('answers a malformed request with an error under its id', async () => {
    const response = await answerEngineRequest(engine, { id: 'call-2', method: 'smooth', mesh: {} });

    expect(response.id).toBe('call-2');
    expect(response.ok).toBe(false);
  });

  it('turns an engine error into an error reply', async () => {
    jest.spyOn(engine, 'evaluate').mockRejectedValueOnce(new Error('mesh has no cells'));

    const response = await answerEngineRequest(engine, { id: 'call-3', method: 'evaluate', mesh: {}, route: ROUTE });

    expect(response).toEqual({ id: 'call-3', ok: false, error: 'mesh has no cells' });
  });
});

describe('ThreadedNavigationEngine', () => {
  let engine: ThreadedNavigationEngine | null = null;

  afterEach(async () => {
    await engine?.close();
    engine = null;
  });

  it('resolves with the route computed on the thread', async () => {
    engine = new ThreadedNavigationEngine({ version: 'scripted/1', createWorker: answerWithRoute });

    await expect(engine.computeUnsmoothed({}, WAYPOINTS)).resolves.toEqual(ROUTE);
    await expect(engine.smooth({}, ROUTE, WAYPOINTS)).resolves.toEqual(ROUTE);
    expect(engine.version).toBe('scripted/1');
    expect(engine.threadCount()).toBe(1);
  });

  it('spreads concurrent calls over the pool', async () => {
    engine = new ThreadedNavigationEngine({ version: 'scripted/1', size: 2, createWorker: answerWithRoute });

    await Promise.all([engine.evaluate({}, ROUTE), engine.evaluate({}, ROUTE)]);

    expect(engine.threadCount()).toBe(2);
  });

  it('rejects with the error the thread reports', async () => {
    engine = new ThreadedNavigationEngine({
      version: 'scripted/1',
      createWorker: scriptedThread("(request, reply) => reply({ id: request.id, ok: false, error: 'no path found' })"),
    });

    await expect(engine.computeUnsmoothed({}, WAYPOINTS)).rejects.toThrow('no path found');
  });

  it('rejects calls in flight when the thread exits and starts a new one', async () => {
    engine = new ThreadedNavigationEngine({
      version: 'scripted/1',
      createWorker: scriptedThread('() => process.exit(3)'),
    });

    await expect(engine.computeUnsmoothed({}, WAYPOINTS)).rejects.toThrow('Navigation thread exited with code 3');
    expect(engine.threadCount()).toBe(0);
  });

  it('terminates a thread that exceeds the time limit', async () => {
    engine = new ThreadedNavigationEngine({
      version: 'scripted/1',
      timeoutMs: 50,
      createWorker: scriptedThread('() => { const until = Date.now() + 2000; while (Date.now() < until) {} }'),
    });

    await expect(engine.computeUnsmoothed({}, WAYPOINTS)).rejects.toThrow('Navigation engine timed out after 50 ms');
    expect(engine.threadCount()).toBe(0);
  });

  it('rejects a malformed reply', async () => {
    engine = new ThreadedNavigationEngine({
      version: 'scripted/1',
      createWorker: scriptedThread("(request, reply) => reply({ id: request.id, ok: true, result: 'not a route' })"),
    });

    await expect(engine.evaluate({}, ROUTE)).rejects.toThrow('Malformed reply from navigation thread');
  });
});
