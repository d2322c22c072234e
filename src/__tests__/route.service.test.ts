/**
 * =============================================================================
 * ROUTE SERVICE - request resolution
 * =============================================================================
 */

import { createServices, Services } from '../app';
import { TaskState } from '../core/constants';
import { GreatCircleEngine } from '../modules/calculation/great-circle.engine';
import { RouteRequest } from '../modules/route/route.schema';
import { MeshRecord, RouteRecord } from '../shared/database/db';
import { memoryDb, meshFixture, routeFixture } from './helpers';

jest.mock('../shared/services/logger.service', () => ({
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

const REQUEST: RouteRequest = {
  start_lat: 1,
  start_lon: 2,
  end_lat: 3,
  end_lon: 4,
  start_name: 'North Quay',
  end_name: 'South Quay',
  force_recalculate: false,
};

const statusUrl = (jobId: string): string => `/api/route/${jobId}`;

describe('RouteService.requestRoute', () => {
  let services: Services;
  let mesh: MeshRecord;
  let original: RouteRecord;

  beforeEach(() => {
    services = createServices({
      db: memoryDb(),
      queue: { autoStart: false },
      defaultMeshPath: null,
      engine: new GreatCircleEngine({ segmentNm: 10, speedKnots: 10, fuelTonnesPerDay: 24 }),
    });
    mesh = services.db.insertMeshIfAbsent(meshFixture({ checksum: 'service-mesh' })).mesh;
    original = services.db.createRoute(routeFixture({
      meshId: mesh.id,
      startLat: 1,
      startLon: 2,
      endLat: 3,
      endLon: 4,
      requested: '2025-01-06T08:00:00.000Z',
      startName: 'Old Quay',
    }));
  });

  afterEach(() => {
    services.queue.stop();
  });

  it('recalculates an existing route that has no job, leaving the old row alone', async () => {
    const outcome = await services.routeService.requestRoute(REQUEST, statusUrl);

    expect(outcome.kind).toBe('dispatched');
    if (outcome.kind !== 'dispatched') return;

    const routes = services.db.findRoutes(() => true);
    expect(routes).toHaveLength(2);
    expect(services.db.getRouteById(original.id)).toEqual(original);
    expect(services.db.getJobsByRoute(original.id)).toEqual([]);

    const fresh = routes[1];
    expect(fresh.id).not.toBe(original.id);
    expect(fresh).toMatchObject({ meshId: mesh.id, startName: 'North Quay', endName: 'South Quay', json: null });
    expect(services.db.getJobById(outcome.body.id)?.routeId).toBe(fresh.id);
    expect(outcome.body['status-url']).toBe(`/api/route/${outcome.body.id}`);
    expect(services.queue.query(outcome.body.id)).toBe(TaskState.PENDING);
  });

  it('returns an existing route that has a job without dispatching', async () => {
    services.db.createJob({ id: 'job-existing', created: '2025-01-06T08:00:01.000Z', routeId: original.id });

    const outcome = await services.routeService.requestRoute(REQUEST, statusUrl);

    expect(outcome.kind).toBe('existing');
    if (outcome.kind !== 'existing') return;
    expect(outcome.body.id).toBe('job-existing');
    expect(outcome.body.route_id).toBe(original.id);
    expect(outcome.body['status-url']).toBe('/api/route/job-existing');
    expect(services.db.findRoutes(() => true)).toHaveLength(1);
  });

  it('dispatches a new route when recalculation is forced', async () => {
    services.db.createJob({ id: 'job-existing', created: '2025-01-06T08:00:01.000Z', routeId: original.id });

    const outcome = await services.routeService.requestRoute({ ...REQUEST, force_recalculate: true }, statusUrl);

    expect(outcome.kind).toBe('dispatched');
    expect(services.db.findRoutes(() => true)).toHaveLength(2);
  });

  it('creates nothing when no mesh covers both points', async () => {
    const outcome = await services.routeService.requestRoute({ ...REQUEST, end_lat: 60 }, statusUrl);

    expect(outcome.kind).toBe('no-mesh');
    expect(services.db.findRoutes(() => true)).toEqual([original]);
  });
});
