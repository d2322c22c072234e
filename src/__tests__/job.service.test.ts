/**
 * =============================================================================
 * JOB SERVICE
 * =============================================================================
 */

import { QUEUES, TaskState } from '../core/constants';
import { AppError, JobNotFoundError, RouteNotFoundError } from '../core/errors/AppError';
import { JobService } from '../modules/job/job.service';
import { DatabaseService } from '../shared/database/db';
import { JsonJobRepository, JsonRouteRepository } from '../shared/database/json.repository';
import { InMemoryQueue } from '../shared/services/queue.service';
import { memoryDb, meshFixture, routeFixture } from './helpers';

jest.mock('../shared/services/logger.service', () => ({
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

describe('JobService', () => {
  let db: DatabaseService;
  let queue: InMemoryQueue;

  function service(defaultMeshPath: string | null = null): JobService {
    return new JobService({
      jobs: new JsonJobRepository(db),
      routes: new JsonRouteRepository(db),
      dispatcher: queue,
      statusProvider: queue,
      defaultMeshPath,
    });
  }

  beforeEach(() => {
    db = memoryDb();
    queue = new InMemoryQueue({ autoStart: false });
  });

  afterEach(() => {
    queue.stop();
  });

  describe('dispatch', () => {
    it('persists the job under the same id the queue uses', async () => {
      const mesh = db.insertMeshIfAbsent(meshFixture()).mesh;
      const route = db.createRoute(routeFixture({ meshId: mesh.id }));
      const payloads: unknown[] = [];
      queue.process(QUEUES.ROUTE_CALCULATION, async job => {
        payloads.push(job.data);
        return { ok: true, value: null };
      });

      const job = await service().dispatch(route);

      expect(db.getJobById(job.id)).toEqual({ id: job.id, created: job.created, routeId: route.id });
      expect(queue.getTask(job.id)?.state).toBe(TaskState.PENDING);

      await queue.runDue();
      expect(payloads).toEqual([{ routeId: route.id, meshSource: { kind: 'mesh', meshId: mesh.id } }]);
    });

    it('falls back to the default mesh file for routes without a mesh', async () => {
      const route = db.createRoute(routeFixture());
      const payloads: unknown[] = [];
      queue.process(QUEUES.ROUTE_CALCULATION, async job => {
        payloads.push(job.data);
        return { ok: true, value: null };
      });

      await service('/meshes/default.vessel.json.gz').dispatch(route);
      await queue.runDue();

      expect(payloads).toEqual([
        { routeId: route.id, meshSource: { kind: 'file', path: '/meshes/default.vessel.json.gz' } },
      ]);
    });

    it('refuses to dispatch when no mesh is available', async () => {
      const route = db.createRoute(routeFixture());

      await expect(service().dispatch(route)).rejects.toBeInstanceOf(AppError);
      expect(db.getJobsByRoute(route.id)).toEqual([]);
    });
  });

  describe('getStatus', () => {
    it('merges the live task state with the route fields', async () => {
      const mesh = db.insertMeshIfAbsent(meshFixture()).mesh;
      const route = db.createRoute(routeFixture({ meshId: mesh.id, startName: 'Harbour' }));
      const jobs = service();
      const job = await jobs.dispatch(route);

      const status = await jobs.getStatus(job.id);

      expect(status.id).toBe(job.id);
      expect(status.route_id).toBe(route.id);
      expect(status.status).toBe(TaskState.PENDING);
      expect(status.start_name).toBe('Harbour');
      expect(status.mesh).toBe(mesh.id);
      expect(status).not.toHaveProperty('error');
    });

    it('includes the recorded error text once the task failed', async () => {
      const mesh = db.insertMeshIfAbsent(meshFixture()).mesh;
      const route = db.createRoute(routeFixture({ meshId: mesh.id }));
      queue.process(QUEUES.ROUTE_CALCULATION, async () => {
        db.updateRoute(route.id, { info: { error: 'no path through ice' } });
        return { ok: false, error: 'no path through ice' };
      });
      const jobs = service();
      const job = await jobs.dispatch(route);
      await queue.runDue();

      const status = await jobs.getStatus(job.id);

      expect(status.status).toBe(TaskState.FAILURE);
      expect(status.error).toBe('no path through ice');
    });

    it('throws JobNotFoundError for an unknown job id', async () => {
      await expect(service().getStatus('missing-job')).rejects.toBeInstanceOf(JobNotFoundError);
    });

    it('throws RouteNotFoundError when the job points at a missing route', async () => {
      db.createJob({ id: 'orphan', created: new Date().toISOString(), routeId: 404 });

      await expect(service().getStatus('orphan')).rejects.toBeInstanceOf(RouteNotFoundError);
    });
  });

  describe('cancel', () => {
    it('revokes a queued job', async () => {
      const mesh = db.insertMeshIfAbsent(meshFixture()).mesh;
      const route = db.createRoute(routeFixture({ meshId: mesh.id }));
      const jobs = service();
      const job = await jobs.dispatch(route);

      expect(jobs.cancel(job.id)).toBe('revoked');
      expect((await jobs.getStatus(job.id)).status).toBe(TaskState.REVOKED);
    });

    it('acknowledges ids it has never seen', () => {
      expect(service().cancel('not-a-job')).toBe('unknown');
    });
  });

  describe('listRecent', () => {
    const now = new Date('2025-04-10T15:00:00.000Z');

    it('lists the latest job of every route requested on the current UTC day', async () => {
      const today = db.createRoute(routeFixture({ requested: '2025-04-10T00:00:00.000Z' }));
      const yesterday = db.createRoute(routeFixture({ requested: '2025-04-09T23:59:59.000Z' }));
      const tomorrow = db.createRoute(routeFixture({ requested: '2025-04-11T00:00:00.000Z' }));
      db.createJob({ id: 'old', created: '2025-04-10T01:00:00.000Z', routeId: today.id });
      db.createJob({ id: 'new', created: '2025-04-10T02:00:00.000Z', routeId: today.id });
      db.createJob({ id: 'y', created: '2025-04-09T23:59:59.000Z', routeId: yesterday.id });
      db.createJob({ id: 't', created: '2025-04-11T00:00:00.000Z', routeId: tomorrow.id });

      const recent = await service().listRecent(now);

      expect(recent.map(s => [s.id, s.route_id])).toEqual([['new', today.id]]);
    });

    it('skips routes that have no job yet', async () => {
      db.createRoute(routeFixture({ requested: '2025-04-10T09:00:00.000Z' }));

      expect(await service().listRecent(now)).toEqual([]);
    });
  });
});
