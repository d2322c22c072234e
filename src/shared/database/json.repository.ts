/**
 * =============================================================================
 * JSON REPOSITORIES - IRepository implementations over DatabaseService
 * =============================================================================
 */

import { boxContains } from '../utils/geospatial.utils';
import { GeoPoint } from '../types/geo.types';
import {
  DatabaseService,
  JobRecord,
  MeshRecord,
  NewMesh,
  NewRoute,
  RouteRecord,
  RouteUpdate
} from './db';
import { IJobRepository, IMeshRepository, IRouteRepository } from './repository.interface';

export class JsonMeshRepository implements IMeshRepository {
  constructor(private readonly db: DatabaseService) {}

  async findById(id: number): Promise<MeshRecord | null> {
    return this.db.getMeshById(id) ?? null;
  }

  async findByChecksum(checksum: string): Promise<MeshRecord | null> {
    return this.db.getMeshByChecksum(checksum) ?? null;
  }

  async findContaining(points: GeoPoint[]): Promise<MeshRecord[]> {
    return this.db.findMeshes(mesh => points.every(point => boxContains(mesh, point)));
  }

  async findAll(): Promise<MeshRecord[]> {
    return this.db.findMeshes(() => true);
  }

  async createIfAbsent(data: NewMesh): Promise<{ mesh: MeshRecord; created: boolean }> {
    return this.db.insertMeshIfAbsent(data);
  }
}

export class JsonRouteRepository implements IRouteRepository {
  constructor(private readonly db: DatabaseService) {}

  async findById(id: number): Promise<RouteRecord | null> {
    return this.db.getRouteById(id) ?? null;
  }

  async findByMesh(meshId: number): Promise<RouteRecord[]> {
    return this.db.findRoutes(route => route.meshId === meshId);
  }

  async findRequestedBetween(from: Date, to: Date): Promise<RouteRecord[]> {
    const fromMs = from.getTime();
    const toMs = to.getTime();
    return this.db.findRoutes(route => {
      const requested = Date.parse(route.requested);
      return requested >= fromMs && requested < toMs;
    });
  }

  async create(data: NewRoute): Promise<RouteRecord> {
    return this.db.createRoute(data);
  }

  async update(id: number, data: RouteUpdate): Promise<RouteRecord | null> {
    return this.db.updateRoute(id, data) ?? null;
  }
}

export class JsonJobRepository implements IJobRepository {
  constructor(private readonly db: DatabaseService) {}

  async findById(id: string): Promise<JobRecord | null> {
    return this.db.getJobById(id) ?? null;
  }

  async findLatestForRoute(routeId: number): Promise<JobRecord | null> {
    const jobs = this.db.getJobsByRoute(routeId);
    if (jobs.length === 0) return null;

    // Later insertion wins on equal timestamps
    return jobs.reduce((latest, job) =>
      Date.parse(job.created) >= Date.parse(latest.created) ? job : latest
    );
  }

  async create(data: JobRecord): Promise<JobRecord> {
    return this.db.createJob(data);
  }
}
