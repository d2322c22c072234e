/**
 * =============================================================================
 * REPOSITORY INTERFACE - Database Abstraction Layer
 * =============================================================================
 *
 * Contracts for the three entity stores the routing core consumes.
 * Implementations can be:
 *   - Json*Repository (current, file-backed)
 *   - an SQL-backed repository with the same methods
 *
 * Services depend only on these interfaces, which also makes them easy to
 * fake in tests.
 * =============================================================================
 */

import { GeoPoint } from '../types/geo.types';
import {
  JobRecord,
  MeshRecord,
  NewMesh,
  NewRoute,
  RouteRecord,
  RouteUpdate
} from './db';

/**
 * Mesh store - meshes are immutable once inserted
 */
export interface IMeshRepository {
  findById(id: number): Promise<MeshRecord | null>;

  findByChecksum(checksum: string): Promise<MeshRecord | null>;

  /**
   * Meshes whose bounding box contains every given point (inclusive bounds),
   * ordered by id
   */
  findContaining(points: GeoPoint[]): Promise<MeshRecord[]>;

  findAll(): Promise<MeshRecord[]>;

  /**
   * Idempotent insert keyed by checksum. Atomic per call.
   */
  createIfAbsent(data: NewMesh): Promise<{ mesh: MeshRecord; created: boolean }>;
}

/**
 * Route store
 */
export interface IRouteRepository {
  findById(id: number): Promise<RouteRecord | null>;

  /**
   * All routes calculated (or being calculated) on a mesh, ordered by id
   */
  findByMesh(meshId: number): Promise<RouteRecord[]>;

  /**
   * Routes whose request timestamp falls in [from, to), ordered by id
   */
  findRequestedBetween(from: Date, to: Date): Promise<RouteRecord[]>;

  create(data: NewRoute): Promise<RouteRecord>;

  /**
   * Atomic single-row update. Resolves to null when the route is gone.
   */
  update(id: number, data: RouteUpdate): Promise<RouteRecord | null>;
}

/**
 * Job store - jobs are never mutated
 */
export interface IJobRepository {
  findById(id: string): Promise<JobRecord | null>;

  /**
   * The most recently created job of a route (authoritative for status)
   */
  findLatestForRoute(routeId: number): Promise<JobRecord | null>;

  create(data: JobRecord): Promise<JobRecord>;
}
