/**
 * =============================================================================
 * DATABASE SERVICE - Persistent JSON File Storage
 * =============================================================================
 *
 * Simple file-based database for meshes, routes and calculation jobs.
 * Data persists across server restarts.
 *
 * - Every mutation is a single synchronous step on the in-memory copy, so
 *   each individual insert/update is atomic with respect to other callers
 * - The file may be shared with other processes (the import CLI): every call
 *   first reloads the file if someone else replaced it, and every mutation is
 *   written through at once (temp file + rename)
 * - The file is validated on load; a damaged store stops startup
 * - Pass `filePath: null` for a purely in-memory database (tests)
 * =============================================================================
 */

import * as fs from 'fs';
import * as path from 'path';
import { ErrorCode, HTTP_STATUS } from '../../core/constants';
import { AppError, errorMessage } from '../../core/errors/AppError';
import { logger } from '../services/logger.service';
import { databaseFileSchema } from './db.schema';
import { BoundingBox, MeshDocument, RouteFeatureCollection } from '../types/geo.types';

// Database schema
export interface Database {
  meshes: MeshRecord[];
  routes: RouteRecord[];
  jobs: JobRecord[];
  _meta: {
    version: string;
    lastUpdated: string;
    nextMeshId: number;
    nextRouteId: number;
  };
}

// Mesh Record - navigable map artifact, written only by the mesh ingestor
export interface MeshRecord extends BoundingBox {
  id: number;
  checksum: string;              // md5 of the mesh artifact, unique
  name: string | null;
  created: string;               // ISO timestamp from the upload manifest
  producerVersion: string | null;
  size: number;                  // Extent metric, smaller = more specific
  json: MeshDocument;
}

// Free-form notes attached to a route ("error" on failure)
export interface RouteInfo {
  error?: string;
  info?: string;
}

// Route Record - one requested route, resolved or in flight
export interface RouteRecord {
  id: number;
  requested: string;
  calculated: string | null;
  file: string | null;
  info: RouteInfo | null;
  meshId: number | null;
  startLat: number;
  startLon: number;
  endLat: number;
  endLon: number;
  startName: string | null;
  endName: string | null;
  jsonUnsmoothed: RouteFeatureCollection | null;   // Checkpoint
  json: RouteFeatureCollection | null;             // Final (smoothed)
  engineVersion: string | null;
}

// Job Record - one dispatch of a route calculation. Id = task queue id.
export interface JobRecord {
  id: string;
  created: string;
  routeId: number;
}

export type NewMesh = Omit<MeshRecord, 'id'>;
export type NewRoute = Omit<RouteRecord, 'id'>;
export type RouteUpdate = Partial<Omit<RouteRecord, 'id' | 'requested'>>;

export interface DatabaseOptions {
  /** JSON file backing the database, or null to keep everything in memory */
  filePath: string | null;
}

function emptyDatabase(): Database {
  return {
    meshes: [],
    routes: [],
    jobs: [],
    _meta: {
      version: '1.0.0',
      lastUpdated: new Date().toISOString(),
      nextMeshId: 1,
      nextRouteId: 1
    }
  };
}

/**
 * The store file exists but cannot be used
 */
export class DamagedStoreError extends AppError {
  constructor(filePath: string, reason: string) {
    super(`Database file ${filePath} is damaged: ${reason}`, HTTP_STATUS.INTERNAL_ERROR, ErrorCode.INTERNAL_ERROR, false);
  }
}

/**
 * Database class - handles all CRUD operations
 */
export class DatabaseService {
  private data: Database;
  private readonly filePath: string | null;
  /** Identity of the file version held in memory */
  private fileStamp: string | null = null;

  constructor(options: DatabaseOptions) {
    this.filePath = options.filePath;
    this.data = this.load();
    logger.info(`Database loaded from ${this.filePath ?? 'memory'}`);
    logger.info(`Meshes: ${this.data.meshes.length}, Routes: ${this.data.routes.length}, Jobs: ${this.data.jobs.length}`);
  }

  /**
   * Load database from file
   */
  private load(): Database {
    if (!this.filePath) return emptyDatabase();

    const dir = path.dirname(this.filePath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
      logger.info(`Created database directory: ${dir}`);
    }

    if (!fs.existsSync(this.filePath)) {
      this.data = emptyDatabase();
      this.commit();
      return this.data;
    }

    return this.readFile(this.filePath);
  }

  private readFile(filePath: string): Database {
    const stamp = this.currentStamp(filePath);
    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    } catch (error) {
      throw new DamagedStoreError(filePath, errorMessage(error));
    }

    const parsed = databaseFileSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.errors[0];
      throw new DamagedStoreError(filePath, `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    }

    this.fileStamp = stamp;
    return parsed.data;
  }

  private currentStamp(filePath: string): string | null {
    try {
      const stat = fs.statSync(filePath);
      return `${stat.ino}:${stat.size}:${stat.mtimeMs}`;
    } catch (error) {
      logger.warn(`Database file unavailable: ${errorMessage(error)}`);
      return null;
    }
  }

  /**
   * Pick up a file written by another process since our last read or write
   */
  private refresh(): void {
    if (!this.filePath) return;

    const stamp = this.currentStamp(this.filePath);
    if (stamp === null || stamp === this.fileStamp) return;

    this.data = this.readFile(this.filePath);
    logger.debug(`Database reloaded from ${this.filePath}`);
  }

  /**
   * Write the whole store through a temp file so readers never see half a file
   */
  private commit(): void {
    if (!this.filePath) return;

    this.data._meta.lastUpdated = new Date().toISOString();
    const tmpPath = `${this.filePath}.${process.pid}.tmp`;
    fs.writeFileSync(tmpPath, JSON.stringify(this.data));
    fs.renameSync(tmpPath, this.filePath);
    this.fileStamp = this.currentStamp(this.filePath);
  }

  // ==========================================================================
  // MESH OPERATIONS
  // ==========================================================================

  /**
   * Insert a mesh unless one with the same checksum exists.
   * Check and insert happen in one synchronous step.
   */
  insertMeshIfAbsent(mesh: NewMesh): { mesh: MeshRecord; created: boolean } {
    this.refresh();
    const existing = this.data.meshes.find(m => m.checksum === mesh.checksum);
    if (existing) {
      return { mesh: { ...existing }, created: false };
    }

    const newMesh: MeshRecord = { ...mesh, id: this.data._meta.nextMeshId++ };
    this.data.meshes.push(newMesh);
    this.commit();
    return { mesh: { ...newMesh }, created: true };
  }

  getMeshById(id: number): MeshRecord | undefined {
    this.refresh();
    const mesh = this.data.meshes.find(m => m.id === id);
    return mesh && { ...mesh };
  }

  getMeshByChecksum(checksum: string): MeshRecord | undefined {
    this.refresh();
    const mesh = this.data.meshes.find(m => m.checksum === checksum);
    return mesh && { ...mesh };
  }

  /**
   * Meshes matching a predicate, in insertion (id) order
   */
  findMeshes(predicate: (mesh: MeshRecord) => boolean): MeshRecord[] {
    this.refresh();
    return this.data.meshes.filter(predicate).map(m => ({ ...m }));
  }

  // ==========================================================================
  // ROUTE OPERATIONS
  // ==========================================================================

  createRoute(route: NewRoute): RouteRecord {
    this.refresh();
    const newRoute: RouteRecord = { ...route, id: this.data._meta.nextRouteId++ };
    this.data.routes.push(newRoute);
    this.commit();
    return { ...newRoute };
  }

  getRouteById(id: number): RouteRecord | undefined {
    this.refresh();
    const route = this.data.routes.find(r => r.id === id);
    return route && { ...route };
  }

  /**
   * Routes matching a predicate, in insertion (id) order
   */
  findRoutes(predicate: (route: RouteRecord) => boolean): RouteRecord[] {
    this.refresh();
    return this.data.routes.filter(predicate).map(r => ({ ...r }));
  }

  updateRoute(id: number, updates: RouteUpdate): RouteRecord | undefined {
    this.refresh();
    const index = this.data.routes.findIndex(r => r.id === id);
    if (index === -1) return undefined;

    this.data.routes[index] = { ...this.data.routes[index], ...updates };
    this.commit();
    return { ...this.data.routes[index] };
  }

  // ==========================================================================
  // JOB OPERATIONS
  // ==========================================================================

  createJob(job: JobRecord): JobRecord {
    this.refresh();
    this.data.jobs.push({ ...job });
    this.commit();
    return { ...job };
  }

  getJobById(id: string): JobRecord | undefined {
    this.refresh();
    const job = this.data.jobs.find(j => j.id === id);
    return job && { ...job };
  }

  getJobsByRoute(routeId: number): JobRecord[] {
    this.refresh();
    return this.data.jobs.filter(j => j.routeId === routeId).map(j => ({ ...j }));
  }

  // ==========================================================================
  // UTILITY
  // ==========================================================================

  /**
   * Get database stats
   */
  getStats() {
    this.refresh();
    return {
      meshes: this.data.meshes.length,
      routes: this.data.routes.length,
      resolvedRoutes: this.data.routes.filter(r => r.calculated !== null && r.json !== null).length,
      jobs: this.data.jobs.length,
      dbPath: this.filePath ?? 'memory'
    };
  }
}
