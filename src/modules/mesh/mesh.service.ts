/**
 * =============================================================================
 * MESH SERVICE - Mesh selection and lookup
 * =============================================================================
 *
 * selectMesh picks the meshes a route between two points can be planned on:
 *
 *   1. Keep meshes whose bounding box contains BOTH points (inclusive)
 *   2. Keep only meshes created on the latest creation date (UTC day)
 *   3. Order by extent (smallest first), then newest, then lowest id
 *
 * The first entry is the preferred mesh; the rest are fallbacks for route
 * matching.
 * =============================================================================
 */

import { MeshNotFoundError } from '../../core/errors/AppError';
import { MeshRecord } from '../../shared/database/db';
import { IMeshRepository } from '../../shared/database/repository.interface';
import { logger } from '../../shared/services/logger.service';

/**
 * Orders two meshes of the same creation date, smaller = preferred
 */
export type MeshComparator = (a: MeshRecord, b: MeshRecord) => number;

/**
 * Smallest extent first, then newest, then lowest id (total order)
 */
export const bySizeThenRecency: MeshComparator = (a, b) =>
  a.size - b.size ||
  Date.parse(b.created) - Date.parse(a.created) ||
  a.id - b.id;

const utcDay = (iso: string): string => new Date(iso).toISOString().slice(0, 10);

export class MeshService {
  constructor(
    private readonly meshes: IMeshRepository,
    private readonly compare: MeshComparator = bySizeThenRecency
  ) {}

  async selectMesh(
    startLat: number,
    startLon: number,
    endLat: number,
    endLon: number
  ): Promise<MeshRecord[]> {
    const containing = await this.meshes.findContaining([
      { lat: startLat, lon: startLon },
      { lat: endLat, lon: endLon },
    ]);

    if (containing.length === 0) {
      logger.debug(`[MeshService] No mesh contains (${startLat}, ${startLon}) and (${endLat}, ${endLon})`);
      return [];
    }

    // ISO dates compare lexicographically
    const latestDay = containing
      .map(mesh => utcDay(mesh.created))
      .reduce((latest, day) => (day > latest ? day : latest));

    return containing
      .filter(mesh => utcDay(mesh.created) === latestDay)
      .sort(this.compare);
  }

  async listMeshes(): Promise<MeshRecord[]> {
    return this.meshes.findAll();
  }

  async getMesh(id: number): Promise<MeshRecord> {
    const mesh = await this.meshes.findById(id);
    if (!mesh) {
      throw new MeshNotFoundError(id);
    }
    return mesh;
  }
}
