/**
 * =============================================================================
 * MESH INGEST SERVICE - Import newly uploaded meshes
 * =============================================================================
 *
 * One run:
 *   1. Newest `upload_metadata_*.yaml.gz` in the mesh directory (by mtime)
 *   2. gunzip + YAML-parse its records
 *   3. For every `.vessel.json` record whose checksum is not stored yet:
 *      gunzip `<meshDir>/<basename>.gz` and insert it as a mesh
 *
 * Re-running over the same manifest inserts nothing. A missing manifest is an
 * IngestionError and is NOT swallowed here.
 * =============================================================================
 */

import * as fs from 'fs';
import * as path from 'path';
import * as zlib from 'zlib';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ErrorCode, NAVIGATION } from '../../core/constants';
import { errorMessage, IngestionError } from '../../core/errors/AppError';
import { IMeshRepository } from '../../shared/database/repository.interface';
import { logger } from '../../shared/services/logger.service';
import { MeshDocument } from '../../shared/types/geo.types';
import { checksumsMatch, md5Hex } from '../../shared/utils/crypto.utils';
import { boxArea } from '../../shared/utils/geospatial.utils';
import { Manifest, manifestSchema, ManifestRecord, parseManifestTimestamp } from './mesh.schema';

export interface ImportedMesh {
  id: number;
  checksum: string;
  name: string;
}

const meshDocumentSchema = z.record(z.unknown());

export class MeshIngestService {
  constructor(
    private readonly meshes: IMeshRepository,
    private readonly meshDir: string
  ) {}

  async importNewMeshes(): Promise<ImportedMesh[]> {
    const manifestPath = await this.findLatestManifest();
    logger.info(`[MeshIngest] Reading manifest ${manifestPath}`);

    const manifest = await this.readManifest(manifestPath);
    const imported: ImportedMesh[] = [];

    for (const record of manifest.records) {
      if (!record.filepath.endsWith(NAVIGATION.VESSEL_MESH_SUFFIX)) continue;

      const existing = await this.meshes.findByChecksum(record.md5);
      if (existing) {
        logger.debug(`[MeshIngest] Mesh ${record.md5} already stored as ${existing.id}`);
        continue;
      }

      const added = await this.importRecord(record);
      if (added) imported.push(added);
    }

    logger.info(`[MeshIngest] Imported ${imported.length} new mesh(es)`);
    return imported;
  }

  /**
   * Most recently modified manifest in the mesh directory
   */
  private async findLatestManifest(): Promise<string> {
    let entries: string[];
    try {
      entries = await fs.promises.readdir(this.meshDir);
    } catch (error) {
      throw new IngestionError(
        `Mesh directory not readable: ${this.meshDir}`,
        ErrorCode.MESH_INGESTION_FAILED,
        { meshDir: this.meshDir, cause: errorMessage(error) }
      );
    }

    const manifests = entries.filter(
      name => name.startsWith(NAVIGATION.MANIFEST_PREFIX) && name.endsWith(NAVIGATION.MANIFEST_SUFFIX)
    );

    if (manifests.length === 0) {
      throw new IngestionError('Upload metadata file not found.', ErrorCode.MESH_INGESTION_FAILED, {
        meshDir: this.meshDir,
      });
    }

    const withTimes = await Promise.all(
      manifests.map(async name => {
        const fullPath = path.join(this.meshDir, name);
        const stats = await fs.promises.stat(fullPath);
        return { fullPath, mtimeMs: stats.mtimeMs };
      })
    );

    return withTimes.reduce((latest, entry) => (entry.mtimeMs > latest.mtimeMs ? entry : latest)).fullPath;
  }

  private async readManifest(manifestPath: string): Promise<Manifest> {
    const compressed = await fs.promises.readFile(manifestPath);
    const parsed = manifestSchema.safeParse(parseYaml(zlib.gunzipSync(compressed).toString('utf-8')));

    if (!parsed.success) {
      throw new IngestionError(`Invalid upload manifest: ${manifestPath}`, ErrorCode.MESH_MANIFEST_INVALID, {
        issues: parsed.error.errors.map(e => `${e.path.join('.')}: ${e.message}`),
      });
    }
    return parsed.data;
  }

  private async importRecord(record: ManifestRecord): Promise<ImportedMesh | null> {
    const name = path.posix.basename(record.filepath);
    const meshPath = path.join(this.meshDir, `${name}.gz`);

    const raw = zlib.gunzipSync(await fs.promises.readFile(meshPath));
    const actualChecksum = md5Hex(raw);
    if (!checksumsMatch(actualChecksum, record.md5)) {
      logger.warn(`[MeshIngest] Checksum mismatch for ${name}`, {
        manifest: record.md5,
        actual: actualChecksum,
      });
    }

    const json: MeshDocument = meshDocumentSchema.parse(JSON.parse(raw.toString('utf-8')));
    const bounds = {
      latMin: record.latlong.latmin,
      latMax: record.latlong.latmax,
      lonMin: record.latlong.lonmin,
      lonMax: record.latlong.lonmax,
    };

    const { mesh, created } = await this.meshes.createIfAbsent({
      checksum: record.md5,
      name,
      created: parseManifestTimestamp(record.created).toISOString(),
      producerVersion: record.meshiphi ?? null,
      ...bounds,
      size: boxArea(bounds),
      json,
    });

    // Lost a race with another import run
    if (!created) return null;

    logger.info(`[MeshIngest] Added mesh ${mesh.id} ${name} (${mesh.created})`);
    return { id: mesh.id, checksum: mesh.checksum, name };
  }
}
