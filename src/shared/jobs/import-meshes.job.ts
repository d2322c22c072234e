/**
 * Scheduled mesh import: runs once at startup, then every
 * MESH_IMPORT_INTERVAL_MS. A failed run (e.g. no manifest yet) is logged at
 * error level and the schedule keeps going.
 */

import { errorMessage } from '../../core/errors/AppError';
import { ImportedMesh, MeshIngestService } from '../../modules/mesh/mesh-ingest.service';
import { logger } from '../services/logger.service';

/**
 * One import run that never rejects
 */
export async function runMeshImport(ingest: MeshIngestService): Promise<ImportedMesh[]> {
  try {
    const imported = await ingest.importNewMeshes();
    if (imported.length > 0) {
      logger.info(`[MeshImportJob] ${imported.length} mesh(es) added`, {
        ids: imported.map(m => m.id)
      });
    }
    return imported;
  } catch (error) {
    logger.error(`[MeshImportJob] Mesh import failed: ${errorMessage(error)}`);
    return [];
  }
}

/**
 * Start the import schedule. Returns a function that stops it.
 */
export function startMeshImportJob(ingest: MeshIngestService, intervalMs: number): () => void {
  logger.info(`[MeshImportJob] Starting mesh import (every ${Math.round(intervalMs / 1000)}s)`);

  let running = false;
  const run = async (): Promise<void> => {
    // Skip a tick while the previous run is still going
    if (running) return;
    running = true;
    try {
      await runMeshImport(ingest);
    } finally {
      running = false;
    }
  };
  const tick = (): void => {
    run().catch(error => {
      logger.error(`[MeshImportJob] Scheduler error: ${errorMessage(error)}`);
    });
  };

  tick();
  const timer = setInterval(tick, intervalMs);

  return () => clearInterval(timer);
}
