/**
 * One-off mesh import.
 *
 * Usage:
 *   MESH_DIR=/data/mesh DATA_DIR=/data/store node dist/scripts/import-meshes.js
 *
 * Exits 1 when the run fails (e.g. no upload manifest in MESH_DIR).
 */

import path from 'path';
import { config } from '../src/config/environment';
import { errorMessage, IngestionError } from '../src/core';
import { DatabaseService } from '../src/shared/database/db';
import { JsonMeshRepository } from '../src/shared/database/json.repository';
import { logger } from '../src/shared/services/logger.service';
import { MeshIngestService } from '../src/modules/mesh/mesh-ingest.service';

async function run(): Promise<void> {
  const db = new DatabaseService({ filePath: path.join(config.dataDir, 'vessel-route-db.json') });
  const ingest = new MeshIngestService(new JsonMeshRepository(db), config.mesh.dir);

  // Each insert is written through, so a running server picks it up
  const imported = await ingest.importNewMeshes();
  console.log(JSON.stringify(imported, null, 2));
}

run().catch((err) => {
  const code = err instanceof IngestionError ? err.code : 'UNKNOWN';
  logger.error(`[import-meshes] failed (${code}): ${errorMessage(err)}`);
  process.exit(1);
});
