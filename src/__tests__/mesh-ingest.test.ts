/**
 * =============================================================================
 * MESH INGESTION
 * =============================================================================
 *
 * Works on a temporary mesh directory holding gzipped YAML manifests and
 * gzipped mesh files.
 * =============================================================================
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import * as zlib from 'zlib';
import { stringify } from 'yaml';
import { ErrorCode } from '../core/constants';
import { IngestionError } from '../core/errors/AppError';
import { MeshIngestService } from '../modules/mesh/mesh-ingest.service';
import { parseManifestTimestamp } from '../modules/mesh/mesh.schema';
import { DatabaseService } from '../shared/database/db';
import { JsonMeshRepository } from '../shared/database/json.repository';
import { logger } from '../shared/services/logger.service';
import { md5Hex } from '../shared/utils/crypto.utils';
import { memoryDb } from './helpers';

jest.mock('../shared/services/logger.service', () => ({
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

interface MeshFile {
  name: string;
  body: string;
}

function meshFile(name: string, content: Record<string, unknown>): MeshFile {
  return { name, body: JSON.stringify(content) };
}

function record(file: MeshFile, overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    filepath: `uploads/2025/${file.name}`,
    md5: md5Hex(Buffer.from(file.body)),
    created: '20250106T120000',
    meshiphi: '2.1.0',
    latlong: { latmin: -80, latmax: -50, lonmin: -180, lonmax: 180 },
    ...overrides,
  };
}

describe('MeshIngestService', () => {
  let dir: string;
  let db: DatabaseService;
  let ingest: MeshIngestService;

  function writeMesh(file: MeshFile): void {
    fs.writeFileSync(path.join(dir, `${file.name}.gz`), zlib.gzipSync(file.body));
  }

  function writeManifest(name: string, records: Record<string, unknown>[]): string {
    const fullPath = path.join(dir, name);
    fs.writeFileSync(fullPath, zlib.gzipSync(stringify({ records })));
    return fullPath;
  }

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'mesh-ingest-'));
    db = memoryDb();
    ingest = new MeshIngestService(new JsonMeshRepository(db), dir);
    jest.clearAllMocks();
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('imports every vessel mesh listed in the manifest', async () => {
    const southern = meshFile('southern.vessel.json', { region: 'southern' });
    writeMesh(southern);
    writeManifest('upload_metadata_20250106.yaml.gz', [record(southern)]);

    const imported = await ingest.importNewMeshes();

    expect(imported).toHaveLength(1);
    expect(imported[0].name).toBe('southern.vessel.json');
    const stored = db.getMeshById(imported[0].id);
    expect(stored).toMatchObject({
      name: 'southern.vessel.json',
      checksum: md5Hex(Buffer.from(southern.body)),
      created: '2025-01-06T12:00:00.000Z',
      producerVersion: '2.1.0',
      latMin: -80,
      latMax: -50,
      lonMin: -180,
      lonMax: 180,
      size: 30 * 360,
      json: { region: 'southern' },
    });
  });

  it('inserts nothing when run again over the same manifest', async () => {
    const mesh = meshFile('arctic.vessel.json', { region: 'arctic' });
    writeMesh(mesh);
    writeManifest('upload_metadata_20250106.yaml.gz', [record(mesh)]);

    await ingest.importNewMeshes();
    const second = await ingest.importNewMeshes();

    expect(second).toEqual([]);
    expect(db.findMeshes(() => true)).toHaveLength(1);
  });

  it('skips records that are not vessel meshes', async () => {
    const vessel = meshFile('weddell.vessel.json', { region: 'weddell' });
    const environment = meshFile('weddell.env.json', { region: 'weddell' });
    writeMesh(vessel);
    writeMesh(environment);
    writeManifest('upload_metadata_20250106.yaml.gz', [record(environment), record(vessel)]);

    const imported = await ingest.importNewMeshes();

    expect(imported.map(m => m.name)).toEqual(['weddell.vessel.json']);
  });

  it('reads only the most recently modified manifest', async () => {
    const older = meshFile('older.vessel.json', { v: 1 });
    const newer = meshFile('newer.vessel.json', { v: 2 });
    writeMesh(older);
    writeMesh(newer);
    const olderManifest = writeManifest('upload_metadata_b.yaml.gz', [record(older)]);
    const newerManifest = writeManifest('upload_metadata_a.yaml.gz', [record(newer)]);
    fs.utimesSync(olderManifest, new Date('2025-01-01T00:00:00Z'), new Date('2025-01-01T00:00:00Z'));
    fs.utimesSync(newerManifest, new Date('2025-02-01T00:00:00Z'), new Date('2025-02-01T00:00:00Z'));

    const imported = await ingest.importNewMeshes();

    expect(imported.map(m => m.name)).toEqual(['newer.vessel.json']);
  });

  it('still imports a mesh whose checksum does not match, with a warning', async () => {
    const mesh = meshFile('ross.vessel.json', { region: 'ross' });
    writeMesh(mesh);
    writeManifest('upload_metadata_20250106.yaml.gz', [record(mesh, { md5: 'declared-checksum' })]);

    const imported = await ingest.importNewMeshes();

    expect(imported).toEqual([{ id: expect.any(Number), checksum: 'declared-checksum', name: 'ross.vessel.json' }]);
    expect(logger.warn).toHaveBeenCalledWith('[MeshIngest] Checksum mismatch for ross.vessel.json', {
      manifest: 'declared-checksum',
      actual: md5Hex(Buffer.from(mesh.body)),
    });
  });

  it('throws an IngestionError when no manifest exists', async () => {
    await expect(ingest.importNewMeshes()).rejects.toBeInstanceOf(IngestionError);
  });

  it('throws an IngestionError for a malformed manifest', async () => {
    writeManifest('upload_metadata_bad.yaml.gz', [{ filepath: 'x.vessel.json' }]);

    await expect(ingest.importNewMeshes()).rejects.toMatchObject({ code: ErrorCode.MESH_MANIFEST_INVALID });
  });

  it('throws an IngestionError when the mesh directory is missing', async () => {
    const missing = new MeshIngestService(new JsonMeshRepository(db), path.join(dir, 'does-not-exist'));

    await expect(missing.importNewMeshes()).rejects.toMatchObject({ code: ErrorCode.MESH_INGESTION_FAILED });
  });
});

describe('parseManifestTimestamp', () => {
  it('reads the compact UTC form', () => {
    expect(parseManifestTimestamp('20250106T120000').toISOString()).toBe('2025-01-06T12:00:00.000Z');
  });

  it('rejects dates that do not exist', () => {
    expect(() => parseManifestTimestamp('20250230T000000')).toThrow('Invalid manifest timestamp: 20250230T000000');
  });

  it('rejects other formats', () => {
    expect(() => parseManifestTimestamp('2025-01-06T12:00:00Z')).toThrow('Invalid manifest timestamp');
  });
});
