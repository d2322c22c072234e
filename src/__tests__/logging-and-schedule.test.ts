/**
 * =============================================================================
 * LOG SANITIZING & MESH IMPORT SCHEDULE
 * =============================================================================
 */

import { IngestionError } from '../core/errors/AppError';
import { ImportedMesh, MeshIngestService } from '../modules/mesh/mesh-ingest.service';
import { runMeshImport, startMeshImportJob } from '../shared/jobs/import-meshes.job';
import { maskQueryParams } from '../shared/middleware/request-logger.middleware';
import { sanitizeLogData } from '../shared/services/logger.service';
import { JsonMeshRepository } from '../shared/database/json.repository';
import { memoryDb } from './helpers';

describe('sanitizeLogData', () => {
  it('redacts credential-like keys at any depth', () => {
    expect(sanitizeLogData({
      path: '/api/route',
      apiKey: 'test-key',
      nested: { password: 'test-secret', ok: 1 },
      list: [{ token: 'test-token' }],
    })).toEqual({
      path: '/api/route',
      apiKey: '[REDACTED]',
      nested: { password: '[REDACTED]', ok: 1 },
      list: [{ token: '[REDACTED]' }],
    });
  });

  it('collapses long arrays to their length', () => {
    const coordinates = Array.from({ length: 21 }, (_, i) => [i, i]);

    expect(sanitizeLogData({ coordinates, short: [1, 2] })).toEqual({
      coordinates: '[Array(21)]',
      short: [1, 2],
    });
  });
});

describe('maskQueryParams', () => {
  it('masks sensitive query parameters only', () => {
    expect(maskQueryParams({ access_token: 'test-token', mesh: '3' })).toEqual({
      access_token: '[MASKED]',
      mesh: '3',
    });
  });
});

describe('mesh import schedule', () => {
  function ingestWith(importNewMeshes: () => Promise<ImportedMesh[]>): MeshIngestService {
    const ingest = new MeshIngestService(new JsonMeshRepository(memoryDb()), '/nonexistent');
    jest.spyOn(ingest, 'importNewMeshes').mockImplementation(importNewMeshes);
    return ingest;
  }

  afterEach(() => {
    jest.useRealTimers();
  });

  it('returns the imported meshes of a run', async () => {
    const ingest = ingestWith(async () => [{ id: 1, checksum: 'abc', name: 'a.vessel.json' }]);

    expect(await runMeshImport(ingest)).toEqual([{ id: 1, checksum: 'abc', name: 'a.vessel.json' }]);
  });

  it('turns a failed run into an empty result', async () => {
    const ingest = ingestWith(async () => {
      throw new IngestionError('Upload metadata file not found.');
    });

    expect(await runMeshImport(ingest)).toEqual([]);
  });

  it('runs at startup and on every interval until stopped', async () => {
    jest.useFakeTimers();
    const importNewMeshes = jest.fn(async (): Promise<ImportedMesh[]> => []);
    const ingest = ingestWith(importNewMeshes);

    const stop = startMeshImportJob(ingest, 1000);
    await jest.advanceTimersByTimeAsync(0);
    expect(importNewMeshes).toHaveBeenCalledTimes(1);

    await jest.advanceTimersByTimeAsync(2000);
    expect(importNewMeshes).toHaveBeenCalledTimes(3);

    stop();
    await jest.advanceTimersByTimeAsync(5000);
    expect(importNewMeshes).toHaveBeenCalledTimes(3);
  });
});
