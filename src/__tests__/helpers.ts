/**
 * Shared fixtures for the test suites
 */

import { DatabaseService, NewMesh, NewRoute } from '../shared/database/db';
import { boxArea } from '../shared/utils/geospatial.utils';

export function memoryDb(): DatabaseService {
  return new DatabaseService({ filePath: null });
}

export function meshFixture(overrides: Partial<NewMesh> = {}): NewMesh {
  const box = {
    latMin: overrides.latMin ?? -10,
    latMax: overrides.latMax ?? 10,
    lonMin: overrides.lonMin ?? -10,
    lonMax: overrides.lonMax ?? 10,
  };
  return {
    checksum: `checksum-${Math.random().toString(16).slice(2)}`,
    name: 'test.vessel.json',
    created: '2025-01-06T12:00:00.000Z',
    producerVersion: '2.1.0',
    size: boxArea(box),
    json: { cellboxes: [] },
    ...overrides,
    ...box,
  };
}

export function routeFixture(overrides: Partial<NewRoute> = {}): NewRoute {
  return {
    requested: new Date().toISOString(),
    calculated: null,
    file: null,
    info: null,
    meshId: null,
    startLat: 0,
    startLon: 0,
    endLat: 1,
    endLon: 1,
    startName: null,
    endName: null,
    jsonUnsmoothed: null,
    json: null,
    engineVersion: null,
    ...overrides,
  };
}
