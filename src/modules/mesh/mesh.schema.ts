/**
 * =============================================================================
 * MESH MODULE - SCHEMAS & TYPES
 * =============================================================================
 *
 * Upload manifest layout (gzipped YAML, `upload_metadata_*.yaml.gz`):
 *
 *   records:
 *     - filepath: some/dir/southern_ocean.vessel.json
 *       md5: 0f343b0931126a20f133d67c2b018a3b
 *       created: 20250106T120000        # UTC
 *       meshiphi: 2.1.0
 *       latlong: { latmin: -80, latmax: -50, lonmin: -180, lonmax: 180 }
 *
 * Only `.vessel.json` records are meshes the planner can use; the mesh file
 * itself sits next to the manifest as `<basename>.gz`.
 * =============================================================================
 */

import { z } from 'zod';
import { MeshRecord } from '../../shared/database/db';

// =============================================================================
// MANIFEST
// =============================================================================

const MANIFEST_TIMESTAMP = /^(\d{4})(\d{2})(\d{2})T(\d{2})(\d{2})(\d{2})$/;

export const manifestRecordSchema = z.object({
  filepath: z.string().min(1),
  md5: z.string().min(1),
  // YAML may hand back a bare number-like token as a number
  created: z.union([z.string(), z.number()]).transform(String),
  meshiphi: z.union([z.string(), z.number()]).transform(String).optional(),
  latlong: z.object({
    latmin: z.number(),
    latmax: z.number(),
    lonmin: z.number(),
    lonmax: z.number(),
  }),
}).passthrough();

export const manifestSchema = z.object({
  records: z.array(manifestRecordSchema).default([]),
});

export type ManifestRecord = z.infer<typeof manifestRecordSchema>;
export type Manifest = z.infer<typeof manifestSchema>;

/**
 * `YYYYMMDDTHHMMSS` (UTC) → Date. Throws on anything else.
 */
export function parseManifestTimestamp(value: string): Date {
  const match = MANIFEST_TIMESTAMP.exec(value);
  if (!match) {
    throw new Error(`Invalid manifest timestamp: ${value}`);
  }

  const [, year, month, day, hour, minute, second] = match.map(Number);
  const date = new Date(Date.UTC(year, month - 1, day, hour, minute, second));

  // Rejects e.g. month 13 which Date.UTC would roll over
  if (date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    throw new Error(`Invalid manifest timestamp: ${value}`);
  }
  return date;
}

// =============================================================================
// API SHAPES
// =============================================================================

export const meshIdParamSchema = z.object({
  id: z.coerce.number().int().positive(),
});

export interface MeshSummary {
  id: number;
  name: string | null;
  checksum: string;
  created: string;
  producer_version: string | null;
  lat_min: number;
  lat_max: number;
  lon_min: number;
  lon_max: number;
  size: number;
}

export interface MeshDetail extends MeshSummary {
  json: Record<string, unknown>;
}

export function toMeshSummary(mesh: MeshRecord): MeshSummary {
  return {
    id: mesh.id,
    name: mesh.name,
    checksum: mesh.checksum,
    created: mesh.created,
    producer_version: mesh.producerVersion,
    lat_min: mesh.latMin,
    lat_max: mesh.latMax,
    lon_min: mesh.lonMin,
    lon_max: mesh.lonMax,
    size: mesh.size,
  };
}

export function toMeshDetail(mesh: MeshRecord): MeshDetail {
  return { ...toMeshSummary(mesh), json: mesh.json };
}
