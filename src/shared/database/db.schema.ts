/**
 * Shape of the JSON store file, checked on every load.
 */

import { z } from 'zod';
import { boundingBoxShape, meshDocumentSchema, routeFeatureCollectionSchema } from '../types/geo.schema';

const timestampSchema = z.string().min(1);

const meshRecordSchema = z.object({
  id: z.number().int().positive(),
  checksum: z.string().min(1),
  name: z.string().nullable(),
  created: timestampSchema,
  producerVersion: z.string().nullable(),
  size: z.number(),
  json: meshDocumentSchema,
  ...boundingBoxShape,
});

const routeRecordSchema = z.object({
  id: z.number().int().positive(),
  requested: timestampSchema,
  calculated: timestampSchema.nullable(),
  file: z.string().nullable(),
  info: z.object({ error: z.string().optional(), info: z.string().optional() }).nullable(),
  meshId: z.number().int().nullable(),
  startLat: z.number(),
  startLon: z.number(),
  endLat: z.number(),
  endLon: z.number(),
  startName: z.string().nullable(),
  endName: z.string().nullable(),
  jsonUnsmoothed: routeFeatureCollectionSchema.nullable(),
  json: routeFeatureCollectionSchema.nullable(),
  engineVersion: z.string().nullable(),
});

const jobRecordSchema = z.object({
  id: z.string().min(1),
  created: timestampSchema,
  routeId: z.number().int().positive(),
});

export const databaseFileSchema = z.object({
  meshes: z.array(meshRecordSchema).default([]),
  routes: z.array(routeRecordSchema).default([]),
  jobs: z.array(jobRecordSchema).default([]),
  _meta: z.object({
    version: z.string(),
    lastUpdated: timestampSchema,
    nextMeshId: z.number().int().positive(),
    nextRouteId: z.number().int().positive(),
  }),
});
