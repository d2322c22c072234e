/**
 * zod schemas for the geo types that cross a process or file boundary
 * (the JSON store, the navigation thread).
 */

import { z } from 'zod';

export const positionSchema = z.tuple([z.number(), z.number()]);

export const routeFeatureCollectionSchema = z.object({
  type: z.literal('FeatureCollection'),
  features: z.array(z.object({
    type: z.literal('Feature'),
    geometry: z.object({
      type: z.literal('LineString'),
      coordinates: z.array(positionSchema),
    }),
    properties: z.record(z.unknown()),
  })),
});

export const meshDocumentSchema = z.record(z.unknown());

export const waypointSchema = z.object({
  lat: z.number(),
  lon: z.number(),
  name: z.string(),
  isSource: z.boolean(),
  isDestination: z.boolean(),
});

export const boundingBoxShape = {
  latMin: z.number(),
  latMax: z.number(),
  lonMin: z.number(),
  lonMax: z.number(),
};
