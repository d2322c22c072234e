/**
 * =============================================================================
 * ENGINE THREAD PROTOCOL
 * =============================================================================
 *
 * Messages between the request loop and a navigation thread. Every request
 * carries an id; the thread answers each one exactly once with the same id.
 *
 *   → { id, method: 'computeUnsmoothed', mesh, waypoints }
 *   → { id, method: 'smooth', mesh, unsmoothed, waypoints }
 *   → { id, method: 'evaluate', mesh, route }
 *   ← { id, ok: true, result } | { id, ok: false, error }
 * =============================================================================
 */

import { z } from 'zod';
import { errorMessage } from '../../core/errors/AppError';
import { meshDocumentSchema, routeFeatureCollectionSchema, waypointSchema } from '../../shared/types/geo.schema';
import { RouteFeatureCollection } from '../../shared/types/geo.types';
import { NavigationEngine } from './navigation-engine';

export const engineRequestSchema = z.discriminatedUnion('method', [
  z.object({
    id: z.string().min(1),
    method: z.literal('computeUnsmoothed'),
    mesh: meshDocumentSchema,
    waypoints: z.array(waypointSchema),
  }),
  z.object({
    id: z.string().min(1),
    method: z.literal('smooth'),
    mesh: meshDocumentSchema,
    unsmoothed: routeFeatureCollectionSchema,
    waypoints: z.array(waypointSchema),
  }),
  z.object({
    id: z.string().min(1),
    method: z.literal('evaluate'),
    mesh: meshDocumentSchema,
    route: routeFeatureCollectionSchema,
  }),
]);

export type EngineRequest = z.infer<typeof engineRequestSchema>;

export const engineResponseSchema = z.union([
  z.object({ id: z.string(), ok: z.literal(true), result: routeFeatureCollectionSchema }),
  z.object({ id: z.string(), ok: z.literal(false), error: z.string() }),
]);

export type EngineResponse = z.infer<typeof engineResponseSchema>;

/**
 * Id of a message that failed validation, '' if it has none
 */
export function messageId(message: unknown): string {
  if (typeof message === 'object' && message !== null && 'id' in message && typeof message.id === 'string') {
    return message.id;
  }
  return '';
}

function callEngine(engine: NavigationEngine, request: EngineRequest): Promise<RouteFeatureCollection> {
  switch (request.method) {
    case 'computeUnsmoothed':
      return engine.computeUnsmoothed(request.mesh, request.waypoints);
    case 'smooth':
      return engine.smooth(request.mesh, request.unsmoothed, request.waypoints);
    case 'evaluate':
      return engine.evaluate(request.mesh, request.route);
  }
}

/**
 * Thread side: run one request against the engine. Never rejects.
 */
export async function answerEngineRequest(
  engine: NavigationEngine,
  message: unknown
): Promise<EngineResponse> {
  const parsed = engineRequestSchema.safeParse(message);
  if (!parsed.success) {
    const issue = parsed.error.errors[0];
    return {
      id: messageId(message),
      ok: false,
      error: `Malformed engine request (${issue.path.join('.') || 'message'}: ${issue.message})`,
    };
  }

  const request = parsed.data;
  try {
    const result = await callEngine(engine, request);
    return { id: request.id, ok: true, result };
  } catch (error) {
    return { id: request.id, ok: false, error: errorMessage(error) };
  }
}
