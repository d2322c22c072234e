/**
 * =============================================================================
 * ROUTE ROUTES
 * =============================================================================
 *
 * POST   /api/route            - request a route (202, or 200 FAILURE if no mesh)
 * GET    /api/route/:id        - status of a calculation job
 * DELETE /api/route/:id        - cancel a calculation job (always 202)
 * GET    /api/recent_routes    - today's routes with their latest job
 * POST   /api/evaluate_route   - travel time and fuel of a given route
 * =============================================================================
 */

import { Router, Request, RequestHandler, Response } from 'express';
import { API_PREFIX, HTTP_STATUS } from '../../core/constants';
import { ValidationError } from '../../core/errors/AppError';
import { ApiResponse } from '../../core/responses/ApiResponse';
import { asyncHandler } from '../../shared/middleware/error.middleware';
import { JobService } from '../job/job.service';
import { evaluateRouteRequestSchema, routeRequestSchema } from './route.schema';
import { RouteService } from './route.service';

export interface RouteRouterOptions {
  /** Extra limiter in front of the evaluation endpoint */
  evaluationLimiter?: RequestHandler;
}

/**
 * Absolute URL clients poll for a job's status
 */
function statusUrlFor(req: Request): (jobId: string) => string {
  const base = `${req.protocol}://${req.get('host') ?? 'localhost'}${API_PREFIX}/route`;
  return jobId => `${base}/${encodeURIComponent(jobId)}`;
}

export function createRouteRouter(
  routeService: RouteService,
  jobService: JobService,
  options: RouteRouterOptions = {}
): Router {
  const router = Router();

  router.post('/route', asyncHandler(async (req: Request, res: Response) => {
    const parsed = routeRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      throw ValidationError.fromZodError(parsed.error);
    }

    const outcome = await routeService.requestRoute(parsed.data, statusUrlFor(req));

    switch (outcome.kind) {
      case 'no-mesh':
        return ApiResponse.success(res, outcome.body);
      case 'existing':
        return ApiResponse.accepted(res, outcome.body, 'Existing route returned');
      case 'dispatched':
        return ApiResponse.accepted(res, outcome.body, 'Route calculation queued');
    }
  }));

  router.get('/route/:id', asyncHandler(async (req: Request, res: Response) => {
    const status = await jobService.getStatus(req.params.id);
    return ApiResponse.success(res, status);
  }));

  router.delete('/route/:id', (req: Request, res: Response) => {
    jobService.cancel(req.params.id);
    ApiResponse.custom(res, HTTP_STATUS.ACCEPTED, {});
  });

  router.get('/recent_routes', asyncHandler(async (_req: Request, res: Response) => {
    const routes = await jobService.listRecent();
    return ApiResponse.list(res, routes);
  }));

  const evaluationHandlers: RequestHandler[] = options.evaluationLimiter ? [options.evaluationLimiter] : [];

  router.post('/evaluate_route', ...evaluationHandlers, asyncHandler(async (req: Request, res: Response) => {
    const parsed = evaluateRouteRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      throw ValidationError.fromZodError(parsed.error);
    }

    const evaluation = await routeService.evaluateRoute(parsed.data);
    return ApiResponse.success(res, evaluation);
  }));

  return router;
}
