/**
 * =============================================================================
 * MESH ROUTES
 * =============================================================================
 *
 * GET /api/mesh       - stored meshes, without their content
 * GET /api/mesh/:id   - one mesh including its content
 * =============================================================================
 */

import { Router, Request, Response } from 'express';
import { ApiResponse } from '../../core/responses/ApiResponse';
import { ValidationError } from '../../core/errors/AppError';
import { asyncHandler } from '../../shared/middleware/error.middleware';
import { MeshService } from './mesh.service';
import { meshIdParamSchema, toMeshDetail, toMeshSummary } from './mesh.schema';

export function createMeshRouter(meshService: MeshService): Router {
  const router = Router();

  router.get('/', asyncHandler(async (_req: Request, res: Response) => {
    const meshes = await meshService.listMeshes();
    return ApiResponse.list(res, meshes.map(toMeshSummary));
  }));

  router.get('/:id', asyncHandler(async (req: Request, res: Response) => {
    const parsed = meshIdParamSchema.safeParse(req.params);
    if (!parsed.success) {
      throw ValidationError.fromZodError(parsed.error);
    }

    const mesh = await meshService.getMesh(parsed.data.id);
    return ApiResponse.success(res, toMeshDetail(mesh));
  }));

  return router;
}
