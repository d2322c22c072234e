/**
 * =============================================================================
 * MESH MODULE
 * =============================================================================
 *
 * - Mesh selection by containment, recency and extent
 * - Import of uploaded meshes from the mesh directory
 * - Read-only mesh API
 * =============================================================================
 */

export * from './mesh.schema';
export * from './mesh.service';
export * from './mesh-ingest.service';
export * from './mesh.routes';
