/**
 * =============================================================================
 * ROUTE MODULE
 * =============================================================================
 *
 * Route requests: mesh selection, reuse of existing routes (exact or within
 * tolerance), dispatch of new calculations, and route evaluation.
 * =============================================================================
 */

export * from './route.schema';
export * from './route-matcher.service';
export * from './route.service';
export * from './route.routes';
