/**
 * =============================================================================
 * CORE CONSTANTS - Single Source of Truth
 * =============================================================================
 *
 * All application-wide constants in one place.
 * Import from '../core/constants' in other modules.
 *
 * =============================================================================
 */

// =============================================================================
// TASK STATES
// =============================================================================

/**
 * Lifecycle states of a queued computation.
 * Never persisted - always read live from the task queue.
 */
export enum TaskState {
  PENDING = 'PENDING',     // Queued, unknown, or not yet picked up by a worker
  RUNNING = 'RUNNING',     // A worker is executing it
  SUCCESS = 'SUCCESS',     // Finished with a result
  FAILURE = 'FAILURE',     // Finished with an error (terminal, never retried)
  REVOKED = 'REVOKED'      // Cancelled before it started
}

/**
 * States after which a task will never change again
 */
export const TERMINAL_TASK_STATES: ReadonlySet<TaskState> = new Set([
  TaskState.SUCCESS,
  TaskState.FAILURE,
  TaskState.REVOKED
]);

// =============================================================================
// API CONFIGURATION
// =============================================================================

export const API_PREFIX = '/api';

/**
 * Fixed rate limit tiers (the general API limit comes from config)
 */
export const RATE_LIMITS = {
  // Route evaluation runs the navigation engine inline
  EVALUATION: { windowMs: 60 * 1000, max: 20 }    // 20 req/min
} as const;

// =============================================================================
// NAVIGATION
// =============================================================================

export const NAVIGATION = {
  /** Mean Earth radius in nautical miles (6371 km) */
  EARTH_RADIUS_NM: 6371 / 1.852,

  /** Suffix of the mesh artifacts the planner consumes */
  VESSEL_MESH_SUFFIX: '.vessel.json',

  /** Manifest naming convention in the mesh directory */
  MANIFEST_PREFIX: 'upload_metadata_',
  MANIFEST_SUFFIX: '.yaml.gz'
} as const;

// =============================================================================
// QUEUE NAMES
// =============================================================================

export const QUEUES = {
  ROUTE_CALCULATION: 'route-calculation'
} as const;

// =============================================================================
// HTTP STATUS CODES (for consistency)
// =============================================================================

export const HTTP_STATUS = {
  OK: 200,
  ACCEPTED: 202,
  BAD_REQUEST: 400,
  NOT_FOUND: 404,
  UNPROCESSABLE: 422,
  TOO_MANY_REQUESTS: 429,
  INTERNAL_ERROR: 500,
  SERVICE_UNAVAILABLE: 503
} as const;

// =============================================================================
// ERROR CODES (Hierarchical Structure)
// =============================================================================
/**
 * Application-specific error codes
 *
 * PATTERN: Hierarchical error codes
 * - 2xxx: Validation errors
 * - 3xxx: Route & job lookups
 * - 4xxx: Mesh & ingestion
 * - 5xxx: Route calculation
 * - 9xxx: System/Infrastructure errors
 */
export enum ErrorCode {
  // =============================================================================
  // VALIDATION ERRORS (2xxx)
  // =============================================================================
  VALIDATION_ERROR = 'VAL_2001',

  // =============================================================================
  // ROUTES & JOBS (3xxx)
  // =============================================================================
  ROUTE_NOT_FOUND = 'ROUTE_3001',
  JOB_NOT_FOUND = 'ROUTE_3002',

  // =============================================================================
  // MESHES (4xxx)
  // =============================================================================
  MESH_NOT_FOUND = 'MESH_4001',
  MESH_INGESTION_FAILED = 'MESH_4002',
  MESH_MANIFEST_INVALID = 'MESH_4003',

  // =============================================================================
  // CALCULATION (5xxx)
  // =============================================================================
  CALCULATION_FAILED = 'CALC_5001',

  // =============================================================================
  // SYSTEM / INFRASTRUCTURE (9xxx)
  // =============================================================================
  INTERNAL_ERROR = 'SYS_9001',
  SERVICE_UNAVAILABLE = 'SYS_9002',
  RATE_LIMIT_EXCEEDED = 'SYS_9003',
  NOT_FOUND = 'SYS_9004'
}
