/**
 * =============================================================================
 * ENVIRONMENT VALIDATION
 * =============================================================================
 *
 * Validates all environment variables at startup.
 * Fails fast if configuration is invalid.
 *
 * USAGE:
 * ```typescript
 * // At application startup (server.ts)
 * import { validateAndLogEnvironment } from './core';
 * validateAndLogEnvironment(); // Exits in production if invalid
 * ```
 *
 * =============================================================================
 */

import { logger } from '../../shared/services/logger.service';

/**
 * Environment variable definition
 */
interface EnvVar {
  name: string;
  required: boolean;
  default?: string;
  validator?: (value: string) => boolean;
  description: string;
}

export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
  loaded: Record<string, string>;
}

const isPositiveInt = (v: string): boolean => /^\d+$/.test(v) && parseInt(v, 10) > 0;
const isPositiveNumber = (v: string): boolean => !isNaN(Number(v)) && Number(v) > 0;
const isNonNegativeInt = (v: string): boolean => /^\d+$/.test(v);
const isBoolean = (v: string): boolean => ['true', 'false'].includes(v.toLowerCase());

/**
 * All environment variables with their requirements
 */
const ENV_VARS: EnvVar[] = [
  // ==========================================================================
  // SERVER
  // ==========================================================================
  {
    name: 'NODE_ENV',
    required: false,
    default: 'development',
    validator: (v) => ['development', 'staging', 'production', 'test'].includes(v),
    description: 'Application environment'
  },
  {
    name: 'PORT',
    required: false,
    default: '3000',
    validator: (v) => isPositiveInt(v) && parseInt(v, 10) < 65536,
    description: 'Server port number'
  },
  {
    name: 'LOG_LEVEL',
    required: false,
    default: 'info',
    validator: (v) => ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'].includes(v),
    description: 'Winston log level'
  },

  // ==========================================================================
  // STORAGE & MESHES
  // ==========================================================================
  {
    name: 'DATA_DIR',
    required: false,
    description: 'Directory of the JSON database file'
  },
  {
    name: 'MESH_DIR',
    required: false,
    default: './data/mesh',
    description: 'Directory scanned for mesh manifests and mesh artifacts'
  },
  {
    name: 'MESH_PATH',
    required: false,
    description: 'Default mesh file used when a route has no mesh attached'
  },
  {
    name: 'MESH_IMPORT_ENABLED',
    required: false,
    default: 'true',
    validator: isBoolean,
    description: 'Run the periodic mesh import'
  },
  {
    name: 'MESH_IMPORT_INTERVAL_MS',
    required: false,
    default: String(10 * 60 * 1000),
    validator: isPositiveInt,
    description: 'Interval between mesh import runs (ms)'
  },

  // ==========================================================================
  // ROUTING
  // ==========================================================================
  {
    name: 'WAYPOINT_DISTANCE_TOLERANCE_NM',
    required: false,
    default: '1',
    validator: isPositiveNumber,
    description: 'Distance under which two waypoints are considered the same (nautical miles)'
  },
  {
    name: 'QUEUE_CONCURRENCY',
    required: false,
    default: '2',
    validator: isPositiveInt,
    description: 'Route calculations running at once'
  },
  {
    name: 'ENGINE_THREADS',
    required: false,
    default: '2',
    validator: isNonNegativeInt,
    description: 'Navigation engine worker threads (0 = main loop)'
  },
  {
    name: 'ENGINE_TIMEOUT_MS',
    required: false,
    default: '0',
    validator: isNonNegativeInt,
    description: 'Limit per engine call in ms (0 = none)'
  },
  {
    name: 'SMOOTHING_SEGMENT_NM',
    required: false,
    default: '10',
    validator: isPositiveNumber,
    description: 'Spacing of points on a smoothed great-circle route (nautical miles)'
  },
  {
    name: 'VESSEL_SPEED_KNOTS',
    required: false,
    default: '12',
    validator: isPositiveNumber,
    description: 'Vessel speed used for route evaluation'
  },
  {
    name: 'FUEL_TONNES_PER_DAY',
    required: false,
    default: '20',
    validator: isPositiveNumber,
    description: 'Fuel burn used for route evaluation'
  }
];

/**
 * Validate all environment variables
 */
export function validateEnvironment(): ValidationResult {
  const result: ValidationResult = {
    valid: true,
    errors: [],
    warnings: [],
    loaded: {}
  };

  const isProduction = process.env.NODE_ENV === 'production';

  for (const envVar of ENV_VARS) {
    const value = process.env[envVar.name];

    // Check if required
    if (envVar.required && !value) {
      result.valid = false;
      result.errors.push(`Missing required environment variable: ${envVar.name} - ${envVar.description}`);
      continue;
    }

    // Production-specific checks
    if (isProduction) {
      if (envVar.name === 'DATA_DIR' && !value) {
        result.warnings.push('DATA_DIR is not set - the database lives in the home directory');
      }
      if (envVar.name === 'MESH_DIR' && !value) {
        result.warnings.push('MESH_DIR is not set - meshes are imported from ./data/mesh');
      }
    }

    // Apply default if not set
    const finalValue = value || envVar.default;

    if (finalValue) {
      // Validate if validator exists
      if (envVar.validator && !envVar.validator(finalValue)) {
        result.valid = false;
        result.errors.push(`Invalid value for ${envVar.name}: "${finalValue}" - ${envVar.description}`);
        continue;
      }

      // Store loaded value
      result.loaded[envVar.name] = finalValue;

      // Set default in process.env if not already set
      if (!value && envVar.default) {
        process.env[envVar.name] = envVar.default;
      }
    }
  }

  return result;
}

/**
 * Validate and log results at startup
 * Exits process if validation fails in production
 */
export function validateAndLogEnvironment(): ValidationResult {
  const result = validateEnvironment();
  const isProduction = process.env.NODE_ENV === 'production';

  result.errors.forEach(error => {
    logger.error(`Environment validation error: ${error}`);
  });

  result.warnings.forEach(warning => {
    logger.warn(`Environment validation warning: ${warning}`);
  });

  if (result.valid) {
    logger.info('Environment validation passed', {
      mode: process.env.NODE_ENV || 'development',
      port: result.loaded.PORT,
      meshDir: result.loaded.MESH_DIR,
      toleranceNm: result.loaded.WAYPOINT_DISTANCE_TOLERANCE_NM
    });
  }

  // Exit in production if validation failed
  if (!result.valid && isProduction) {
    logger.error('Environment validation failed in production. Exiting.');
    process.exit(1);
  }

  return result;
}
