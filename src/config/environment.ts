/**
 * =============================================================================
 * ENVIRONMENT CONFIGURATION
 * =============================================================================
 *
 * Centralized configuration loaded from environment variables.
 * All config access goes through this file - no direct process.env usage elsewhere.
 *
 * FOR BACKEND DEVELOPERS:
 * - Add new config here, not scattered across the codebase
 * - Use getOptional() for values with sensible defaults
 * - Numbers that may be fractional (tolerances, speeds) use getFloat()
 * =============================================================================
 */

import dotenv from 'dotenv';
import path from 'path';

// Load .env file
dotenv.config();

// =============================================================================
// HELPER FUNCTIONS
// =============================================================================

/**
 * Get optional environment variable with default
 */
function getOptional(key: string, defaultValue: string): string {
  return process.env[key] || defaultValue;
}

/**
 * Get boolean environment variable
 */
function getBoolean(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (!value) return defaultValue;
  return value.toLowerCase() === 'true';
}

/**
 * Get integer environment variable
 */
function getNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Get floating point environment variable
 */
function getFloat(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (!value) return defaultValue;
  const parsed = parseFloat(value);
  return isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Parse CORS origins from comma-separated string
 */
function parseCorsOrigins(value: string): string | string[] {
  if (value === '*') return '*';
  return value.split(',').map(origin => origin.trim()).filter(Boolean);
}

const nodeEnv = getOptional('NODE_ENV', 'development');

// =============================================================================
// CONFIGURATION OBJECT
// =============================================================================

/**
 * Application configuration object
 */
export const config = {
  // Server
  nodeEnv,
  port: getNumber('PORT', 3000),
  host: getOptional('HOST', '0.0.0.0'),

  // JSON database location
  dataDir: getOptional('DATA_DIR', path.join(process.env.HOME || '/tmp', '.vessel-route-data')),

  // Meshes
  mesh: {
    dir: getOptional('MESH_DIR', './data/mesh'),
    // Used by the calculation worker when a route carries no mesh
    defaultPath: process.env.MESH_PATH || null,
    importEnabled: getBoolean('MESH_IMPORT_ENABLED', true),
    importIntervalMs: getNumber('MESH_IMPORT_INTERVAL_MS', 10 * 60 * 1000),
  },

  // Route matching & calculation
  routing: {
    waypointToleranceNm: getFloat('WAYPOINT_DISTANCE_TOLERANCE_NM', 1),
    smoothingSegmentNm: getFloat('SMOOTHING_SEGMENT_NM', 10),
    vesselSpeedKnots: getFloat('VESSEL_SPEED_KNOTS', 12),
    fuelTonnesPerDay: getFloat('FUEL_TONNES_PER_DAY', 20),
    // Worker threads running the engine; 0 runs it on the main loop
    engineThreads: getNumber('ENGINE_THREADS', 2),
    // Per engine call; 0 = no limit
    engineTimeoutMs: getNumber('ENGINE_TIMEOUT_MS', 0),
  },

  // Task queue
  queue: {
    concurrency: getNumber('QUEUE_CONCURRENCY', 2),
    pollIntervalMs: getNumber('QUEUE_POLL_INTERVAL_MS', 100),
  },

  // Rate Limiting
  rateLimit: {
    windowMs: getNumber('RATE_LIMIT_WINDOW_MS', 60 * 1000), // 1 minute
    maxRequests: getNumber('RATE_LIMIT_MAX_REQUESTS', 120),
  },

  // Logging
  logLevel: getOptional('LOG_LEVEL', 'info'),

  // CORS - Parsed into array for production
  cors: {
    origin: parseCorsOrigins(getOptional('CORS_ORIGIN', '*')),
  },

  // Helpers
  isProduction: nodeEnv === 'production',
  isDevelopment: nodeEnv === 'development',
  isTest: nodeEnv === 'test',

  // Security Features
  security: {
    enableHeaders: getBoolean('ENABLE_SECURITY_HEADERS', true),
    enableRateLimiting: getBoolean('ENABLE_RATE_LIMITING', true),
    enableRequestLogging: getBoolean('ENABLE_REQUEST_LOGGING', true),
  },
} as const;

export type AppConfig = typeof config;

// =============================================================================
// STARTUP VALIDATION
// =============================================================================

/**
 * Validate configuration at startup
 * Fails fast if critical config is missing
 */
function validateConfig(): void {
  const warnings: string[] = [];
  const errors: string[] = [];

  if (config.routing.waypointToleranceNm <= 0) {
    errors.push('WAYPOINT_DISTANCE_TOLERANCE_NM must be greater than 0');
  }

  if (config.queue.concurrency < 1) {
    errors.push('QUEUE_CONCURRENCY must be at least 1');
  }

  // Production-specific checks
  if (config.isProduction) {
    // CORS must not be wildcard in production
    if (config.cors.origin === '*') {
      warnings.push('CORS_ORIGIN is set to "*" - this should be restricted in production');
    }

    if (!config.mesh.defaultPath) {
      warnings.push('MESH_PATH is not set - routes without a mesh cannot be calculated');
    }
  }

  // Log warnings
  if (warnings.length > 0) {
    console.warn('\n⚠️  Configuration Warnings:');
    warnings.forEach(w => console.warn(`   - ${w}`));
    console.warn('');
  }

  // Throw on errors
  if (errors.length > 0) {
    throw new Error(`Configuration Errors:\n${errors.map(e => `  - ${e}`).join('\n')}`);
  }
}

// Run validation
validateConfig();
