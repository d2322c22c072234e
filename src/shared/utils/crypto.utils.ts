/**
 * =============================================================================
 * CHECKSUM UTILITIES
 * =============================================================================
 *
 * Hashing helpers for mesh artifacts. Uses Node.js built-in crypto.
 *
 * md5 is only an identity/dedup key for uploaded files here, never a
 * security measure.
 * =============================================================================
 */

import { createHash } from 'crypto';

/**
 * md5 digest as lowercase hex
 *
 * @example
 * md5Hex('abc')  // "900150983cd24fb0d6963f7d28e17f72"
 */
export function md5Hex(data: Buffer | string): string {
  return createHash('md5').update(data).digest('hex');
}

/**
 * Case-insensitive hex digest comparison
 */
export function checksumsMatch(a: string, b: string): boolean {
  return a.trim().toLowerCase() === b.trim().toLowerCase();
}
