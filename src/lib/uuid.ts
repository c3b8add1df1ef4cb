/**
 * UUID Generator Utility
 *
 * Identifiers for cycles, digests and notification records.
 */

import { randomUUID } from 'crypto';

/**
 * Generate a new UUID v4
 *
 * @example
 * const digestId = generateUUID();
 * // Returns: "f47ac10b-58cc-4372-a567-0e02b2c3d479"
 */
export const generateUUID = (): string => {
  return randomUUID();
};
