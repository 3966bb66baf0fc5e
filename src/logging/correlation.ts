/**
 * Correlation IDs link every log line written during one monitor tick.
 */

import { randomUUID } from 'node:crypto'

/**
 * Generate an 8-character correlation ID.
 *
 * @returns Short UUID prefix (e.g., "a1b2c3d4")
 */
export function createCorrelationId(): string {
	return randomUUID().slice(0, 8)
}
