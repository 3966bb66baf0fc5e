/**
 * Numeric input guards for the reporting hot path.
 *
 * These throw instead of returning a result object: a negative item count is
 * a caller bug and must surface at the call site, never be clamped.
 *
 * @module validation/numbers
 */

import { ValidationError } from '../errors/index.js'

/**
 * Assert an integer >= 0.
 *
 * @example
 * ```ts
 * assertNonNegativeInteger(150, "itemsProcessed") // ✅ 150
 * assertNonNegativeInteger(-1, "itemsProcessed")  // ❌ ValidationError
 * assertNonNegativeInteger(1.5, "errors")         // ❌ ValidationError
 * ```
 */
export function assertNonNegativeInteger(value: number, name: string): number {
	if (!Number.isInteger(value) || value < 0) {
		throw new ValidationError(
			`${name} must be a non-negative integer (got: ${value})`,
			'INVALID_COUNT',
			{ field: name, value },
		)
	}
	return value
}

/**
 * Assert a finite number >= 0.
 */
export function assertNonNegativeNumber(value: number, name: string): number {
	if (!Number.isFinite(value) || value < 0) {
		throw new ValidationError(
			`${name} must be a non-negative number (got: ${value})`,
			'INVALID_NON_NEGATIVE_NUMBER',
			{ field: name, value },
		)
	}
	return value
}

/**
 * Assert a finite number > 0.
 */
export function assertPositiveNumber(value: number, name: string): number {
	if (!Number.isFinite(value) || value <= 0) {
		throw new ValidationError(
			`${name} must be a positive number (got: ${value})`,
			'INVALID_POSITIVE_NUMBER',
			{ field: name, value },
		)
	}
	return value
}

/**
 * Assert an integer > 0. Used for buffer capacities.
 */
export function assertPositiveInteger(value: number, name: string): number {
	if (!Number.isInteger(value) || value <= 0) {
		throw new ValidationError(
			`${name} must be a positive integer (got: ${value})`,
			'INVALID_POSITIVE_INTEGER',
			{ field: name, value },
		)
	}
	return value
}
