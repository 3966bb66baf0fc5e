/**
 * Input validation helpers.
 *
 * @module validation
 */

export {
	assertNonNegativeInteger,
	assertNonNegativeNumber,
	assertPositiveInteger,
	assertPositiveNumber,
} from './numbers.js'
