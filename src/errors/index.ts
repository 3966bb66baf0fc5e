/**
 * Error handling utilities and base classes.
 *
 * @module errors
 */

export {
	AlertDeliveryError,
	ConfigurationError,
	describeError,
	type ErrorCategory,
	isRecoverableError,
	isStructuredError,
	StructuredError,
	ValidationError,
} from './structured-error.js'
