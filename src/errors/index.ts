/**
 * Error classes raised while configuring spanlog.
 *
 * @module errors
 */

export {
	ConfigurationError,
	type ErrorCategory,
	isConfigurationError,
	isStructuredError,
	StructuredError,
	TargetError,
} from './structured-error.js'
