/**
 * Logger facade.
 *
 * @module logger
 */

export {
	createLoggerFromFile,
	Logger,
	type LoggerOptions,
	type LoggerRuntimeOptions,
} from './logger.js'
