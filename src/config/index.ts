/**
 * Logger defaults and option validation.
 *
 * @module config
 */

export {
	DEFAULT_CATEGORY,
	DEFAULT_DB_CATEGORIES,
	DEFAULT_EXPORT_INTERVAL,
	DEFAULT_FLUSH_INTERVAL,
	DEFAULT_LOG_EXTENSION,
	DEFAULT_MAX_FILES,
	DEFAULT_MAX_SIZE,
	DEFAULT_ROOT_CATEGORY,
	DEFAULT_TRACE_LEVEL,
	DIAGNOSTICS_CATEGORY,
} from './defaults.js'
export {
	type LoggerConfig,
	type LoggerConfigInput,
	LoggerOptionsSchema,
	loadLoggerConfig,
	parseLoggerOptions,
} from './options.js'
