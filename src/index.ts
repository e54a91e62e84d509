/**
 * spanlog
 *
 * Buffered structured logging for Node.js with profiling spans rebuilt from
 * the buffered records.
 *
 * The root entry point exports the logger and the types most call sites
 * need. Import from subpath exports for the rest:
 *   import { TargetDispatcher } from "spanlog/dispatch";
 *   import { LogTapeTarget, createFileTarget } from "spanlog/targets";
 *
 * @packageDocumentation
 */

export const VERSION = '0.1.0'

export { type LoggerConfig, loadLoggerConfig, parseLoggerOptions } from './config/index.js'
export { type Dispatcher, TargetDispatcher } from './dispatch/index.js'
export { ConfigurationError, StructuredError, TargetError } from './errors/index.js'
export { getLevelName, type LevelName, LogLevel } from './levels/index.js'
export {
	createLoggerFromFile,
	Logger,
	type LoggerOptions,
	type LoggerRuntimeOptions,
} from './logger/index.js'
export { formatProfilingSummary, type TimingRecord } from './profiling/index.js'
export { type EventRecord, formatPayload, type Payload } from './records/index.js'
export { type TraceFrame } from './trace/index.js'
