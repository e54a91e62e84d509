/**
 * Log targets: filtering, batching and export of dispatched records.
 *
 * @module targets
 */

export {
	createFileTarget,
	DEFAULT_LOG_DIR,
	type FileTarget,
	type FileTargetOptions,
} from './file-target.js'
export {
	LogTapeTarget,
	type LogTapeTargetOptions,
	toLogProperties,
	toLogTapeLevel,
} from './logtape-target.js'
export { MemoryTarget } from './memory-target.js'
export { Target, type TargetOptions } from './target.js'
