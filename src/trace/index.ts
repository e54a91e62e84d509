/**
 * Bounded call-stack capture for log records.
 *
 * @module trace
 */

export {
	captureTrace,
	DEFAULT_INTERNAL_PATHS,
	isInternalFrame,
	LIBRARY_ROOT,
	parseStack,
	selectFrames,
	type TraceFrame,
	type TraceOptions,
} from './capture.js'
