/**
 * Diagnostics for the library itself, through LogTape.
 *
 * @module logging
 */

export {
	type DiagnosticsSubsystem,
	describeError,
	getDiagnosticsLogger,
} from './diagnostics.js'
