/**
 * Process-exit hooks and final flush scheduling.
 *
 * @module shutdown
 */

export { scheduleFinalFlush } from './coordinator.js'
export {
	type ExitEventSource,
	type ExitHook,
	ExitHookRegistry,
	getProcessExitHooks,
	resetProcessExitHooks,
} from './exit-hooks.js'
