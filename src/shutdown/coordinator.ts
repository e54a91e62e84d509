/**
 * Final flush ordering at process exit.
 *
 * @module shutdown/coordinator
 */

import type { ExitHookRegistry } from './exit-hooks.js'

/**
 * Schedule a logger's flushes for process exit.
 *
 * The first hook flushes regularly, before any exit hook registered later
 * runs; it then queues `flush(true)`, which lands behind every hook
 * registered in the meantime. Records logged by those hooks are therefore
 * part of the final flush.
 *
 * @param hooks - Registry the hooks are queued on
 * @param flush - The logger's flush
 */
export function scheduleFinalFlush(
	hooks: ExitHookRegistry,
	flush: (final: boolean) => void,
): void {
	hooks.register(() => {
		flush(false)
		hooks.register(() => {
			flush(true)
		})
	})
}
