/**
 * Ordered process-exit hooks.
 *
 * Hooks run once, in registration order. A hook registered while the
 * registry is running is appended and runs in the same pass, after every
 * hook already queued. Node's own `exit` listeners do not allow that, so the
 * registry attaches a single listener and runs its queue from there.
 *
 * @module shutdown/exit-hooks
 */

import { describeError, getDiagnosticsLogger } from '../logging/index.js'

/** Synchronous work to do when the process exits */
export type ExitHook = () => void

/** Emitter of the `exit` event (the process, or a stand-in in tests) */
export interface ExitEventSource {
	once(event: 'exit', listener: () => void): unknown
	off(event: 'exit', listener: () => void): unknown
}

const diagnostics = getDiagnosticsLogger('shutdown')

export class ExitHookRegistry {
	private hooks: ExitHook[] = []
	private running = false

	/** Hooks waiting to run */
	get size(): number {
		return this.hooks.length
	}

	/** Whether the registry is running its hooks */
	get isRunning(): boolean {
		return this.running
	}

	register(hook: ExitHook): void {
		this.hooks.push(hook)
	}

	/**
	 * Run every queued hook, including hooks queued along the way.
	 *
	 * A throwing hook is reported and the remaining hooks still run. Hooks
	 * are dropped once run, so a second call only runs newly queued hooks.
	 */
	run(): void {
		if (this.running) return
		this.running = true

		try {
			// Length is re-read on every iteration: hooks may register more hooks
			for (let index = 0; index < this.hooks.length; index++) {
				const hook = this.hooks[index]
				if (!hook) continue
				try {
					hook()
				} catch (error: unknown) {
					diagnostics.error('Exit hook failed', { hook: index, ...describeError(error) })
				}
			}
		} finally {
			this.hooks = []
			this.running = false
		}
	}

	/**
	 * Run the registry when `source` emits `exit`.
	 *
	 * @returns Function removing the listener
	 */
	attach(source: ExitEventSource = process): () => void {
		const listener = () => {
			this.run()
		}
		source.once('exit', listener)
		return () => {
			source.off('exit', listener)
		}
	}
}

let processHooks: { registry: ExitHookRegistry; detach: () => void } | undefined

/**
 * Get the registry bound to this process's `exit` event, attaching it on
 * first use.
 */
export function getProcessExitHooks(): ExitHookRegistry {
	if (!processHooks) {
		const registry = new ExitHookRegistry()
		processHooks = { registry, detach: registry.attach(process) }
	}
	return processHooks.registry
}

/**
 * Detach and forget the process registry (useful for testing).
 */
export function resetProcessExitHooks(): void {
	processHooks?.detach()
	processHooks = undefined
}
