/**
 * Routes flushed batches to named targets.
 *
 * Every enabled target receives every batch and applies its own level and
 * category selection. A target that throws is disabled and reported; the
 * remaining targets still receive the batch.
 *
 * @module dispatch/dispatcher
 */

import { TargetError } from '../errors/index.js'
import { describeError, getDiagnosticsLogger } from '../logging/index.js'
import type { EventRecord } from '../records/index.js'
import type { Target } from '../targets/index.js'
import type { Dispatcher } from './types.js'

const diagnostics = getDiagnosticsLogger('dispatcher')

/**
 * @example
 * ```typescript
 * const dispatcher = new TargetDispatcher({
 *   errors: new LogTapeTarget({ levels: ["error", "warning"] }),
 *   profiling: new MemoryTarget({ levels: ["profile"], exportInterval: 0 }),
 * });
 * const logger = new Logger({ dispatcher });
 * ```
 */
export class TargetDispatcher implements Dispatcher {
	private readonly targets = new Map<string, Target>()

	constructor(targets: Readonly<Record<string, Target>> = {}) {
		for (const [name, target] of Object.entries(targets)) {
			this.targets.set(name, target)
		}
	}

	/** Names of the registered targets, in registration order */
	get targetNames(): string[] {
		return [...this.targets.keys()]
	}

	/**
	 * Register a target, replacing any target with the same name.
	 */
	addTarget(name: string, target: Target): void {
		this.targets.set(name, target)
	}

	getTarget(name: string): Target | undefined {
		return this.targets.get(name)
	}

	removeTarget(name: string): boolean {
		return this.targets.delete(name)
	}

	dispatch(records: readonly EventRecord[], final: boolean): void {
		for (const [name, target] of this.targets) {
			if (!target.enabled) continue

			try {
				target.collect(records, final)
			} catch (error: unknown) {
				target.enabled = false
				const failure = new TargetError(
					`Target "${name}" failed to collect records`,
					'TARGET_COLLECT_FAILED',
					{ target: name, records: records.length, final },
					error instanceof Error ? error : new Error(String(error)),
				)
				diagnostics.warn('Target disabled after failing to collect records', {
					target: name,
					...describeError(failure),
				})
			}
		}
	}
}
