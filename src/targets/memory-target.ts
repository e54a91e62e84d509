/**
 * Target that keeps exported batches in memory.
 *
 * @module targets/memory-target
 */

import type { EventRecord } from '../records/index.js'
import { Target } from './target.js'

export class MemoryTarget extends Target {
	private exported: Array<readonly EventRecord[]> = []

	/** Every exported batch, oldest first */
	get batches(): ReadonlyArray<readonly EventRecord[]> {
		return this.exported
	}

	/** Every exported record, in export order */
	get records(): readonly EventRecord[] {
		return this.exported.flat()
	}

	clear(): void {
		this.exported = []
	}

	protected override export(records: readonly EventRecord[]): void {
		this.exported.push(records)
	}
}
