/**
 * Base class for log targets.
 *
 * A target selects the records it cares about (by level mask and category),
 * accumulates them, and exports them in batches once `exportInterval`
 * records are pending or the flush is final.
 *
 * @module targets/target
 */

import { DEFAULT_EXPORT_INTERVAL } from '../config/defaults.js'
import {
	type LevelMask,
	type LevelMaskName,
	matchesLevelMask,
	toLevelMask,
} from '../levels/index.js'
import { isCategoryIncluded } from '../profiling/index.js'
import type { EventRecord } from '../records/index.js'

export interface TargetOptions {
	/** Disabled targets receive nothing. Defaults to true. */
	enabled?: boolean

	/**
	 * Levels to keep, as names or a mask. Empty or 0 keeps every level.
	 *
	 * A record is kept when its level shares a bit with the mask. Both
	 * profiling levels carry the `Profile` bit, so a numeric
	 * `LogLevel.ProfileBegin` keeps `ProfileEnd` records too: the two halves of
	 * a span are never split between targets.
	 *
	 * @example ["error", "warning"]
	 */
	levels?: ReadonlyArray<LevelMaskName | string | number> | LevelMask

	/** Category patterns to keep. Empty keeps every category. */
	categories?: readonly string[]

	/** Category patterns to drop */
	except?: readonly string[]

	/**
	 * Pending records that trigger an export. 0 or less exports only on the
	 * final flush. Defaults to 1000.
	 */
	exportInterval?: number
}

export abstract class Target {
	enabled: boolean
	readonly levels: LevelMask
	readonly categories: readonly string[]
	readonly except: readonly string[]
	readonly exportInterval: number

	private pending: EventRecord[] = []

	constructor(options: TargetOptions = {}) {
		this.enabled = options.enabled ?? true
		this.levels =
			typeof options.levels === 'number'
				? options.levels
				: toLevelMask(options.levels ?? [])
		this.categories = options.categories ?? []
		this.except = options.except ?? []
		this.exportInterval = options.exportInterval ?? DEFAULT_EXPORT_INTERVAL
	}

	/** Records collected but not yet exported */
	get pendingCount(): number {
		return this.pending.length
	}

	/**
	 * Keep the records this target accepts, in order.
	 */
	filter(records: readonly EventRecord[]): EventRecord[] {
		return records.filter(
			(record) =>
				matchesLevelMask(record.level, this.levels) &&
				isCategoryIncluded(record.category, this.categories, this.except),
		)
	}

	/**
	 * Accept a dispatched batch, exporting when the interval is reached or
	 * the flush is final.
	 */
	collect(records: readonly EventRecord[], final: boolean): void {
		this.pending = this.pending.concat(this.filter(records))

		const count = this.pending.length
		const due = final || (this.exportInterval > 0 && count >= this.exportInterval)
		if (count === 0 || !due) return

		const batch = this.pending
		this.pending = []
		this.export(batch)
	}

	/**
	 * Write a batch of accepted records.
	 */
	protected abstract export(records: readonly EventRecord[]): void
}
