/**
 * Profiling span reconstruction.
 *
 * Begin and end records are paired after the fact with an explicit stack:
 * an end closes the most recently opened span when both carry an equal
 * payload. Unbalanced or mismatched ends are dropped, spans still open at the
 * end of the pass are reported separately, and nothing here throws.
 *
 * @module profiling/timings
 */

import { LogLevel } from '../levels/index.js'
import { type EventRecord, type Payload, payloadEquals } from '../records/index.js'
import type { TraceFrame } from '../trace/index.js'

/** Nesting depth of a span: 0 for a top-level span. */
export type SpanDepth = number

/** Duration measurement derived from a matched begin/end pair. */
export interface TimingRecord {
	/** Payload of the begin record */
	readonly info: Payload
	readonly category: string
	/** When the span began, in seconds since the epoch */
	readonly timestamp: number
	/** Trace of the begin record */
	readonly trace: readonly TraceFrame[]
	/** Number of spans still open around this one when it closed */
	readonly depth: SpanDepth
	/** End timestamp minus begin timestamp, in seconds */
	readonly duration: number
}

/** A begin record that has not been closed, with its position in the input. */
export interface OpenSpan {
	readonly index: number
	readonly record: EventRecord
}

export interface SpanReconstruction {
	/** Closed spans, ordered by the position of their begin record */
	timings: TimingRecord[]
	/** Spans left open at the end of the input, outermost first */
	unclosed: OpenSpan[]
}

/**
 * Rebuild spans from records in emission order, in a single pass.
 *
 * @example
 * ```typescript
 * const { timings } = reconstructSpans(buffer.records)
 * // [{ info: { kind: "text", text: "load" }, depth: 0, duration: 0.012, ... }]
 * ```
 */
export function reconstructSpans(records: readonly EventRecord[]): SpanReconstruction {
	const stack: OpenSpan[] = []
	const closed: Array<{ index: number; timing: TimingRecord }> = []

	records.forEach((record, index) => {
		if (record.level === LogLevel.ProfileBegin) {
			stack.push({ index, record })
			return
		}
		if (record.level !== LogLevel.ProfileEnd) return

		const open = stack.at(-1)
		if (!open || !payloadEquals(open.record.payload, record.payload)) return

		stack.pop()
		closed.push({
			index: open.index,
			timing: {
				info: open.record.payload,
				category: open.record.category,
				timestamp: open.record.timestamp,
				trace: open.record.trace,
				depth: stack.length,
				duration: record.timestamp - open.record.timestamp,
			},
		})
	})

	closed.sort((a, b) => a.index - b.index)

	return { timings: closed.map(({ timing }) => timing), unclosed: stack }
}

/**
 * Timing records for every closed span, ordered by begin position.
 */
export function calculateTimings(records: readonly EventRecord[]): TimingRecord[] {
	return reconstructSpans(records).timings
}
