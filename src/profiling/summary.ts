/**
 * Aggregated profiling statistics.
 *
 * Rolls timing records up per category (call counts, total, average, min and
 * max duration) and ranks the slowest spans, for end-of-request reports.
 *
 * @module profiling/summary
 */

import { formatPayload } from '../records/index.js'
import type { TimingRecord } from './timings.js'

/** Statistics for one category. Durations are in seconds. */
export interface CategoryStats {
	category: string
	count: number
	totalDuration: number
	avgDuration: number
	minDuration: number
	maxDuration: number
}

export interface ProfilingSummary {
	/** Number of timing records */
	count: number
	/** Sum of all durations, in seconds. Nested spans are counted in full. */
	totalDuration: number
	/** Per-category statistics, by descending total duration */
	categories: CategoryStats[]
	/** Slowest spans (top 5) */
	slowest: Array<{ info: string; category: string; duration: number }>
}

/**
 * Count and total duration of a set of timings.
 */
export function sumTimings(timings: readonly TimingRecord[]): {
	count: number
	duration: number
} {
	return {
		count: timings.length,
		duration: timings.reduce((sum, timing) => sum + timing.duration, 0),
	}
}

/**
 * Aggregate timing records into a summary.
 */
export function summarizeTimings(timings: readonly TimingRecord[]): ProfilingSummary {
	const stats = new Map<string, CategoryStats>()

	for (const { category, duration } of timings) {
		const existing = stats.get(category)
		if (existing) {
			existing.count++
			existing.totalDuration += duration
			existing.avgDuration = existing.totalDuration / existing.count
			existing.minDuration = Math.min(existing.minDuration, duration)
			existing.maxDuration = Math.max(existing.maxDuration, duration)
		} else {
			stats.set(category, {
				category,
				count: 1,
				totalDuration: duration,
				avgDuration: duration,
				minDuration: duration,
				maxDuration: duration,
			})
		}
	}

	const { count, duration } = sumTimings(timings)

	return {
		count,
		totalDuration: duration,
		categories: [...stats.values()].sort((a, b) => b.totalDuration - a.totalDuration),
		slowest: [...timings]
			.sort((a, b) => b.duration - a.duration)
			.slice(0, 5)
			.map((timing) => ({
				info: formatPayload(timing.info),
				category: timing.category,
				duration: timing.duration,
			})),
	}
}

/**
 * Format a summary as a plain-text table.
 */
export function formatProfilingSummary(summary: ProfilingSummary): string {
	let output = `Profiled spans: ${summary.count}\n`
	output += `Total time: ${formatDuration(summary.totalDuration)}\n`

	if (summary.categories.length > 0) {
		output += '\nCategory                    Count     Total       Avg       Min       Max\n'
		for (const stats of summary.categories) {
			output += `${stats.category.padEnd(26)} ${String(stats.count).padStart(6)}`
			output += ` ${formatDuration(stats.totalDuration).padStart(9)}`
			output += ` ${formatDuration(stats.avgDuration).padStart(9)}`
			output += ` ${formatDuration(stats.minDuration).padStart(9)}`
			output += ` ${formatDuration(stats.maxDuration).padStart(9)}\n`
		}
	}

	if (summary.slowest.length > 0) {
		output += '\nSlowest spans:\n'
		for (const [idx, { info, category, duration }] of summary.slowest.entries()) {
			output += `${idx + 1}. ${info} [${category}] (${formatDuration(duration)})\n`
		}
	}

	return output
}

/**
 * Format seconds as milliseconds below one second, seconds above.
 */
export function formatDuration(seconds: number): string {
	const ms = seconds * 1000
	if (ms < 1000) {
		return `${ms.toFixed(1)}ms`
	}
	return `${seconds.toFixed(2)}s`
}
