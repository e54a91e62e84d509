import { describe, expect, test } from 'vitest'
import { textPayload } from '../records/index.js'
import {
	formatDuration,
	formatProfilingSummary,
	sumTimings,
	summarizeTimings,
} from './summary.js'
import type { TimingRecord } from './timings.js'

function timing(text: string, category: string, duration: number): TimingRecord {
	return { info: textPayload(text), category, timestamp: 0, trace: [], depth: 0, duration }
}

const timings = [
	timing('select users', 'db.query', 0.5),
	timing('cache lookup', 'cache.get', 0.125),
	timing('select orders', 'db.query', 0.25),
]

describe('sumTimings', () => {
	test('counts and sums durations', () => {
		expect(sumTimings(timings)).toEqual({ count: 3, duration: 0.875 })
	})

	test('is zero for no timings', () => {
		expect(sumTimings([])).toEqual({ count: 0, duration: 0 })
	})
})

describe('summarizeTimings', () => {
	test('aggregates per category by descending total', () => {
		const summary = summarizeTimings(timings)

		expect(summary.count).toBe(3)
		expect(summary.totalDuration).toBe(0.875)
		expect(summary.categories).toEqual([
			{
				category: 'db.query',
				count: 2,
				totalDuration: 0.75,
				avgDuration: 0.375,
				minDuration: 0.25,
				maxDuration: 0.5,
			},
			{
				category: 'cache.get',
				count: 1,
				totalDuration: 0.125,
				avgDuration: 0.125,
				minDuration: 0.125,
				maxDuration: 0.125,
			},
		])
	})

	test('ranks the slowest spans', () => {
		expect(summarizeTimings(timings).slowest).toEqual([
			{ info: 'select users', category: 'db.query', duration: 0.5 },
			{ info: 'select orders', category: 'db.query', duration: 0.25 },
			{ info: 'cache lookup', category: 'cache.get', duration: 0.125 },
		])
	})
})

describe('formatDuration', () => {
	test('uses milliseconds below a second', () => {
		expect(formatDuration(0.0125)).toBe('12.5ms')
		expect(formatDuration(0.25)).toBe('250.0ms')
	})

	test('uses seconds from one second up', () => {
		expect(formatDuration(1.5)).toBe('1.50s')
	})
})

describe('formatProfilingSummary', () => {
	test('renders totals, a category row and the slowest spans', () => {
		const text = formatProfilingSummary(summarizeTimings([timing('load', 'db.query', 0.25)]))

		expect(text.split('\n')).toEqual([
			'Profiled spans: 1',
			'Total time: 250.0ms',
			'',
			'Category                    Count     Total       Avg       Min       Max',
			`${'db.query'.padEnd(26)}      1   250.0ms   250.0ms   250.0ms   250.0ms`,
			'',
			'Slowest spans:',
			'1. load [db.query] (250.0ms)',
			'',
		])
	})

	test('omits tables when nothing was profiled', () => {
		expect(formatProfilingSummary(summarizeTimings([]))).toBe(
			'Profiled spans: 0\nTotal time: 0.0ms\n',
		)
	})
})
