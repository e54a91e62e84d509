import { afterEach, beforeEach, describe, expect, test } from 'vitest'
import { LogLevel } from '../levels/index.js'
import {
	createRecord,
	dataPayload,
	type EventRecord,
	errorPayload,
	textPayload,
} from '../records/index.js'
import { captureLogs, type LogCapture } from '../testing/index.js'
import { LogTapeTarget, toLogProperties, toLogTapeLevel } from './logtape-target.js'

describe('toLogTapeLevel', () => {
	test('maps severities and sends trace and profiling to debug', () => {
		expect(toLogTapeLevel(LogLevel.Error)).toBe('error')
		expect(toLogTapeLevel(LogLevel.Warning)).toBe('warning')
		expect(toLogTapeLevel(LogLevel.Info)).toBe('info')
		expect(toLogTapeLevel(LogLevel.Trace)).toBe('debug')
		expect(toLogTapeLevel(LogLevel.ProfileBegin)).toBe('debug')
		expect(toLogTapeLevel(LogLevel.ProfileEnd)).toBe('debug')
	})
})

describe('toLogProperties', () => {
	test('describes a text record', () => {
		const record = createRecord(textPayload('select'), LogLevel.Info, 'db.query', 5, [
			{ file: '/srv/app/db.ts', line: 3 },
		])

		expect(toLogProperties(record)).toEqual({
			message: 'select',
			category: 'db.query',
			level: 'info',
			timestamp: 5,
			trace: [{ file: '/srv/app/db.ts', line: 3 }],
		})
	})

	test('attaches error snapshots and data', () => {
		const error = errorPayload(new Error('boom'))
		const failed = createRecord(error, LogLevel.Error, 'app', 1)
		const measured = createRecord(dataPayload({ rows: 2 }), LogLevel.Trace, 'app', 1)

		expect(toLogProperties(failed).error).toBe(error.error)
		expect(toLogProperties(measured).data).toEqual({ rows: 2 })
	})
})

describe('LogTapeTarget', () => {
	let capture: LogCapture

	beforeEach(async () => {
		capture = await captureLogs([['app'], ['orders']])
	})

	afterEach(async () => {
		await capture.dispose()
	})

	test('logs under the root category plus the dotted segments', () => {
		const target = new LogTapeTarget()
		const record = createRecord(textPayload('select'), LogLevel.Warning, 'db.query', 5)

		target.collect([record], true)

		expect(capture.records).toHaveLength(1)
		expect(capture.records[0]?.category).toEqual(['app', 'db', 'query'])
		expect(capture.records[0]?.level).toBe('warning')
		expect(capture.records[0]?.properties).toMatchObject({
			message: 'select',
			category: 'db.query',
			level: 'warning',
			timestamp: 5,
		})
	})

	test('uses a custom root category', () => {
		const target = new LogTapeTarget({ rootCategory: 'orders' })

		target.collect([createRecord(textPayload('placed'), LogLevel.Info, 'checkout', 1)], true)

		expect(capture.records[0]?.category).toEqual(['orders', 'checkout'])
	})

	test('forwards only selected levels in order', () => {
		const target = new LogTapeTarget({ levels: ['error', 'info'] })
		const records: EventRecord[] = [
			createRecord(textPayload('one'), LogLevel.Info, 'app', 1),
			createRecord(textPayload('two'), LogLevel.Trace, 'app', 2),
			createRecord(textPayload('three'), LogLevel.Error, 'app', 3),
		]

		target.collect(records, true)

		expect(capture.records.map((r) => r.properties.message)).toEqual(['one', 'three'])
		expect(capture.records.map((r) => r.level)).toEqual(['info', 'error'])
	})

	test('categoryOf drops empty segments', () => {
		const target = new LogTapeTarget()
		const record = createRecord(textPayload('x'), LogLevel.Info, 'db..query.', 1)

		expect(target.categoryOf(record)).toEqual(['app', 'db', 'query'])
	})
})
