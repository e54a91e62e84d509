import { existsSync, readFileSync } from 'node:fs'
import { join } from 'node:path'
import { reset } from '@logtape/logtape'
import { afterEach, beforeEach, describe, expect, test } from 'vitest'
import { LogLevel } from '../levels/index.js'
import { createRecord, textPayload } from '../records/index.js'
import { captureLogs, cleanupTestDir, createTempDir } from '../testing/index.js'
import { createFileTarget, DEFAULT_LOG_DIR } from './file-target.js'
import { LogTapeTarget } from './logtape-target.js'

describe('createFileTarget', () => {
	test('creates a LogTape target rooted at the application name', () => {
		const file = createFileTarget({ name: 'orders' })
		const record = createRecord(textPayload('x'), LogLevel.Info, 'checkout', 1)

		expect(file.target).toBeInstanceOf(LogTapeTarget)
		expect(file.target.categoryOf(record)).toEqual(['orders', 'checkout'])
		expect(typeof file.initialize).toBe('function')
	})

	test('returns the centralized log directory by default', () => {
		const file = createFileTarget({ name: 'orders' })

		expect(file.logDir).toBe(DEFAULT_LOG_DIR)
		expect(file.logDir).toContain('.spanlog')
		expect(file.logFile).toBe(join(DEFAULT_LOG_DIR, 'orders.jsonl'))
	})

	test('honors a custom directory and file name', () => {
		const file = createFileTarget({ name: 'orders', logDir: '/var/log/shop', logFileName: 'audit' })

		expect(file.logFile).toBe(join('/var/log/shop', 'audit.jsonl'))
	})

	test('passes target options through', () => {
		const file = createFileTarget({ name: 'orders', levels: ['error'], exportInterval: 10 })

		expect(file.target.levels).toBe(LogLevel.Error)
		expect(file.target.exportInterval).toBe(10)
	})
})

describe('createFileTarget initialize', () => {
	let dir: string

	beforeEach(async () => {
		await reset()
		dir = createTempDir('spanlog-file-')
	})

	afterEach(async () => {
		await reset()
		cleanupTestDir(dir)
	})

	test('writes exported records as JSON lines', async () => {
		const file = createFileTarget({ name: 'orders', logDir: join(dir, 'logs') })
		const record = createRecord(textPayload('order placed'), LogLevel.Info, 'checkout', 7)

		await file.initialize()
		file.target.collect([record], true)
		await reset()

		const lines = readFileSync(file.logFile, 'utf8').trim().split('\n')
		expect(lines).toHaveLength(1)
		const entry: unknown = JSON.parse(lines[0] ?? '')
		expect(entry).toMatchObject({
			properties: {
				message: 'order placed',
				category: 'checkout',
				level: 'info',
				timestamp: 7,
				trace: [],
			},
		})
	})

	test('a second initialize is a no-op', async () => {
		const file = createFileTarget({ name: 'orders', logDir: dir })

		await file.initialize()
		await expect(file.initialize()).resolves.toBeUndefined()
		expect(existsSync(file.logFile)).toBe(true)
	})

	test('keeps a LogTape configuration made elsewhere', async () => {
		const capture = await captureLogs([['orders']])
		const file = createFileTarget({ name: 'orders', logDir: dir })

		await expect(file.initialize()).resolves.toBeUndefined()
		file.target.collect(
			[createRecord(textPayload('order placed'), LogLevel.Warning, 'checkout', 1)],
			true,
		)

		expect(existsSync(file.logFile)).toBe(false)
		expect(capture.records).toHaveLength(1)
		expect(capture.records[0]?.category).toEqual(['orders', 'checkout'])
		await capture.dispose()
	})
})
