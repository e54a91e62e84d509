import { afterEach, beforeEach, describe, expect, test } from 'vitest'
import { ConfigurationError } from '../errors/index.js'
import { cleanupTestDir, createTempDir, writeTestFile } from '../testing/index.js'
import { DEFAULT_INTERNAL_PATHS } from '../trace/index.js'
import { loadLoggerConfig, parseLoggerOptions } from './options.js'

describe('parseLoggerOptions', () => {
	test('applies defaults', () => {
		expect(parseLoggerOptions({})).toEqual({
			flushInterval: 1000,
			traceLevel: 10,
			internalPaths: [...DEFAULT_INTERNAL_PATHS],
			dbCategories: ['db.query', 'db.execute'],
		})
	})

	test('keeps explicit values', () => {
		const options = parseLoggerOptions({
			flushInterval: 0,
			traceLevel: 0,
			internalPaths: ['/srv/vendor'],
			dbCategories: ['sql.*'],
		})

		expect(options).toEqual({
			flushInterval: 0,
			traceLevel: 0,
			internalPaths: ['/srv/vendor'],
			dbCategories: ['sql.*'],
		})
	})

	test('accepts a negative flush interval', () => {
		expect(parseLoggerOptions({ flushInterval: -1 }).flushInterval).toBe(-1)
	})

	test('rejects a negative trace level', () => {
		let caught: unknown
		try {
			parseLoggerOptions({ traceLevel: -1 })
		} catch (error) {
			caught = error
		}

		expect(caught).toBeInstanceOf(ConfigurationError)
		expect(caught).toMatchObject({
			code: 'INVALID_LOGGER_OPTIONS',
			context: { issues: [{ path: 'traceLevel' }] },
		})
	})

	test('rejects fractional intervals', () => {
		expect(() => parseLoggerOptions({ flushInterval: 1.5 })).toThrow(ConfigurationError)
	})

	test('rejects unknown keys', () => {
		expect(() => parseLoggerOptions({ flushIntervall: 10 })).toThrow(
			'Invalid logger options',
		)
	})
})

describe('loadLoggerConfig', () => {
	let dir: string

	beforeEach(() => {
		dir = createTempDir('spanlog-config-')
	})

	afterEach(() => {
		cleanupTestDir(dir)
	})

	test('reads and validates a JSON file', () => {
		const file = writeTestFile(
			dir,
			'logger.json',
			JSON.stringify({ flushInterval: 50, dbCategories: ['db.*'] }),
		)

		const options = loadLoggerConfig(file)

		expect(options.flushInterval).toBe(50)
		expect(options.traceLevel).toBe(10)
		expect(options.dbCategories).toEqual(['db.*'])
	})

	test('rejects a negative trace level', () => {
		const file = writeTestFile(dir, 'logger.json', '{"traceLevel": -3}')

		expect(() => loadLoggerConfig(file)).toThrow(ConfigurationError)
	})

	test('reports malformed JSON', () => {
		const file = writeTestFile(dir, 'logger.json', '{ not json')

		expect(() => loadLoggerConfig(file)).toThrow(
			`Cannot read logger config from ${file}`,
		)
	})

	test('reports a missing file', () => {
		let caught: unknown
		try {
			loadLoggerConfig(`${dir}/missing.json`)
		} catch (error) {
			caught = error
		}

		expect(caught).toBeInstanceOf(ConfigurationError)
		expect(caught).toMatchObject({ code: 'UNREADABLE_LOGGER_CONFIG' })
	})
})
