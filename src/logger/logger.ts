/**
 * Logger: the instance application code logs and profiles through.
 *
 * A logger owns one message buffer. Records flow to its dispatcher when the
 * flush interval is reached, on an explicit `flush()`, and at process exit
 * once `init()` has scheduled the final flush. Profiling results are computed
 * from the records still in the buffer, so they cover the current generation
 * only.
 *
 * @example
 * ```typescript
 * import { Logger, LogLevel } from "spanlog"
 * import { TargetDispatcher } from "spanlog/dispatch"
 * import { MemoryTarget } from "spanlog/targets"
 *
 * const logger = new Logger({
 *   flushInterval: 0,
 *   dispatcher: new TargetDispatcher({ memory: new MemoryTarget() }),
 * })
 * logger.init()
 *
 * const rows = logger.profile("SELECT * FROM users", "db.query", () => db.all())
 * logger.getDbProfiling() // { count: 1, duration: 0.004 }
 * ```
 *
 * @module logger/logger
 */

import { type Clock, MessageBuffer } from '../buffer/index.js'
import {
	type LoggerConfig,
	type LoggerConfigInput,
	loadLoggerConfig,
	parseLoggerOptions,
} from '../config/index.js'
import type { Dispatcher } from '../dispatch/index.js'
import { LogLevel } from '../levels/index.js'
import {
	calculateTimings,
	filterByCategory,
	type OpenSpan,
	type ProfilingSummary,
	reconstructSpans,
	summarizeTimings,
	sumTimings,
	type TimingRecord,
} from '../profiling/index.js'
import type { EventRecord } from '../records/index.js'
import {
	type ExitHookRegistry,
	getProcessExitHooks,
	scheduleFinalFlush,
} from '../shutdown/index.js'

/** Options that cannot come from a config file */
export interface LoggerRuntimeOptions {
	dispatcher?: Dispatcher
	/** Time source in seconds */
	clock?: Clock
	/** Reference for `getElapsedTime()`, in seconds since the epoch */
	startTime?: number
}

export type LoggerOptions = LoggerConfigInput & LoggerRuntimeOptions

export class Logger {
	readonly config: LoggerConfig
	private readonly buffer: MessageBuffer
	private initialized = false

	/**
	 * @throws ConfigurationError when the options do not validate
	 */
	constructor(options: LoggerOptions = {}) {
		const { dispatcher, clock, startTime, ...config } = options
		this.config = parseLoggerOptions(config)
		this.buffer = new MessageBuffer({
			flushInterval: this.config.flushInterval,
			traceLevel: this.config.traceLevel,
			internalPaths: this.config.internalPaths,
			dispatcher,
			clock,
			startTime,
		})
	}

	get dispatcher(): Dispatcher | undefined {
		return this.buffer.dispatcher
	}

	set dispatcher(dispatcher: Dispatcher | undefined) {
		this.buffer.dispatcher = dispatcher
	}

	/** Unflushed records, in emission order */
	get records(): readonly EventRecord[] {
		return this.buffer.records
	}

	/** Whether `init()` has scheduled the final flush */
	get isInitialized(): boolean {
		return this.initialized
	}

	/**
	 * Schedule the exit flushes: a regular flush before exit hooks registered
	 * later, then a final flush after them. Calling it again does nothing.
	 */
	init(hooks: ExitHookRegistry = getProcessExitHooks()): void {
		if (this.initialized) return
		this.initialized = true
		scheduleFinalFlush(hooks, (final) => {
			this.flush(final)
		})
	}

	log(message: unknown, level: LogLevel, category?: string): void {
		this.buffer.log(message, level, category)
	}

	error(message: unknown, category?: string): void {
		this.buffer.log(message, LogLevel.Error, category)
	}

	warning(message: unknown, category?: string): void {
		this.buffer.log(message, LogLevel.Warning, category)
	}

	info(message: unknown, category?: string): void {
		this.buffer.log(message, LogLevel.Info, category)
	}

	trace(message: unknown, category?: string): void {
		this.buffer.log(message, LogLevel.Trace, category)
	}

	/**
	 * Open a span. It closes at the next `endProfile` with an equal token:
	 * the same string, or the same object for any other token.
	 */
	beginProfile(token: unknown, category?: string): void {
		this.buffer.log(token, LogLevel.ProfileBegin, category)
	}

	endProfile(token: unknown, category?: string): void {
		this.buffer.log(token, LogLevel.ProfileEnd, category)
	}

	/**
	 * Run `fn` inside a span. The span closes even when `fn` throws.
	 */
	profile<T>(token: string, category: string, fn: () => T): T {
		this.beginProfile(token, category)
		try {
			return fn()
		} finally {
			this.endProfile(token, category)
		}
	}

	/**
	 * Await `fn` inside a span. The span closes even when the promise rejects.
	 *
	 * Spans opened concurrently on the same logger interleave in the buffer and
	 * only pair up when they close in reverse order of opening.
	 */
	async profileAsync<T>(token: string, category: string, fn: () => Promise<T>): Promise<T> {
		this.beginProfile(token, category)
		try {
			return await fn()
		} finally {
			this.endProfile(token, category)
		}
	}

	flush(final = false): void {
		this.buffer.flush(final)
	}

	/** Seconds since the logger's start time */
	getElapsedTime(): number {
		return this.buffer.getElapsedTime()
	}

	/**
	 * Timings of the closed spans in the buffer, filtered by category.
	 *
	 * @param categories - Patterns to keep; `db.*` matches by prefix. Empty keeps all.
	 * @param excludeCategories - Patterns to drop
	 */
	getProfiling(
		categories: readonly string[] = [],
		excludeCategories: readonly string[] = [],
	): TimingRecord[] {
		return filterByCategory(calculateTimings(this.buffer.records), categories, excludeCategories)
	}

	/** Spans opened in the buffer and not closed yet */
	getOpenSpans(): OpenSpan[] {
		return reconstructSpans(this.buffer.records).unclosed
	}

	/** Number and total duration of the database spans */
	getDbProfiling(): { count: number; duration: number } {
		return sumTimings(this.getProfiling(this.config.dbCategories))
	}

	getProfilingSummary(
		categories: readonly string[] = [],
		excludeCategories: readonly string[] = [],
	): ProfilingSummary {
		return summarizeTimings(this.getProfiling(categories, excludeCategories))
	}
}

/**
 * Create a logger from a JSON options file.
 *
 * @throws ConfigurationError when the file cannot be read or does not validate
 */
export function createLoggerFromFile(
	filePath: string,
	runtime: LoggerRuntimeOptions = {},
): Logger {
	return new Logger({ ...loadLoggerConfig(filePath), ...runtime })
}
