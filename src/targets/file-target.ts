/**
 * Rotating JSON Lines file target.
 *
 * Configures a LogTape rotating file sink for a named root category and
 * returns a {@link LogTapeTarget} that logs under that category:
 * - JSONL output for machine-parseable logs
 * - Automatic file rotation (1 MiB default, 5 files)
 * - Centralized log location (~/.spanlog/logs/<name>.jsonl)
 *
 * @example
 * ```typescript
 * const file = createFileTarget({ name: "orders", levels: ["error", "warning"] });
 * await file.initialize();
 *
 * const logger = new Logger({
 *   dispatcher: new TargetDispatcher({ file: file.target }),
 * });
 * ```
 */

import { existsSync, mkdirSync } from 'node:fs'
import { homedir } from 'node:os'
import { join } from 'node:path'
import { getRotatingFileSink } from '@logtape/file'
import { configure, jsonLinesFormatter, type LogLevel as LogTapeLevel } from '@logtape/logtape'
import {
	DEFAULT_LOG_EXTENSION,
	DEFAULT_MAX_FILES,
	DEFAULT_MAX_SIZE,
} from '../config/defaults.js'
import { LogTapeTarget } from './logtape-target.js'
import type { TargetOptions } from './target.js'

/** Default centralized log directory */
export const DEFAULT_LOG_DIR: string = join(homedir(), '.spanlog', 'logs')

export interface FileTargetOptions extends TargetOptions {
	/** Application name, used as the root category and the log file name. Kebab-case. */
	name: string

	/** Log directory. Defaults to ~/.spanlog/logs/ */
	logDir?: string

	/**
	 * Log file name (without extension). Defaults to the application name.
	 * Results in: <logDir>/<logFileName>.jsonl
	 */
	logFileName?: string

	/** Maximum log file size before rotation. Defaults to 1 MiB. */
	maxSize?: number

	/** Number of rotated files to keep. Defaults to 5. */
	maxFiles?: number

	/** Lowest LogTape level written to the file. Defaults to "debug". */
	lowestLevel?: LogTapeLevel
}

export interface FileTarget {
	/** Target to register with a dispatcher */
	target: LogTapeTarget

	/**
	 * Configure the LogTape file sink. Must be called before the first
	 * export. Safe to call multiple times - only configures once.
	 */
	initialize: () => Promise<void>

	/** Log directory path */
	logDir: string

	/** Log file path */
	logFile: string
}

/**
 * Create a file target writing rotated JSON Lines through LogTape.
 */
export function createFileTarget(options: FileTargetOptions): FileTarget {
	const {
		name,
		logDir = DEFAULT_LOG_DIR,
		logFileName = name,
		maxSize = DEFAULT_MAX_SIZE,
		maxFiles = DEFAULT_MAX_FILES,
		lowestLevel = 'debug',
		...targetOptions
	} = options

	const logFile = join(logDir, `${logFileName}${DEFAULT_LOG_EXTENSION}`)
	const target = new LogTapeTarget({ ...targetOptions, rootCategory: name })

	let isInitialized = false

	async function initialize(): Promise<void> {
		if (isInitialized) return

		if (!existsSync(logDir)) {
			mkdirSync(logDir, { recursive: true })
		}

		// Unique sink name per application avoids clashing with other sinks
		const sinkName = `file_${name}`

		try {
			await configure({
				sinks: {
					[sinkName]: getRotatingFileSink(logFile, {
						formatter: jsonLinesFormatter,
						maxSize,
						maxFiles,
					}),
				},
				loggers: [
					{
						category: [name],
						sinks: [sinkName],
						lowestLevel,
					},
					{
						category: ['logtape', 'meta'],
						sinks: [sinkName],
						lowestLevel: 'error',
					},
				],
			})
		} catch (error: unknown) {
			// LogTape was configured elsewhere (e.g. by the host application);
			// keep that configuration.
			if (error instanceof Error && error.message.includes('Already configured')) {
				isInitialized = true
				return
			}
			throw error
		}

		isInitialized = true
	}

	return { target, initialize, logDir, logFile }
}
