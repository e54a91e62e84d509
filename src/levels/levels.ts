/**
 * Log levels as bit flags.
 *
 * Each level has a distinct identity so a set of levels can be combined into
 * a single mask, e.g. `LogLevel.Error | LogLevel.Warning`. Both profiling
 * levels carry the `Profile` bit.
 *
 * @module levels/levels
 */

import { ConfigurationError } from '../errors/index.js'

export const LogLevel = {
	/** Abnormal termination that may need a developer's attention */
	Error: 0x01,
	/** Something abnormal happened but the application keeps running */
	Warning: 0x02,
	/** Information for developers to review */
	Info: 0x04,
	/** Reveals the code execution flow */
	Trace: 0x08,
	/** Mask bit shared by both profiling levels */
	Profile: 0x40,
	/** Marks the beginning of a profiling block */
	ProfileBegin: 0x50,
	/** Marks the end of a profiling block */
	ProfileEnd: 0x60,
} as const

/**
 * A level a record can be logged at. `Profile` is a mask bit only.
 */
export type LogLevel = Exclude<
	(typeof LogLevel)[keyof typeof LogLevel],
	typeof LogLevel.Profile
>

/** Display name of a level. */
export type LevelName =
	| 'error'
	| 'warning'
	| 'info'
	| 'trace'
	| 'profile begin'
	| 'profile end'

/** Names accepted when building a level mask. */
export type LevelMaskName = 'error' | 'warning' | 'info' | 'trace' | 'profile'

/** Combination of level bits. 0 means every level. */
export type LevelMask = number

const LEVEL_NAMES: ReadonlyMap<number, LevelName> = new Map<number, LevelName>([
	[LogLevel.Error, 'error'],
	[LogLevel.Warning, 'warning'],
	[LogLevel.Info, 'info'],
	[LogLevel.Trace, 'trace'],
	[LogLevel.ProfileBegin, 'profile begin'],
	[LogLevel.ProfileEnd, 'profile end'],
])

const MASK_BITS: Readonly<Record<LevelMaskName, number>> = {
	error: LogLevel.Error,
	warning: LogLevel.Warning,
	info: LogLevel.Info,
	trace: LogLevel.Trace,
	profile: LogLevel.ProfileBegin | LogLevel.ProfileEnd,
}

/**
 * Returns the display name of a level, or `'unknown'`.
 *
 * @example
 * ```typescript
 * getLevelName(LogLevel.Warning) // "warning"
 * getLevelName(0x80) // "unknown"
 * ```
 */
export function getLevelName(level: number): LevelName | 'unknown' {
	return LEVEL_NAMES.get(level) ?? 'unknown'
}

function isLevelMaskName(value: string): value is LevelMaskName {
	return Object.hasOwn(MASK_BITS, value)
}

/**
 * Build a level mask from level names and/or numeric levels.
 *
 * An empty list produces 0, which matches every level.
 *
 * @param levels - Names (`"error"`, `"profile"`, ...) or numeric levels
 * @returns Combined mask
 * @throws ConfigurationError for an unknown level name
 *
 * @example
 * ```typescript
 * toLevelMask(["error", "warning"]) // 0x03
 * toLevelMask(["profile"]) // 0x70
 * ```
 */
export function toLevelMask(
	levels: ReadonlyArray<LevelMaskName | string | number>,
): LevelMask {
	let mask = 0
	for (const level of levels) {
		if (typeof level === 'number') {
			mask |= level
			continue
		}
		const name = level.trim().toLowerCase()
		if (!isLevelMaskName(name)) {
			throw new ConfigurationError(
				`Unknown log level "${level}"`,
				'UNKNOWN_LOG_LEVEL',
				{ level, known: Object.keys(MASK_BITS) },
			)
		}
		mask |= MASK_BITS[name]
	}
	return mask
}

/**
 * Whether a level is selected by a mask. A mask of 0 selects every level.
 *
 * Matching is on shared bits, so a mask built from either profiling level
 * selects both of them.
 */
export function matchesLevelMask(level: number, mask: LevelMask): boolean {
	return mask === 0 || (level & mask) !== 0
}

/**
 * Whether a level is one of the two profiling levels.
 */
export function isProfileLevel(level: number): boolean {
	return level === LogLevel.ProfileBegin || level === LogLevel.ProfileEnd
}
