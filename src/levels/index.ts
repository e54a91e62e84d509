/**
 * Bit-flag log levels and level masks.
 *
 * @module levels
 */

export {
	getLevelName,
	isProfileLevel,
	type LevelMask,
	type LevelMaskName,
	type LevelName,
	LogLevel,
	matchesLevelMask,
	toLevelMask,
} from './levels.js'
