/**
 * Time sources, in seconds since the epoch.
 */

/** Returns the current time in seconds since the epoch. */
export type Clock = () => number

/**
 * Wall-clock time with sub-millisecond resolution.
 */
export const systemClock: Clock = () =>
	(performance.timeOrigin + performance.now()) / 1000

/** Captured once, when the library is first loaded */
export const PROCESS_START_TIME: number = systemClock()
