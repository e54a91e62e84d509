/**
 * Call-stack capture for log records.
 *
 * A trace is a short list of `{ file, line }` frames leading to the log call.
 * Frames inside the library itself (and Node's own `node:` internals) are
 * skipped, as is the outermost frame, which is the entry point.
 *
 * @module trace/capture
 */

import { dirname, resolve, sep } from 'node:path'
import { fileURLToPath } from 'node:url'

/** A single stack frame. Nothing but location is retained. */
export interface TraceFrame {
	readonly file: string
	readonly line: number
}

/** Options for {@link captureTrace}. */
export interface TraceOptions {
	/** Maximum application frames to keep. 0 disables capture. */
	traceLevel: number
	/** Path prefixes whose frames are skipped */
	internalPaths?: readonly string[]
}

/** Source root of this library (`src/` or `dist/`) */
export const LIBRARY_ROOT: string = resolve(
	dirname(fileURLToPath(import.meta.url)),
	'..',
)

export const DEFAULT_INTERNAL_PATHS: readonly string[] = [LIBRARY_ROOT, 'node:']

// "at fn (file:line:col)", "at file:line:col", "at async fn (file:///x:1:2)"
const FRAME_PATTERN = /^\s*at\s+(?:.*?\s+\()?(.+?):(\d+):(\d+)\)?\s*$/

/**
 * Parse a V8 stack string into frames, innermost first.
 *
 * Lines without a `file:line:column` location, such as the message line or
 * `<anonymous>` frames, are ignored. `file://` URLs become paths.
 *
 * @example
 * ```typescript
 * parseStack("Error\n    at run (/app/main.ts:4:9)")
 * // [{ file: "/app/main.ts", line: 4 }]
 * ```
 */
export function parseStack(stack: string): TraceFrame[] {
	const frames: TraceFrame[] = []
	for (const line of stack.split('\n')) {
		const match = FRAME_PATTERN.exec(line)
		if (!match?.[1] || !match[2]) continue
		frames.push({ file: normalizeFile(match[1]), line: Number(match[2]) })
	}
	return frames
}

function normalizeFile(file: string): string {
	if (!file.startsWith('file://')) return file
	try {
		return fileURLToPath(file)
	} catch {
		return file
	}
}

/**
 * Whether a frame lies under one of the given paths.
 *
 * A path matches the file itself or anything below it, never a sibling
 * sharing its leading characters. A path ending in a separator or `:`
 * (such as `node:`) matches as a plain prefix.
 */
export function isInternalFrame(
	frame: TraceFrame,
	internalPaths: readonly string[],
): boolean {
	return internalPaths.some((prefix) => isWithin(frame.file, prefix))
}

function isWithin(file: string, prefix: string): boolean {
	if (!file.startsWith(prefix)) return false
	if (file.length === prefix.length) return true
	if (prefix.endsWith(sep) || prefix.endsWith('/') || prefix.endsWith(':')) return true
	const next = file.charAt(prefix.length)
	return next === sep || next === '/'
}

/**
 * Reduce parsed frames to a trace: drop the outermost frame, skip internal
 * frames, keep at most `traceLevel` of the rest.
 */
export function selectFrames(
	frames: readonly TraceFrame[],
	traceLevel: number,
	internalPaths: readonly string[],
): TraceFrame[] {
	const trace: TraceFrame[] = []
	if (traceLevel <= 0) return trace

	for (const frame of frames.slice(0, -1)) {
		if (isInternalFrame(frame, internalPaths)) continue
		trace.push({ file: frame.file, line: frame.line })
		if (trace.length >= traceLevel) break
	}
	return trace
}

/**
 * Capture the application frames leading to the caller.
 *
 * Returns an empty trace when `traceLevel` is 0 or when the stack cannot be
 * read.
 *
 * @example
 * ```typescript
 * const trace = captureTrace({ traceLevel: 3 })
 * // [{ file: "/app/src/orders.ts", line: 42 }, ...]
 * ```
 */
export function captureTrace(options: TraceOptions): readonly TraceFrame[] {
	const { traceLevel, internalPaths = DEFAULT_INTERNAL_PATHS } = options
	if (traceLevel <= 0) return []

	try {
		return selectFrames(parseStack(readStack()), traceLevel, internalPaths)
	} catch {
		return []
	}
}

function readStack(): string {
	const holder: { stack?: string } = {}
	const previousLimit = Error.stackTraceLimit
	Error.stackTraceLimit = Number.POSITIVE_INFINITY
	try {
		Error.captureStackTrace(holder, captureTrace)
	} finally {
		Error.stackTraceLimit = previousLimit
	}
	return holder.stack ?? ''
}
