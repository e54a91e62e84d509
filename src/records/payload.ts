/**
 * Log payloads as a tagged variant.
 *
 * A record's message is either plain text, a snapshot of an error, or
 * arbitrary structured data. Errors are snapshotted into plain objects so a
 * buffered record never depends on a live error instance. An error is
 * snapshotted once: logging the same instance again reuses its snapshot, so
 * it can open and close a profiling span.
 *
 * @module records/payload
 */

import { isStructuredError } from '../errors/index.js'

/** Serializable snapshot of an error. */
export interface ErrorInfo {
	readonly name: string
	readonly message: string
	readonly stack?: string
	/** Present for structured errors */
	readonly code?: string
	/** Present for structured errors */
	readonly category?: string
	/** Present for structured errors */
	readonly context?: Record<string, unknown>
}

export type TextPayload = { readonly kind: 'text'; readonly text: string }
export type ErrorPayload = { readonly kind: 'error'; readonly error: ErrorInfo }
export type DataPayload = { readonly kind: 'data'; readonly data: unknown }

export type Payload = TextPayload | ErrorPayload | DataPayload

/** Wrap a string as a text payload. */
export function textPayload(text: string): TextPayload {
	return { kind: 'text', text }
}

const snapshots = new WeakMap<Error, ErrorInfo>()

/** Snapshot an error into an error payload. */
export function errorPayload(error: Error): ErrorPayload {
	const cached = snapshots.get(error)
	if (cached) return { kind: 'error', error: cached }

	const info: ErrorInfo = isStructuredError(error)
		? {
				name: error.name,
				message: error.message,
				stack: error.stack,
				code: error.code,
				category: error.category,
				context: error.context,
			}
		: { name: error.name, message: error.message, stack: error.stack }
	snapshots.set(error, info)
	return { kind: 'error', error: info }
}

/** Wrap any other value as a data payload. */
export function dataPayload(data: unknown): DataPayload {
	return { kind: 'data', data }
}

/**
 * Whether a value is already a payload variant.
 */
export function isPayload(value: unknown): value is Payload {
	if (typeof value !== 'object' || value === null || !('kind' in value)) {
		return false
	}
	switch (value.kind) {
		case 'text':
			return 'text' in value && typeof value.text === 'string'
		case 'error':
			return 'error' in value && typeof value.error === 'object'
		case 'data':
			return 'data' in value
		default:
			return false
	}
}

/**
 * Convert any logged value into a payload.
 *
 * @example
 * ```typescript
 * toPayload("cache miss") // { kind: "text", text: "cache miss" }
 * toPayload(new Error("boom")) // { kind: "error", error: { name: "Error", ... } }
 * toPayload({ rows: 3 }) // { kind: "data", data: { rows: 3 } }
 * ```
 */
export function toPayload(value: unknown): Payload {
	if (typeof value === 'string') return textPayload(value)
	if (value instanceof Error) return errorPayload(value)
	if (isPayload(value)) return value
	return dataPayload(value)
}

/**
 * Equality used to pair profiling begin and end records.
 *
 * Text compares by value. Data compares by identity of the wrapped value,
 * errors by identity of the snapshot, which is shared by every payload made
 * from the same error instance.
 */
export function payloadEquals(a: Payload, b: Payload): boolean {
	switch (a.kind) {
		case 'text':
			return b.kind === 'text' && a.text === b.text
		case 'error':
			return b.kind === 'error' && Object.is(a.error, b.error)
		case 'data':
			return b.kind === 'data' && Object.is(a.data, b.data)
	}
}

/**
 * Render a payload on a single line.
 */
export function formatPayload(payload: Payload): string {
	switch (payload.kind) {
		case 'text':
			return payload.text
		case 'error':
			return `${payload.error.name}: ${payload.error.message}`
		case 'data':
			return formatData(payload.data)
	}
}

function formatData(data: unknown): string {
	if (data === undefined) return 'undefined'
	if (typeof data === 'bigint') return `${data}n`
	if (typeof data === 'function' || typeof data === 'symbol') {
		return String(data)
	}
	try {
		return JSON.stringify(data) ?? String(data)
	} catch {
		// Circular structures and throwing toJSON methods
		return Object.prototype.toString.call(data)
	}
}
