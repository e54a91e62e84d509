/**
 * Immutable event records and their payload variants.
 *
 * @module records
 */

export {
	type DataPayload,
	dataPayload,
	type ErrorInfo,
	type ErrorPayload,
	errorPayload,
	formatPayload,
	isPayload,
	type Payload,
	payloadEquals,
	type TextPayload,
	textPayload,
	toPayload,
} from './payload.js'
export { createRecord, type EventRecord } from './record.js'
