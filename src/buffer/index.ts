/**
 * Process-local record buffer with a flush threshold.
 *
 * @module buffer
 */

export { type Clock, PROCESS_START_TIME, systemClock } from './clock.js'
export { MessageBuffer, type MessageBufferOptions } from './message-buffer.js'
