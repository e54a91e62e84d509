/**
 * Dispatch of flushed batches to targets.
 *
 * @module dispatch
 */

export { TargetDispatcher } from './dispatcher.js'
export type { Dispatcher } from './types.js'
