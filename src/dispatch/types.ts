/**
 * The boundary between the message buffer and whatever stores its records.
 *
 * @module dispatch/types
 */

import type { EventRecord } from '../records/index.js'

/**
 * Receives each flushed batch.
 *
 * `dispatch` is called synchronously, exactly once per flush, with the
 * records in the order they were logged. `final` is true for the last flush
 * of the process.
 */
export interface Dispatcher {
	dispatch(records: readonly EventRecord[], final: boolean): void
}
