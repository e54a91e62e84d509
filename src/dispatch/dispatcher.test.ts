import { afterEach, beforeEach, describe, expect, test } from 'vitest'
import { LogLevel } from '../levels/index.js'
import { createRecord, type EventRecord, textPayload } from '../records/index.js'
import { MemoryTarget, Target } from '../targets/index.js'
import { captureLogs, type LogCapture } from '../testing/index.js'
import { TargetDispatcher } from './dispatcher.js'

class FailingTarget extends Target {
	attempts = 0

	protected override export(): void {
		this.attempts++
		throw new Error('disk full')
	}
}

const batch: EventRecord[] = [
	createRecord(textPayload('boom'), LogLevel.Error, 'app', 1),
	createRecord(textPayload('hello'), LogLevel.Info, 'app', 2),
]

describe('TargetDispatcher', () => {
	let capture: LogCapture

	beforeEach(async () => {
		capture = await captureLogs([['spanlog']])
	})

	afterEach(async () => {
		await capture.dispose()
	})

	test('every enabled target receives the batch', () => {
		const errors = new MemoryTarget({ levels: ['error'] })
		const everything = new MemoryTarget()
		const dispatcher = new TargetDispatcher({ errors, everything })

		dispatcher.dispatch(batch, true)

		expect(errors.records).toEqual([batch[0]])
		expect(everything.records).toEqual(batch)
	})

	test('passes the final flag to targets', () => {
		const target = new MemoryTarget()
		const dispatcher = new TargetDispatcher({ memory: target })

		dispatcher.dispatch(batch, false)
		expect(target.batches).toHaveLength(0)

		dispatcher.dispatch([], true)
		expect(target.batches).toHaveLength(1)
	})

	test('skips disabled targets', () => {
		const target = new MemoryTarget({ enabled: false })
		const dispatcher = new TargetDispatcher({ memory: target })

		dispatcher.dispatch(batch, true)

		expect(target.records).toEqual([])
		expect(target.pendingCount).toBe(0)
	})

	test('disables a failing target and keeps serving the others', () => {
		const failing = new FailingTarget()
		const memory = new MemoryTarget()
		const dispatcher = new TargetDispatcher({ failing, memory })

		expect(() => dispatcher.dispatch(batch, true)).not.toThrow()
		dispatcher.dispatch(batch, true)

		expect(failing.enabled).toBe(false)
		expect(failing.attempts).toBe(1)
		expect(memory.batches).toHaveLength(2)
	})

	test('reports a failing target through diagnostics', () => {
		const dispatcher = new TargetDispatcher({ failing: new FailingTarget() })

		dispatcher.dispatch(batch, true)

		expect(capture.records).toHaveLength(1)
		expect(capture.records[0]?.category).toEqual(['spanlog', 'dispatcher'])
		expect(capture.records[0]?.level).toBe('warning')
		expect(capture.records[0]?.properties).toMatchObject({
			target: 'failing',
			error: 'Target "failing" failed to collect records',
			errorName: 'TargetError',
			category: 'TARGET',
			code: 'TARGET_COLLECT_FAILED',
			recoverable: false,
			context: { target: 'failing', records: 2, final: true },
			cause: 'disk full',
		})
	})

	test('manages targets by name', () => {
		const dispatcher = new TargetDispatcher()
		const target = new MemoryTarget()

		dispatcher.addTarget('memory', target)
		expect(dispatcher.targetNames).toEqual(['memory'])
		expect(dispatcher.getTarget('memory')).toBe(target)

		expect(dispatcher.removeTarget('memory')).toBe(true)
		expect(dispatcher.getTarget('memory')).toBeUndefined()
	})
})
