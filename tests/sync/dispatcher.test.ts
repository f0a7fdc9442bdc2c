import { describe, expect, it, vi } from 'vitest'
import { RunCancelledError, TransportError } from '../../src/errors'
import {
	type AssetSource,
	type ContinuationGate,
	DEFAULT_GATE_EVERY,
	type StagedUpdate,
	UpdateDispatcher,
} from '../../src/sync/dispatcher'

function createSource() {
	return {
		findBySerial: vi.fn(async (serial: string) => [
			{ key: `key-${serial}`, name: null, values: {} },
		]),
		editAsset: vi.fn(
			async (_key: string, _updates: ReadonlyMap<string, StagedUpdate>) => undefined,
		),
	} satisfies AssetSource
}

function scriptedGate(answers: boolean[]) {
	const seen: number[] = []
	const gate: ContinuationGate = {
		confirm: async ({ requestsIssued }) => {
			seen.push(requestsIssued)
			return answers.shift() ?? true
		},
	}
	return { gate, seen }
}

const batch = (): Map<string, StagedUpdate> =>
	new Map([['barCode', { kind: 'text', value: 'BC1' }]])

describe('UpdateDispatcher', () => {
	it('asks the gate before the call after every gateEvery calls', async () => {
		const source = createSource()
		const { gate, seen } = scriptedGate([])
		const dispatcher = new UpdateDispatcher({
			source,
			gate,
			controller: new AbortController(),
			gateEvery: 2,
		})

		for (const serial of ['a', 'b', 'c', 'd', 'e']) {
			await dispatcher.lookup(serial)
		}

		expect(seen).toEqual([2, 4])
		expect(dispatcher.requestsIssued).toBe(5)
		expect(source.findBySerial).toHaveBeenCalledTimes(5)
	})

	it('defaults to a gate every 150 calls', async () => {
		const source = createSource()
		const { gate, seen } = scriptedGate([])
		const dispatcher = new UpdateDispatcher({
			source,
			gate,
			controller: new AbortController(),
		})

		for (let i = 0; i < DEFAULT_GATE_EVERY; i += 1) {
			await dispatcher.lookup(`sn-${i}`)
		}
		expect(seen).toEqual([])

		await dispatcher.lookup('one-more')
		expect(seen).toEqual([150])
	})

	it('counts lookups and updates against the same budget', async () => {
		const source = createSource()
		const { gate, seen } = scriptedGate([])
		const dispatcher = new UpdateDispatcher({
			source,
			gate,
			controller: new AbortController(),
			gateEvery: 2,
		})

		await dispatcher.lookup('a')
		await dispatcher.dispatch('a', 'key-a', batch())
		await dispatcher.lookup('b')

		expect(seen).toEqual([2])
		expect(dispatcher.requestsIssued).toBe(3)
	})

	it('refuses the pending lookup and aborts the run when the gate declines', async () => {
		const source = createSource()
		const controller = new AbortController()
		const { gate } = scriptedGate([false])
		const dispatcher = new UpdateDispatcher({ source, gate, controller, gateEvery: 1 })

		await dispatcher.lookup('a')
		await expect(dispatcher.lookup('b')).rejects.toBeInstanceOf(RunCancelledError)

		expect(source.findBySerial).toHaveBeenCalledTimes(1)
		expect(dispatcher.requestsIssued).toBe(1)
		expect(controller.signal.aborted).toBe(true)
		const reason: unknown = controller.signal.reason
		expect(reason).toBeInstanceOf(RunCancelledError)
		expect(reason instanceof Error ? reason.message : null).toBe(
			'Declined to continue after 1 requests',
		)
	})

	it('reports a declined update as a failure without sending it', async () => {
		const source = createSource()
		const { gate } = scriptedGate([false])
		const dispatcher = new UpdateDispatcher({
			source,
			gate,
			controller: new AbortController(),
			gateEvery: 1,
		})

		await dispatcher.lookup('a')
		const result = await dispatcher.dispatch('a', 'key-a', batch())

		expect(result).toEqual({
			ok: false,
			code: 'E_CANCELLED',
			reason: 'cancelled at continuation gate',
		})
		expect(source.editAsset).not.toHaveBeenCalled()
	})

	it('lets pending calls through without asking once the run is aborting', async () => {
		const source = createSource()
		const controller = new AbortController()
		const { gate, seen } = scriptedGate([])
		const dispatcher = new UpdateDispatcher({ source, gate, controller, gateEvery: 1 })

		await dispatcher.lookup('a')
		controller.abort(new RunCancelledError('stop'))
		const result = await dispatcher.dispatch('a', 'key-a', batch())

		expect(result).toEqual({ ok: true, dryRun: false })
		expect(seen).toEqual([])
		expect(dispatcher.requestsIssued).toBe(2)
	})

	it('sends the whole batch in one call', async () => {
		const source = createSource()
		const dispatcher = new UpdateDispatcher({
			source,
			gate: scriptedGate([]).gate,
			controller: new AbortController(),
		})
		const updates = new Map<string, StagedUpdate>([
			['barCode', { kind: 'text', value: 'BC1' }],
			['purchaseDate', { kind: 'date', value: '2024-03-15T00:00:00Z' }],
		])

		const result = await dispatcher.dispatch('a', 'key-a', updates)

		expect(result).toEqual({ ok: true, dryRun: false })
		expect(source.editAsset).toHaveBeenCalledTimes(1)
		expect(source.editAsset).toHaveBeenCalledWith('key-a', updates)
	})

	it('returns failure for a remote error and never retries', async () => {
		const source = createSource()
		source.editAsset.mockRejectedValueOnce(
			new TransportError('Lansweeper API error (503)', {
				code: 'E_SERVER_ERROR',
				recoverable: true,
				status: 503,
			}),
		)
		const dispatcher = new UpdateDispatcher({
			source,
			gate: scriptedGate([]).gate,
			controller: new AbortController(),
		})

		const result = await dispatcher.dispatch('a', 'key-a', batch())

		expect(result).toEqual({
			ok: false,
			code: 'E_SERVER_ERROR',
			reason: 'Lansweeper API error (503)',
		})
		expect(source.editAsset).toHaveBeenCalledTimes(1)
		expect(dispatcher.requestsIssued).toBe(1)
	})

	it('rethrows errors that are not remote failures', async () => {
		const source = createSource()
		source.editAsset.mockRejectedValueOnce(new TypeError('bad batch'))
		const dispatcher = new UpdateDispatcher({
			source,
			gate: scriptedGate([]).gate,
			controller: new AbortController(),
		})

		await expect(dispatcher.dispatch('a', 'key-a', batch())).rejects.toThrow('bad batch')
	})

	it('sends nothing in dry-run mode and does not count the update', async () => {
		const source = createSource()
		const dispatcher = new UpdateDispatcher({
			source,
			gate: scriptedGate([]).gate,
			controller: new AbortController(),
			dryRun: true,
		})

		const result = await dispatcher.dispatch('a', 'key-a', batch())

		expect(result).toEqual({ ok: true, dryRun: true })
		expect(source.editAsset).not.toHaveBeenCalled()
		expect(dispatcher.requestsIssued).toBe(0)
	})

	it('treats an empty batch as a no-op success', async () => {
		const source = createSource()
		const dispatcher = new UpdateDispatcher({
			source,
			gate: scriptedGate([]).gate,
			controller: new AbortController(),
		})

		expect(await dispatcher.dispatch('a', 'key-a', new Map())).toEqual({
			ok: true,
			dryRun: false,
		})
		expect(dispatcher.requestsIssued).toBe(0)
	})

	it('rejects a gate interval that is not a positive integer', () => {
		const options = {
			source: createSource(),
			gate: scriptedGate([]).gate,
			controller: new AbortController(),
		}
		expect(() => new UpdateDispatcher({ ...options, gateEvery: 0 })).toThrow(RangeError)
		expect(() => new UpdateDispatcher({ ...options, gateEvery: 1.5 })).toThrow(RangeError)
	})
})
