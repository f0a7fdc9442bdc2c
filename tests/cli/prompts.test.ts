import { PassThrough } from 'node:stream'
import { describe, expect, it, vi } from 'vitest'
import {
	type Ask,
	createPromptGate,
	createPromptResolver,
	createReadlineAsker,
} from '../../src/cli/prompts'

const request = {
	identity: 'SN1',
	field: 'barcode',
	label: 'Barcode',
	local: 'BC1',
	remote: 'BC2',
}

/** Answers questions from a script; null once it runs out. */
function scripted(...answers: (string | null)[]): Ask & { queries: string[] } {
	const queries: string[] = []
	const ask = async (query: string) => {
		queries.push(query)
		return answers.shift() ?? null
	}
	return Object.assign(ask, { queries })
}

describe('createPromptResolver', () => {
	it.each([
		['l', 'adopt-local'],
		['Remote', 'adopt-remote'],
		[' s ', 'skip'],
		['abort', 'abort'],
	])('maps %j to %s', async (answer, decision) => {
		const resolver = createPromptResolver(scripted(answer))
		expect(await resolver.resolve(request)).toBe(decision)
	})

	it('shows both values and asks again on an unknown answer', async () => {
		const ask = scripted('maybe', 'r')
		const resolver = createPromptResolver(ask)

		expect(await resolver.resolve(request)).toBe('adopt-remote')
		expect(ask.queries).toEqual([
			'\nConflict for serial SN1: Barcode\n  Spreadsheet: BC1\n  Lansweeper:  BC2\n[l]ocal value, [r]emote value, [s]kip, [a]bort: ',
			'Please answer l, r, s or a: ',
		])
	})

	it('aborts when the input closes', async () => {
		const resolver = createPromptResolver(scripted(null))
		expect(await resolver.resolve(request)).toBe('abort')
	})
})

describe('createPromptGate', () => {
	it('continues on Enter and pauses the display first', async () => {
		const onPause = vi.fn()
		const ask = scripted('')
		const gate = createPromptGate(ask, onPause)

		expect(await gate.confirm({ requestsIssued: 150 })).toBe(true)
		expect(onPause).toHaveBeenCalledWith(150)
		expect(ask.queries).toEqual(['150 requests sent to Lansweeper. Continue? [Y/n] '])
	})

	it('declines on no, or when the input closes', async () => {
		expect(await createPromptGate(scripted('N')).confirm({ requestsIssued: 1 })).toBe(false)
		expect(await createPromptGate(scripted(null)).confirm({ requestsIssued: 1 })).toBe(false)
	})

	it('asks again until the answer is y or n', async () => {
		const ask = scripted('later', 'yes')
		expect(await createPromptGate(ask).confirm({ requestsIssued: 3 })).toBe(true)
		expect(ask.queries[1]).toBe('Please answer y or n: ')
	})
})

describe('createReadlineAsker', () => {
	it('reads one line per question', async () => {
		const input = new PassThrough()
		const output = new PassThrough()
		const asker = createReadlineAsker(input, output)

		const answer = asker.ask('Continue? ')
		input.write('y\n')

		expect(await answer).toBe('y')
		asker.close()
	})

	it('answers null once the input ends', async () => {
		const input = new PassThrough()
		const asker = createReadlineAsker(input, new PassThrough())

		const answer = asker.ask('Continue? ')
		input.end()

		expect(await answer).toBeNull()
		expect(await asker.ask('Again? ')).toBeNull()
	})
})
