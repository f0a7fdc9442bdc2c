import { createInterface } from 'node:readline/promises'
import type { ContinuationGate } from '../sync/dispatcher'
import type { ConflictDecision, ConflictResolver } from '../sync/resolver'

/** Ask one question; null once the input is closed. */
export type Ask = (query: string) => Promise<string | null>

export interface Asker {
	readonly ask: Ask
	close(): void
}

const CONFLICT_ANSWERS: Record<string, ConflictDecision> = {
	l: 'adopt-local',
	local: 'adopt-local',
	r: 'adopt-remote',
	remote: 'adopt-remote',
	s: 'skip',
	skip: 'skip',
	a: 'abort',
	abort: 'abort',
}

const GATE_ANSWERS: Record<string, boolean> = {
	'': true,
	y: true,
	yes: true,
	n: false,
	no: false,
}

/**
 * Terminal prompts over readline. Closing stdin (or Ctrl+C) answers every
 * pending and later question with null.
 */
export function createReadlineAsker(
	input: NodeJS.ReadableStream = process.stdin,
	output: NodeJS.WritableStream = process.stderr,
): Asker {
	const rl = createInterface({ input, output })
	let closed = false
	const whenClosed = new Promise<null>((resolve) => {
		rl.once('close', () => {
			closed = true
			resolve(null)
		})
	})
	rl.on('SIGINT', () => rl.close())
	return {
		ask: async (query) => {
			if (closed) return null
			try {
				return await Promise.race([rl.question(query), whenClosed])
			} catch (err) {
				// Newer Node versions reject the pending question on close.
				if (closed) return null
				throw err
			}
		},
		close: () => rl.close(),
	}
}

/** Conflict decisions from a person. No answer counts as abort. */
export function createPromptResolver(ask: Ask): ConflictResolver {
	return {
		resolve: async (request) => {
			const header = [
				'',
				`Conflict for serial ${request.identity}: ${request.label}`,
				`  Spreadsheet: ${request.local}`,
				`  Lansweeper:  ${request.remote}`,
				'',
			].join('\n')
			let query = `${header}[l]ocal value, [r]emote value, [s]kip, [a]bort: `
			for (;;) {
				const answer = await ask(query)
				if (answer === null) return 'abort'
				const decision = CONFLICT_ANSWERS[answer.trim().toLowerCase()]
				if (decision) return decision
				query = 'Please answer l, r, s or a: '
			}
		},
	}
}

/** Continuation gate that asks a person. Enter continues; no answer declines. */
export function createPromptGate(
	ask: Ask,
	onPause?: (requestsIssued: number) => void,
): ContinuationGate {
	return {
		confirm: async ({ requestsIssued }) => {
			onPause?.(requestsIssued)
			let query = `${requestsIssued} requests sent to Lansweeper. Continue? [Y/n] `
			for (;;) {
				const answer = await ask(query)
				if (answer === null) return false
				const proceed = GATE_ANSWERS[answer.trim().toLowerCase()]
				if (proceed !== undefined) return proceed
				query = 'Please answer y or n: '
			}
		},
	}
}
