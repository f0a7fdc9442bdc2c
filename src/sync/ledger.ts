import type { ConflictDecision } from './resolver'

/** Field values as strings, keyed by remote field name. */
export type RenderedUpdates = Readonly<Record<string, string>>

interface FieldEntryBase {
	readonly identity: string
	/** Field label as shown in the report. */
	readonly field: string
}

/**
 * One recorded outcome, in processing order. Field outcomes, lookup results
 * and dispatch results share the list so the report keeps the order rows
 * were processed in.
 */
export type LedgerEntry =
	| { readonly kind: 'missing-identity'; readonly row: number }
	| { readonly kind: 'not-found'; readonly identity: string }
	| {
			readonly kind: 'ambiguous'
			readonly identity: string
			readonly matches: number
	  }
	| {
			readonly kind: 'lookup-failed'
			readonly identity: string
			readonly code: string
			readonly reason: string
	  }
	| ({ readonly kind: 'both-empty' } & FieldEntryBase)
	| ({ readonly kind: 'match'; readonly value: string } & FieldEntryBase)
	| ({ readonly kind: 'fill-local'; readonly value: string } & FieldEntryBase)
	| ({ readonly kind: 'fill-remote'; readonly value: string } & FieldEntryBase)
	| ({
			readonly kind: 'conflict-resolved'
			readonly decision: Extract<ConflictDecision, 'adopt-local' | 'adopt-remote'>
			readonly local: string
			readonly remote: string
	  } & FieldEntryBase)
	| ({
			readonly kind: 'skipped'
			readonly local: string
			readonly remote: string
			readonly aborted: boolean
	  } & FieldEntryBase)
	| ({
			readonly kind: 'invalid'
			readonly side: 'local' | 'remote'
			readonly raw: string
			readonly reason: string
	  } & FieldEntryBase)
	| {
			readonly kind: 'dispatch-succeeded'
			readonly identity: string
			readonly key: string
			readonly updates: RenderedUpdates
			readonly dryRun: boolean
	  }
	| {
			readonly kind: 'dispatch-failed'
			readonly identity: string
			readonly key: string
			readonly updates: RenderedUpdates
			readonly code: string
			readonly reason: string
	  }

export type LedgerEntryKind = LedgerEntry['kind']

/** Report sections, in the order they are rendered. */
export const LEDGER_SECTIONS = [
	'lookup',
	'missing',
	'local',
	'remote',
	'conflict',
] as const

export type LedgerSection = (typeof LEDGER_SECTIONS)[number]

/** Sections an entry is listed under; match and staged fills have none. */
export function sectionsOf(entry: LedgerEntry): readonly LedgerSection[] {
	switch (entry.kind) {
		case 'missing-identity':
		case 'not-found':
		case 'ambiguous':
		case 'lookup-failed':
			return ['lookup']
		case 'both-empty':
			return ['missing']
		case 'fill-local':
			return ['local']
		case 'dispatch-succeeded':
		case 'dispatch-failed':
			return ['remote']
		case 'conflict-resolved':
			return entry.decision === 'adopt-remote'
				? ['conflict', 'local']
				: ['conflict']
		case 'skipped':
		case 'invalid':
			return ['conflict']
		case 'match':
		case 'fill-remote':
			return []
		default: {
			const _exhaustive: never = entry
			return _exhaustive
		}
	}
}

/** Append-only accumulator of run outcomes. Never touches source data. */
export class ChangeLedger {
	private readonly entries: LedgerEntry[] = []

	record(entry: LedgerEntry): void {
		this.entries.push(entry)
	}

	all(): readonly LedgerEntry[] {
		return this.entries
	}

	section(name: LedgerSection): LedgerEntry[] {
		return this.entries.filter((entry) => sectionsOf(entry).includes(name))
	}

	count(kind: LedgerEntryKind): number {
		let total = 0
		for (const entry of this.entries) {
			if (entry.kind === kind) total += 1
		}
		return total
	}
}
