import { appendFile, mkdir } from 'node:fs/promises'
import path from 'node:path'
import type { ReconcileRun } from './engine'
import {
	type ChangeLedger,
	LEDGER_SECTIONS,
	type LedgerEntry,
	type LedgerSection,
	type RenderedUpdates,
} from './ledger'

const REPORT_MODE = 0o600
const RULE = '='.repeat(80)

const SECTION_TITLES: Record<LedgerSection, string> = {
	lookup: 'Not found / ambiguous identities',
	missing: 'Empty in both sources',
	local: 'Spreadsheet updates',
	remote: 'Lansweeper updates',
	conflict: 'Conflicts and skips',
}

export interface RunSummary {
	readonly dryRun: boolean
	readonly cancelled: boolean
	readonly cancelReason: string | null
	readonly requestsIssued: number
	readonly identitiesProcessed: number
	readonly notFound: number
	readonly ambiguous: number
	readonly lookupFailed: number
	readonly missingIdentity: number
	readonly localMutations: number
	readonly remoteUpdates: number
	readonly remoteFailures: number
	readonly conflictsResolved: number
	readonly conflictsSkipped: number
	readonly formatConflicts: number
	readonly bothEmpty: number
	readonly matches: number
}

/** Fold the engine's counters and the ledger into one summary. */
export function summarizeRun(
	ledger: ChangeLedger,
	run: ReconcileRun,
	dryRun: boolean,
): RunSummary {
	return {
		dryRun,
		cancelled: run.cancelled,
		cancelReason: run.cancelReason,
		requestsIssued: run.requestsIssued,
		identitiesProcessed: run.identitiesProcessed,
		notFound: ledger.count('not-found'),
		ambiguous: ledger.count('ambiguous'),
		lookupFailed: ledger.count('lookup-failed'),
		missingIdentity: ledger.count('missing-identity'),
		localMutations: run.localMutations,
		remoteUpdates: ledger.count('dispatch-succeeded'),
		remoteFailures: ledger.count('dispatch-failed'),
		conflictsResolved: ledger.count('conflict-resolved'),
		conflictsSkipped: ledger.count('skipped'),
		formatConflicts: ledger.count('invalid'),
		bothEmpty: ledger.count('both-empty'),
		matches: ledger.count('match'),
	}
}

function formatUpdates(updates: RenderedUpdates): string {
	return Object.entries(updates)
		.map(([name, value]) => `${name}=${value}`)
		.join(', ')
}

function conflictPrefix(entry: {
	readonly identity: string
	readonly field: string
	readonly local: string
	readonly remote: string
}): string {
	return `${entry.identity}: ${entry.field} Spreadsheet='${entry.local}' vs Lansweeper='${entry.remote}'`
}

/** One report line for an entry, as it reads under the given section. */
export function renderEntry(entry: LedgerEntry, section: LedgerSection): string {
	switch (entry.kind) {
		case 'missing-identity':
			return `Row ${entry.row}: no serial number`
		case 'not-found':
			return `ERROR: Asset not found for serial number: ${entry.identity}`
		case 'ambiguous':
			return `ERROR: ${entry.matches} assets match serial number: ${entry.identity}`
		case 'lookup-failed':
			return `ERROR: Lookup failed for serial number ${entry.identity}: ${entry.reason}`
		case 'both-empty':
			return `${entry.identity}: ${entry.field} is empty in both sources`
		case 'match':
			return `${entry.identity}: ${entry.field} matches ('${entry.value}')`
		case 'fill-local':
			return `${entry.identity}: ${entry.field} set to '${entry.value}' from Lansweeper`
		case 'fill-remote':
			return `${entry.identity}: ${entry.field} staged as '${entry.value}' for Lansweeper`
		case 'conflict-resolved':
			if (section === 'local') {
				return `${entry.identity}: ${entry.field} set to '${entry.remote}' from Lansweeper (conflict)`
			}
			return entry.decision === 'adopt-local'
				? `${conflictPrefix(entry)} -> kept spreadsheet value`
				: `${conflictPrefix(entry)} -> took Lansweeper value`
		case 'skipped':
			return entry.aborted
				? `${conflictPrefix(entry)} -> run aborted`
				: `${conflictPrefix(entry)} -> skipped`
		case 'invalid': {
			const source = entry.side === 'local' ? 'spreadsheet' : 'Lansweeper'
			return `${entry.identity}: ${entry.field} format conflict (${source} value '${entry.raw}': ${entry.reason})`
		}
		case 'dispatch-succeeded':
			return entry.dryRun
				? `WOULD UPDATE: Serial ${entry.identity} - ${formatUpdates(entry.updates)}`
				: `UPDATED: Serial ${entry.identity} - ${formatUpdates(entry.updates)}`
		case 'dispatch-failed':
			return `UPDATE FAILED: Serial ${entry.identity} - ${formatUpdates(entry.updates)} (${entry.reason})`
		default: {
			const _exhaustive: never = entry
			return _exhaustive
		}
	}
}

function renderSummary(summary: RunSummary): string[] {
	const lines = [
		'Summary',
		`  Mode: ${summary.dryRun ? 'dry-run' : 'execute'}`,
		`  Requests issued: ${summary.requestsIssued}`,
		`  Identities processed: ${summary.identitiesProcessed}`,
		`  Not found: ${summary.notFound}`,
		`  Ambiguous: ${summary.ambiguous}`,
		`  Lookup failures: ${summary.lookupFailed}`,
		`  Rows without serial number: ${summary.missingIdentity}`,
		`  Spreadsheet updates: ${summary.localMutations}`,
		`  Lansweeper updates: ${summary.remoteUpdates}`,
		`  Lansweeper update failures: ${summary.remoteFailures}`,
		`  Conflicts resolved: ${summary.conflictsResolved}`,
		`  Conflicts skipped: ${summary.conflictsSkipped}`,
		`  Format conflicts: ${summary.formatConflicts}`,
		`  Empty in both sources: ${summary.bothEmpty}`,
		`  Matching fields: ${summary.matches}`,
	]
	if (summary.cancelled) {
		lines.push(`  Cancelled: ${summary.cancelReason ?? 'yes'}`)
	}
	return lines
}

/** Render the full textual report for one run. */
export function renderReport(
	ledger: ChangeLedger,
	summary: RunSummary,
	generatedAt: Date,
): string {
	const timestamp = generatedAt.toISOString()
	const lines = [
		RULE,
		`Asset Reconciliation Report - Generated: ${timestamp}`,
		RULE,
		'',
	]
	for (const section of LEDGER_SECTIONS) {
		lines.push(`--- ${SECTION_TITLES[section]} (generated ${timestamp}) ---`)
		const entries = ledger.section(section)
		if (entries.length === 0) {
			lines.push('(none)')
		}
		for (const entry of entries) {
			lines.push(renderEntry(entry, section))
		}
		lines.push('')
	}
	lines.push(...renderSummary(summary), '')
	return `${lines.join('\n')}\n`
}

/** Append a rendered report; earlier runs in the same file are kept. */
export async function appendReport(reportPath: string, text: string): Promise<void> {
	await mkdir(path.dirname(reportPath), { recursive: true })
	await appendFile(reportPath, text, { encoding: 'utf8', mode: REPORT_MODE })
}
