import { isRemoteFailure, RunCancelledError } from '../errors'
import { getSyncLogger } from '../logging'
import { valuesEqual } from './compare'
import type {
	AssetRecord,
	DispatchResult,
	StagedUpdate,
	UpdateBatch,
	UpdateDispatcher,
} from './dispatcher'
import type { ComparableField } from './fields'
import type { ChangeLedger, RenderedUpdates } from './ledger'
import {
	type CellValue,
	type NormalizedValue,
	normalize,
	renderLocal,
	renderRemote,
} from './normalize'
import type { ConflictResolver } from './resolver'

/** Logger for the per-identity reconciliation loop. */
const engineLogger = getSyncLogger(['sync', 'engine'])

/** One spreadsheet row, keyed by column header. Mutated in place by fills. */
export type LocalRow = Record<string, CellValue>

/** The single result of comparing one field for one identity. */
export type FieldOutcome =
	| { readonly type: 'both-empty' }
	| { readonly type: 'fill-local'; readonly value: string }
	| { readonly type: 'fill-remote'; readonly value: string }
	| { readonly type: 'match'; readonly value: string }
	| {
			readonly type: 'conflict-resolved'
			readonly decision: 'adopt-local' | 'adopt-remote'
			readonly value: string
	  }
	| {
			readonly type: 'skipped'
			readonly local: string
			readonly remote: string
			readonly aborted: boolean
	  }
	| {
			readonly type: 'invalid'
			readonly side: 'local' | 'remote'
			readonly reason: string
	  }

export type IdentityStatus =
	| 'reconciled'
	| 'not-found'
	| 'ambiguous'
	| 'lookup-failed'
	| 'cancelled'

export interface IdentityResult {
	readonly identity: string
	readonly status: IdentityStatus
	/** Field outcomes keyed by field name, in field order. */
	readonly outcomes: ReadonlyMap<string, FieldOutcome>
	readonly dispatch: DispatchResult | null
}

export interface ReconcileRun {
	readonly results: readonly IdentityResult[]
	readonly identitiesProcessed: number
	readonly localMutations: number
	readonly requestsIssued: number
	readonly cancelled: boolean
	readonly cancelReason: string | null
}

export interface EngineOptions {
	readonly fields: readonly ComparableField[]
	readonly identityColumn: string
	readonly dispatcher: UpdateDispatcher
	readonly resolver: ConflictResolver
	readonly ledger: ChangeLedger
	/** Shared with the dispatcher; checked before each identity and field. */
	readonly controller: AbortController
	readonly onProgress?: (current: number, total: number, identity: string) => void
}

function readIdentity(raw: CellValue): string | null {
	if (typeof raw !== 'string' && typeof raw !== 'number') return null
	const identity = String(raw).trim()
	return identity.length > 0 ? identity : null
}

function renderUpdates(batch: UpdateBatch): RenderedUpdates {
	return Object.fromEntries(
		[...batch.entries()].map(([name, update]) => [name, update.value]),
	)
}

type InvalidValue = Extract<NormalizedValue, { readonly type: 'invalid' }>

/** Local side wins when both values are malformed: one outcome per field. */
function findInvalid(
	local: NormalizedValue,
	remote: NormalizedValue,
): { readonly side: 'local' | 'remote'; readonly value: InvalidValue } | null {
	if (local.type === 'invalid') return { side: 'local', value: local }
	if (remote.type === 'invalid') return { side: 'remote', value: remote }
	return null
}

function describeAbort(signal: AbortSignal): string | null {
	if (!signal.aborted) return null
	const reason: unknown = signal.reason
	if (reason instanceof Error) return reason.message
	return typeof reason === 'string' ? reason : 'Run cancelled'
}

/**
 * Walks the local rows in order, one identity at a time: lookup, every
 * field, then at most one dispatch. Nothing runs in parallel.
 */
export class ReconciliationEngine {
	private readonly fields: readonly ComparableField[]
	private readonly identityColumn: string
	private readonly dispatcher: UpdateDispatcher
	private readonly resolver: ConflictResolver
	private readonly ledger: ChangeLedger
	private readonly controller: AbortController
	private readonly onProgress?: EngineOptions['onProgress']
	private localMutations = 0

	constructor(options: EngineOptions) {
		this.fields = options.fields
		this.identityColumn = options.identityColumn
		this.dispatcher = options.dispatcher
		this.resolver = options.resolver
		this.ledger = options.ledger
		this.controller = options.controller
		this.onProgress = options.onProgress
	}

	private get cancelled(): boolean {
		return this.controller.signal.aborted
	}

	/**
	 * Reconcile rows in order. `rowNumbers` gives each row's position in the
	 * sheet for the report; without it, rows are assumed to follow a header.
	 */
	async run(
		rows: readonly LocalRow[],
		rowNumbers?: readonly number[],
	): Promise<ReconcileRun> {
		const results: IdentityResult[] = []
		for (const [index, row] of rows.entries()) {
			if (this.cancelled) break
			const identity = readIdentity(row[this.identityColumn])
			const sheetRow = rowNumbers?.[index] ?? index + 2
			if (identity === null) {
				engineLogger.warn('Skipping row {row}: no serial number', {
					row: sheetRow,
				})
				this.ledger.record({ kind: 'missing-identity', row: sheetRow })
				continue
			}
			this.onProgress?.(index + 1, rows.length, identity)
			results.push(await this.reconcileIdentity(identity, row))
		}

		const cancelReason = describeAbort(this.controller.signal)
		if (cancelReason) {
			engineLogger.warn('Run cancelled: {reason}', { reason: cancelReason })
		}
		return {
			results,
			identitiesProcessed: results.filter(
				(result) => result.status === 'reconciled',
			).length,
			localMutations: this.localMutations,
			requestsIssued: this.dispatcher.requestsIssued,
			cancelled: cancelReason !== null,
			cancelReason,
		}
	}

	/** Reconcile every field of one identity against its remote record. */
	async reconcileIdentity(
		identity: string,
		row: LocalRow,
	): Promise<IdentityResult> {
		engineLogger.info('Processing serial number: {identity}', { identity })
		const outcomes = new Map<string, FieldOutcome>()

		let records: AssetRecord[]
		try {
			records = await this.dispatcher.lookup(identity)
		} catch (err) {
			if (err instanceof RunCancelledError) {
				return { identity, status: 'cancelled', outcomes, dispatch: null }
			}
			if (!isRemoteFailure(err)) throw err
			engineLogger.error('Lookup failed for {identity}: {error}', {
				identity,
				error: err.message,
			})
			this.ledger.record({
				kind: 'lookup-failed',
				identity,
				code: err.code,
				reason: err.message,
			})
			return { identity, status: 'lookup-failed', outcomes, dispatch: null }
		}

		const [record] = records
		if (!record) {
			engineLogger.warn('No asset found with serial number: {identity}', {
				identity,
			})
			this.ledger.record({ kind: 'not-found', identity })
			return { identity, status: 'not-found', outcomes, dispatch: null }
		}
		if (records.length > 1) {
			engineLogger.warn('{matches} assets match serial number {identity}', {
				identity,
				matches: records.length,
			})
			this.ledger.record({
				kind: 'ambiguous',
				identity,
				matches: records.length,
			})
			return { identity, status: 'ambiguous', outcomes, dispatch: null }
		}

		const batch: UpdateBatch = new Map()
		for (const field of this.fields) {
			if (this.cancelled) break
			const outcome = await this.reconcileField(
				identity,
				row,
				record,
				field,
				batch,
			)
			outcomes.set(field.name, outcome)
		}

		const dispatch =
			batch.size > 0 ? await this.flush(identity, record.key, batch) : null
		return { identity, status: 'reconciled', outcomes, dispatch }
	}

	private async reconcileField(
		identity: string,
		row: LocalRow,
		record: AssetRecord,
		field: ComparableField,
		batch: UpdateBatch,
	): Promise<FieldOutcome> {
		const options = { pattern: field.pattern }
		const local = normalize(row[field.column], field.kind, options)
		const remote = normalize(record.values[field.remote], field.kind, options)
		const base = { identity, field: field.label }

		const invalid = findInvalid(local, remote)
		if (invalid) {
			const { side, value } = invalid
			engineLogger.warn('Format conflict on {field} for {identity}: {reason}', {
				...base,
				side,
				reason: value.reason,
			})
			this.ledger.record({
				kind: 'invalid',
				...base,
				side,
				raw: value.raw,
				reason: value.reason,
			})
			return { type: 'invalid', side, reason: value.reason }
		}

		if (local.type === 'empty' && remote.type === 'empty') {
			this.ledger.record({ kind: 'both-empty', ...base })
			return { type: 'both-empty' }
		}
		if (local.type === 'empty') {
			const value = this.fillLocal(row, field, remote)
			this.ledger.record({ kind: 'fill-local', ...base, value })
			return { type: 'fill-local', value }
		}
		if (remote.type === 'empty') {
			const value = this.stage(batch, field, local)
			this.ledger.record({ kind: 'fill-remote', ...base, value })
			return { type: 'fill-remote', value }
		}
		if (valuesEqual(local, remote)) {
			const value = renderLocal(local)
			this.ledger.record({ kind: 'match', ...base, value })
			return { type: 'match', value }
		}

		const shownLocal = renderLocal(local)
		const shownRemote = renderLocal(remote)
		const decision = await this.resolver.resolve({
			identity,
			field: field.name,
			label: field.label,
			local: shownLocal,
			remote: shownRemote,
		})
		engineLogger.info('Conflict on {field} for {identity}: {decision}', {
			...base,
			decision,
		})
		const conflict = { ...base, local: shownLocal, remote: shownRemote }
		switch (decision) {
			case 'adopt-local': {
				const value = this.stage(batch, field, local)
				this.ledger.record({ kind: 'conflict-resolved', ...conflict, decision })
				return { type: 'conflict-resolved', decision, value }
			}
			case 'adopt-remote': {
				const value = this.fillLocal(row, field, remote)
				this.ledger.record({ kind: 'conflict-resolved', ...conflict, decision })
				return { type: 'conflict-resolved', decision, value }
			}
			case 'skip':
				this.ledger.record({ kind: 'skipped', ...conflict, aborted: false })
				return {
					type: 'skipped',
					local: shownLocal,
					remote: shownRemote,
					aborted: false,
				}
			case 'abort':
				this.controller.abort(
					new RunCancelledError(`Run aborted at ${field.label} for ${identity}`),
				)
				this.ledger.record({ kind: 'skipped', ...conflict, aborted: true })
				return {
					type: 'skipped',
					local: shownLocal,
					remote: shownRemote,
					aborted: true,
				}
			default: {
				const _exhaustive: never = decision
				return _exhaustive
			}
		}
	}

	private fillLocal(
		row: LocalRow,
		field: ComparableField,
		value: NormalizedValue,
	): string {
		const rendered = renderLocal(value)
		row[field.column] = rendered
		this.localMutations += 1
		return rendered
	}

	private stage(
		batch: UpdateBatch,
		field: ComparableField,
		value: NormalizedValue,
	): string {
		const update: StagedUpdate = { kind: field.kind, value: renderRemote(value) }
		batch.set(field.remote, update)
		return update.value
	}

	/** Dispatch the identity's batch and record the result. */
	private async flush(
		identity: string,
		key: string,
		batch: UpdateBatch,
	): Promise<DispatchResult> {
		const updates = renderUpdates(batch)
		const result = await this.dispatcher.dispatch(identity, key, batch)
		if (result.ok) {
			this.ledger.record({
				kind: 'dispatch-succeeded',
				identity,
				key,
				updates,
				dryRun: result.dryRun,
			})
		} else {
			this.ledger.record({
				kind: 'dispatch-failed',
				identity,
				key,
				updates,
				code: result.code,
				reason: result.reason,
			})
		}
		return result
	}
}
