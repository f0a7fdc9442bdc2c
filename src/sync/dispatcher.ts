import { isRemoteFailure, RunCancelledError } from '../errors'
import { getLogContext, getSyncLogger } from '../logging'
import type { ValueKind } from './fields'

export const DEFAULT_GATE_EVERY = 150

/** Logger for outbound calls and the continuation gate. */
const dispatchLogger = getSyncLogger(['sync', 'dispatch'])

/** One remote field change, already rendered in the remote representation. */
export interface StagedUpdate {
	readonly kind: ValueKind
	readonly value: string
}

/** Remote field changes for one identity, keyed by remote field name. */
export type UpdateBatch = Map<string, StagedUpdate>

export interface AssetRecord {
	/** Opaque key the remote service uses for updates. */
	readonly key: string
	readonly name: string | null
	/** Comparable field values keyed by remote field name. */
	readonly values: Readonly<Record<string, unknown>>
}

/** The remote side of the reconciliation, as the engine needs it. */
export interface AssetSource {
	findBySerial(serial: string): Promise<AssetRecord[]>
	editAsset(key: string, updates: ReadonlyMap<string, StagedUpdate>): Promise<void>
}

/** Advisory pause every N outbound calls; false cancels the run. */
export interface ContinuationGate {
	confirm(info: { readonly requestsIssued: number }): Promise<boolean>
}

export const alwaysContinue: ContinuationGate = {
	confirm: async () => true,
}

export const neverContinue: ContinuationGate = {
	confirm: async () => false,
}

export type DispatchResult =
	| { readonly ok: true; readonly dryRun: boolean }
	| { readonly ok: false; readonly code: string; readonly reason: string }

export interface DispatcherOptions {
	readonly source: AssetSource
	readonly gate: ContinuationGate
	/** Run controller; a declined gate aborts it. */
	readonly controller: AbortController
	readonly gateEvery?: number
	/** When true, updates are logged and reported but never sent. */
	readonly dryRun?: boolean
}

/**
 * Every outbound call goes through here so the request counter sees all of
 * them. The counter and the gate are the only backpressure: failures are
 * never retried.
 */
export class UpdateDispatcher {
	private readonly source: AssetSource
	private readonly gate: ContinuationGate
	private readonly controller: AbortController
	private readonly gateEvery: number
	readonly dryRun: boolean
	private issued = 0

	constructor(options: DispatcherOptions) {
		const gateEvery = options.gateEvery ?? DEFAULT_GATE_EVERY
		if (!Number.isInteger(gateEvery) || gateEvery <= 0) {
			throw new RangeError(`gateEvery must be a positive integer: ${gateEvery}`)
		}
		this.source = options.source
		this.gate = options.gate
		this.controller = options.controller
		this.gateEvery = gateEvery
		this.dryRun = options.dryRun ?? false
	}

	/** Outbound calls issued so far, lookups and updates alike. */
	get requestsIssued(): number {
		return this.issued
	}

	/** Look an identity up remotely. Throws RunCancelledError if the gate declines. */
	async lookup(identity: string): Promise<AssetRecord[]> {
		if (!(await this.admit())) {
			throw new RunCancelledError('Lookup not issued: run cancelled at gate', {
				context: { identity },
			})
		}
		return await this.source.findBySerial(identity)
	}

	/** Send one identity's whole batch in a single call. */
	async dispatch(
		identity: string,
		key: string,
		batch: ReadonlyMap<string, StagedUpdate>,
	): Promise<DispatchResult> {
		if (batch.size === 0) return { ok: true, dryRun: this.dryRun }
		const fields = [...batch.keys()].join(', ')
		if (this.dryRun) {
			dispatchLogger.info('Dry-run: would update {identity} ({fields})', {
				identity,
				fields,
			})
			return { ok: true, dryRun: true }
		}
		if (!(await this.admit())) {
			return {
				ok: false,
				code: 'E_CANCELLED',
				reason: 'cancelled at continuation gate',
			}
		}
		try {
			await this.source.editAsset(key, batch)
			dispatchLogger.info('Updated {identity} ({fields})', {
				identity,
				fields,
				...getLogContext(),
			})
			return { ok: true, dryRun: false }
		} catch (err) {
			if (!isRemoteFailure(err)) throw err
			dispatchLogger.error('Update failed for {identity}: {error}', {
				identity,
				error: err.message,
				code: err.code,
			})
			return { ok: false, code: err.code, reason: err.message }
		}
	}

	/**
	 * Count the next call, asking the gate first whenever the calls already
	 * issued are a multiple of gateEvery. Once the run is aborting, pending
	 * calls go through without asking.
	 */
	private async admit(): Promise<boolean> {
		const atGate = this.issued > 0 && this.issued % this.gateEvery === 0
		if (atGate && !this.controller.signal.aborted) {
			dispatchLogger.info('Continuation gate after {requestsIssued} requests', {
				requestsIssued: this.issued,
			})
			const proceed = await this.gate.confirm({ requestsIssued: this.issued })
			if (!proceed) {
				dispatchLogger.warn('Run cancelled at continuation gate')
				this.controller.abort(
					new RunCancelledError(
						`Declined to continue after ${this.issued} requests`,
						{ context: { requestsIssued: this.issued } },
					),
				)
				return false
			}
		}
		this.issued += 1
		return true
	}
}
