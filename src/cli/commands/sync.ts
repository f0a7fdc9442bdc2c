import { resolveRunConfig } from '../../config'
import {
	isRemoteFailure,
	PreconditionError,
	RunCancelledError,
} from '../../errors'
import { emitEvent } from '../../events'
import { LansweeperClient } from '../../lansweeper/client'
import { getSyncLogger } from '../../logging'
import { loadSheet, saveSheet } from '../../spreadsheet/workbook'
import { acquireLock, releaseLock } from '../../state/lock'
import {
	alwaysContinue,
	type ContinuationGate,
	neverContinue,
	UpdateDispatcher,
} from '../../sync/dispatcher'
import { ReconciliationEngine } from '../../sync/engine'
import { requiredColumns } from '../../sync/fields'
import { ChangeLedger } from '../../sync/ledger'
import { appendReport, renderReport, summarizeRun } from '../../sync/report'
import {
	alwaysSkip,
	type ConflictResolver,
	createFixedResolver,
	createPolicyResolver,
} from '../../sync/resolver'
import type { ExitCode, OutputContext } from '../output'
import {
	EXIT_INTERRUPTED,
	EXIT_OK,
	handleCommandError,
	writeSuccess,
} from '../output'
import { ProgressDisplay } from '../progress'
import {
	type Asker,
	createPromptGate,
	createPromptResolver,
	createReadlineAsker,
} from '../prompts'

/** Logger for the sync command. */
const syncLogger = getSyncLogger(['cli', 'sync'])

export type ConflictMode = 'prompt' | 'skip' | 'local' | 'remote'

export interface SyncCommand {
	readonly command: 'sync'
	readonly execute: boolean
	readonly spreadsheet: string | null
	readonly report: string | null
	readonly config: string | null
	readonly gateEvery: number | null
	readonly onConflict: ConflictMode
	readonly yes: boolean
}

function isInteractive(ctx: OutputContext): boolean {
	return !ctx.json && Boolean(process.stdin.isTTY) && Boolean(process.stdout.isTTY)
}

function buildFallbackResolver(
	mode: ConflictMode,
	asker: Asker | null,
): ConflictResolver {
	switch (mode) {
		case 'local':
			return createFixedResolver('adopt-local')
		case 'remote':
			return createFixedResolver('adopt-remote')
		case 'skip':
			return alwaysSkip
		case 'prompt':
			return asker ? createPromptResolver(asker.ask) : alwaysSkip
		default: {
			const _exhaustive: never = mode
			return _exhaustive
		}
	}
}

function buildGate(
	options: SyncCommand,
	asker: Asker | null,
	progress: ProgressDisplay,
): ContinuationGate {
	if (options.yes) return alwaysContinue
	if (!asker) return neverContinue
	return createPromptGate(asker.ask, (requestsIssued) => {
		progress.pause(`${requestsIssued} requests issued`)
	})
}

/** Reconcile the spreadsheet against Lansweeper and append the report. */
export async function runSync(
	ctx: OutputContext,
	options: SyncCommand,
): Promise<ExitCode> {
	let lockPath: string | null = null
	let asker: Asker | null = null
	const controller = new AbortController()
	const progress = new ProgressDisplay(ctx.progressMode)
	const handleSigint = () => {
		syncLogger.warn('Interrupted, finishing the current asset')
		controller.abort(new RunCancelledError('Interrupted'))
	}
	process.once('SIGINT', handleSigint)
	try {
		const dryRun = !options.execute
		syncLogger.info('Sync run started in {mode} mode', {
			mode: dryRun ? 'dry-run' : 'execute',
		})
		const config = await resolveRunConfig({
			spreadsheetPath: options.spreadsheet ?? undefined,
			reportPath: options.report ?? undefined,
			configPath: options.config ?? undefined,
			gateEvery: options.gateEvery ?? undefined,
		})
		if (options.execute) {
			lockPath = await acquireLock(config.spreadsheetPath)
		}

		const sheet = await loadSheet(
			config.spreadsheetPath,
			requiredColumns(config.identityColumn, config.fields),
		)

		const client = new LansweeperClient({
			siteId: config.siteId,
			token: config.token,
			fields: config.fields.map((field) => field.remote),
			eventsConfig: ctx.eventsConfig,
		})
		const site = await verifySite(client, config.siteId)
		syncLogger.info('Connected to site {siteName}', {
			siteName: site.name ?? site.id,
		})

		if (isInteractive(ctx) && (options.onConflict === 'prompt' || !options.yes)) {
			asker = createReadlineAsker()
		}
		const ledger = new ChangeLedger()
		const dispatcher = new UpdateDispatcher({
			source: client,
			gate: buildGate(options, asker, progress),
			controller,
			gateEvery: config.gateEvery,
			dryRun,
		})
		const promptResolver = buildFallbackResolver(options.onConflict, asker)
		const engine = new ReconciliationEngine({
			fields: config.fields,
			identityColumn: config.identityColumn,
			dispatcher,
			resolver: createPolicyResolver(config.conflictPolicy, {
				resolve: async (request) => {
					progress.interrupt()
					return await promptResolver.resolve(request)
				},
			}),
			ledger,
			controller,
			onProgress: (current, total, identity) => {
				progress.update(current, total, identity)
			},
		})

		const run = await engine.run(sheet.rows, sheet.rowNumbers)
		progress.finish()

		let cellsWritten = 0
		if (!dryRun && run.localMutations > 0) {
			cellsWritten = await saveSheet(sheet)
		}

		const summary = summarizeRun(ledger, run, dryRun)
		await appendReport(config.reportPath, renderReport(ledger, summary, new Date()))

		writeSuccess(
			ctx,
			{
				command: 'sync',
				spreadsheet: config.spreadsheetPath,
				report: config.reportPath,
				cellsWritten,
				summary,
			},
			[
				`Sync ${dryRun ? 'dry-run' : 'execute'} ${run.cancelled ? 'cancelled' : 'complete'}`,
				`Identities processed: ${summary.identitiesProcessed}`,
				`Requests issued: ${summary.requestsIssued}`,
				`Spreadsheet updates: ${summary.localMutations}${dryRun ? ' (not saved)' : ''}`,
				`Lansweeper updates: ${summary.remoteUpdates}${dryRun ? ' (not sent)' : ''}`,
				`Update failures: ${summary.remoteFailures}`,
				`Not found: ${summary.notFound}, ambiguous: ${summary.ambiguous}`,
				`Report: ${config.reportPath}`,
			],
			`${summary.identitiesProcessed}`,
		)
		emitEvent(ctx.eventsConfig, 'asset-sync-completed', {
			executed: options.execute,
			cancelled: run.cancelled,
			requestsIssued: summary.requestsIssued,
			identitiesProcessed: summary.identitiesProcessed,
		})
		syncLogger.info('Sync run completed in {mode} mode', {
			mode: dryRun ? 'dry-run' : 'execute',
			cancelled: run.cancelled,
			requestsIssued: run.requestsIssued,
		})
		if (run.cancelled) return EXIT_INTERRUPTED
		return EXIT_OK
	} catch (err) {
		progress.finish()
		return handleCommandError(ctx, err)
	} finally {
		process.off('SIGINT', handleSigint)
		asker?.close()
		if (lockPath) {
			await releaseLock(lockPath)
		}
	}
}

/** Preflight failures are fatal: the run never starts without a readable site. */
async function verifySite(
	client: LansweeperClient,
	siteId: string,
): Promise<{ readonly id: string; readonly name: string | null }> {
	try {
		const site = await client.verifySite()
		if (!site) {
			throw new PreconditionError(`Site not found: ${siteId}`, {
				context: { siteId },
			})
		}
		return site
	} catch (err) {
		if (!isRemoteFailure(err)) throw err
		const code = err.code === 'E_UNAUTHORIZED' ? 'E_UNAUTHORIZED' : 'E_PRECONDITION'
		throw new PreconditionError(`Cannot reach Lansweeper site: ${err.message}`, {
			code,
			context: { siteId, cause: err.code },
		})
	}
}
