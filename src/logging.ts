import { AsyncLocalStorage } from 'node:async_hooks'
import { createWriteStream } from 'node:fs'
import { Writable } from 'node:stream'
import {
	configure,
	dispose,
	fingersCrossed,
	getConsoleSink,
	getLogger,
	getStreamSink,
	jsonLinesFormatter,
	type LogLevel as SinkLevel,
	type Sink,
	withFilter,
} from '@logtape/logtape'

type LogLevel = 'silent' | 'info' | 'debug'

interface LogContext {
	readonly runId: string
}

interface LoggingOptions {
	readonly json: boolean
	readonly quiet: boolean
	readonly logLevel: LogLevel
	readonly logFile?: string | null
}

let loggingConfigured = false
const logContext = new AsyncLocalStorage<LogContext>()

function resolveLogLevel(level: LogLevel): SinkLevel {
	if (level === 'debug') return 'debug'
	if (level === 'info') return 'info'
	return 'warning'
}

/** The audit file keeps info and above, and follows --debug down. */
function resolveFileLevel(level: LogLevel): SinkLevel {
	return level === 'debug' ? 'debug' : 'info'
}

const LEVEL_ORDER: readonly SinkLevel[] = [
	'trace',
	'debug',
	'info',
	'warning',
	'error',
	'fatal',
]

function mostVerbose(levels: readonly SinkLevel[]): SinkLevel {
	return levels.reduce((lowest, level) =>
		LEVEL_ORDER.indexOf(level) < LEVEL_ORDER.indexOf(lowest) ? level : lowest,
	)
}

function shouldUseJsonLogs(options: LoggingOptions): boolean {
	if (process.env.ASSET_SYNC_LOG_FORMAT === 'text') return false
	if (process.env.ASSET_SYNC_LOG_FORMAT === 'json') return true
	if (options.json) return true
	return !process.stderr.isTTY
}

function shouldUseFingersCrossed(options: LoggingOptions): boolean {
	return (
		process.env.ASSET_SYNC_LOG_FORMAT !== 'json' &&
		!options.json &&
		!options.quiet &&
		options.logLevel === 'silent'
	)
}

/** withFilter drops the disposer; keep it so dispose() still closes the file. */
function filterDisposable(
	sink: Sink & AsyncDisposable,
	level: SinkLevel,
): Sink & AsyncDisposable {
	return Object.assign(withFilter(sink, level), {
		[Symbol.asyncDispose]: () => sink[Symbol.asyncDispose](),
	})
}

/** Configure LogTape logging for the CLI. */
export function setupLogging(options: LoggingOptions): void {
	if (loggingConfigured) return
	const jsonLogs = shouldUseJsonLogs(options)
	const baseSink = jsonLogs
		? getStreamSink(Writable.toWeb(process.stderr), {
				formatter: jsonLinesFormatter,
			})
		: getConsoleSink()
	const sink = shouldUseFingersCrossed(options)
		? fingersCrossed(baseSink, {
				triggerLevel: 'error',
				maxBufferSize: 500,
			})
		: baseSink

	// Each sink filters to its own level; the category admits the lowest of them.
	const consoleLevel = resolveLogLevel(options.logLevel)
	const sinks: Record<string, Sink> = { stderr: withFilter(sink, consoleLevel) }
	const runSinks = ['stderr']
	const runLevels = [consoleLevel]
	if (options.logFile) {
		const fileLevel = resolveFileLevel(options.logLevel)
		const fileStream = Writable.toWeb(
			createWriteStream(options.logFile, { flags: 'a', mode: 0o600 }),
		)
		sinks.file = filterDisposable(
			getStreamSink(fileStream, { formatter: jsonLinesFormatter }),
			fileLevel,
		)
		runSinks.push('file')
		runLevels.push(fileLevel)
	}

	configure({
		reset: true,
		contextLocalStorage: logContext as unknown as AsyncLocalStorage<
			Record<string, unknown>
		>,
		sinks,
		loggers: [
			{
				category: ['logtape', 'meta'],
				sinks: ['stderr'],
				lowestLevel: 'warning',
			},
			{
				category: ['asset-sync'],
				sinks: runSinks,
				lowestLevel: mostVerbose(runLevels),
			},
		],
	}).catch((err: unknown) => {
		console.error('[asset-sync] Failed to configure logging:', err)
	})

	loggingConfigured = true
}

/** Shut down logging safely (idempotent). Flushes sinks with a timeout. */
export async function shutdownLogging(): Promise<void> {
	if (!loggingConfigured) return
	loggingConfigured = false
	const timeoutMs = 500
	await Promise.race([
		dispose(),
		new Promise<void>((resolve) => setTimeout(resolve, timeoutMs)),
	])
}

/** Get a namespaced logger under the asset-sync root category. */
export function getSyncLogger(
	category: string[],
): ReturnType<typeof getLogger> {
	return getLogger(['asset-sync', ...category])
}

/** Run a function with a scoped logging context. */
export async function withContext<T>(
	context: LogContext,
	fn: () => Promise<T> | T,
): Promise<T> {
	return await logContext.run(context, async () => await fn())
}

/** Read the current logging context (if any). */
export function getLogContext(): LogContext | null {
	return logContext.getStore() ?? null
}
