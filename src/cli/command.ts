import { randomUUID } from 'node:crypto'
import { emitEvent, resolveEventsConfig } from '../events'
import {
	getSyncLogger,
	setupLogging,
	shutdownLogging,
	withContext,
} from '../logging'
import { VERSION } from '../version'
import { type ConflictMode, runSync, type SyncCommand } from './commands/sync'
import type { ExitCode, LogLevel, OutputContext, ProgressMode } from './output'
import {
	EXIT_INTERRUPTED,
	EXIT_OK,
	EXIT_RUNTIME,
	EXIT_USAGE,
	sanitizeErrorMessage,
	writeError,
	writeSuccess,
} from './output'

/** Logger for CLI arg parsing, command dispatch, and output formatting. */
const cliLogger = getSyncLogger(['cli'])

const CONFLICT_MODES: readonly ConflictMode[] = ['prompt', 'skip', 'local', 'remote']

const VALUE_FLAGS = [
	'--spreadsheet',
	'--report',
	'--config',
	'--gate-every',
	'--on-conflict',
	'--log-file',
	'--events-url',
] as const

type ValueFlag = (typeof VALUE_FLAGS)[number]

interface HelpCommand {
	readonly command: 'help'
	readonly topic: string | null
}

type CliOptions = OutputContext & (SyncCommand | HelpCommand) & {
	readonly logFile: string | null
}

interface ParseCliError {
	readonly ok: false
	readonly exitCode: ExitCode
	readonly message: string
	readonly output: string
	readonly errorCode: string
	readonly context?: Record<string, unknown>
	readonly json: boolean
	readonly quiet: boolean
}

interface ParseCliOk {
	readonly ok: true
	readonly options: CliOptions
}

type ParseCliResult = ParseCliError | ParseCliOk

/**
 * Result of attempting to parse a value-taking flag (e.g. --flag value or --flag=value).
 * Returns null when the token does not match the flag name at all.
 */
type ValueFlagResult =
	| null
	| { readonly value: string; readonly nextIndex: number }
	| ParseCliError

/**
 * Parse a value-taking flag that supports both `--flag value` and `--flag=value` forms.
 * Returns null if the token does not match the flag, a ParseCliError if the value is
 * missing, or the parsed value and next loop index on success.
 */
function parseValueFlag(
	token: string,
	args: readonly string[],
	index: number,
	flag: string,
	json: boolean,
	quiet: boolean,
): ValueFlagResult {
	if (token === flag) {
		const value = args[index + 1]
		if (!value || value.startsWith('--')) {
			return parseUsageError(`Missing value for ${flag}`, json, quiet)
		}
		return { value, nextIndex: index + 1 }
	}
	const prefix = `${flag}=`
	if (token.startsWith(prefix)) {
		const value = token.slice(prefix.length)
		if (!value) {
			return parseUsageError(`Missing value for ${flag}`, json, quiet)
		}
		return { value, nextIndex: index }
	}
	return null
}

function isConflictMode(value: string): value is ConflictMode {
	return CONFLICT_MODES.some((mode) => mode === value)
}

/** Parse argv into structured command options.
 *  Returns a discriminated union instead of throwing to preserve output mode. */
export function parseCli(argv: readonly string[]): ParseCliResult {
	const args = argv.slice(2)
	const preFlags = new Set(args)
	let commandToken: string | null = null
	let json = preFlags.has('--json')
	let quiet = preFlags.has('--quiet')
	let verbose = false
	let debug = false
	let help = false
	let version = false
	let topic: string | null = null
	let execute = false
	let yes = false
	const values = new Map<ValueFlag, string>()

	for (let i = 0; i < args.length; i += 1) {
		const token = args[i]
		if (!token) continue
		if (token === '--json') {
			json = true
			continue
		}
		if (token === '--quiet') {
			quiet = true
			continue
		}
		if (token === '--verbose') {
			verbose = true
			continue
		}
		if (token === '--debug') {
			debug = true
			continue
		}
		if (token === '--execute') {
			execute = true
			continue
		}
		if (token === '--dry-run') {
			execute = false
			continue
		}
		if (token === '--yes' || token === '-y') {
			yes = true
			continue
		}
		if (token === '--version') {
			version = true
			continue
		}
		// -- Value-taking flags (--flag value / --flag=value) --
		let valueFlagMatched = false
		for (const flag of VALUE_FLAGS) {
			const result = parseValueFlag(token, args, i, flag, json, quiet)
			if (result === null) continue
			if ('ok' in result) return result // ParseCliError
			values.set(flag, result.value)
			i = result.nextIndex
			valueFlagMatched = true
			break
		}
		if (valueFlagMatched) continue

		if (token === '--help' || token === '-h') {
			help = true
			continue
		}
		if (token.startsWith('-')) {
			return parseUsageError(`Unknown option: ${token}`, json, quiet)
		}
		if (!commandToken) {
			commandToken = token
			continue
		}
		if (!topic) {
			topic = token
			continue
		}
		return parseUsageError(`Unexpected extra argument: ${token}`, json, quiet)
	}

	if (version) {
		commandToken = 'help'
		topic = 'version'
	}
	if (!commandToken || help) {
		topic = help && commandToken && commandToken !== 'help' ? commandToken : topic
		commandToken = 'help'
	}
	if (commandToken === 'run') commandToken = 'sync'

	const logFile = values.get('--log-file') ?? null
	const outputMode = resolveOutputMode({
		json,
		quiet,
		verbose,
		debug,
		eventsUrl: values.get('--events-url') ?? null,
	})

	if (commandToken === 'sync') {
		if (topic) {
			return parseUsageError(`Unexpected extra argument: ${topic}`, json, quiet)
		}
		const gateEveryRaw = values.get('--gate-every')
		const onConflictRaw = values.get('--on-conflict')
		let gateEvery: number | null = null
		if (gateEveryRaw !== undefined) {
			gateEvery = Number(gateEveryRaw)
			if (!Number.isInteger(gateEvery) || gateEvery <= 0) {
				return parseUsageError('Invalid --gate-every value', json, quiet, {
					value: gateEveryRaw,
				})
			}
		}
		let onConflict: ConflictMode = 'prompt'
		if (onConflictRaw !== undefined) {
			if (!isConflictMode(onConflictRaw)) {
				return parseUsageError('Invalid --on-conflict value', json, quiet, {
					value: onConflictRaw,
					validValues: CONFLICT_MODES,
				})
			}
			onConflict = onConflictRaw
		}
		return {
			ok: true,
			options: {
				command: 'sync',
				...outputMode,
				logFile,
				execute,
				spreadsheet: values.get('--spreadsheet') ?? null,
				report: values.get('--report') ?? null,
				config: values.get('--config') ?? null,
				gateEvery,
				onConflict,
				yes,
			},
		}
	}
	if (commandToken === 'help') {
		return {
			ok: true,
			options: { command: 'help', ...outputMode, logFile, topic },
		}
	}

	return parseUsageError(`Unknown command: ${commandToken}`, json, quiet)
}

function parseUsageError(
	message: string,
	json: boolean,
	quiet: boolean,
	context?: Record<string, unknown>,
): ParseCliError {
	return {
		ok: false,
		exitCode: EXIT_USAGE,
		message,
		output: usageText(),
		errorCode: 'E_USAGE',
		context,
		json,
		quiet,
	}
}

function resolveOutputMode(flags: {
	readonly json: boolean
	readonly quiet: boolean
	readonly verbose: boolean
	readonly debug: boolean
	readonly eventsUrl: string | null
}): OutputContext {
	let json = flags.json
	if (!json && !process.stdout.isTTY) {
		json = true
	}

	const logLevel: LogLevel = flags.debug
		? 'debug'
		: flags.quiet
			? 'silent'
			: flags.verbose
				? 'info'
				: 'silent'

	const progressMode: ProgressMode =
		json || flags.quiet
			? 'off'
			: process.stderr.isTTY
				? flags.verbose || flags.debug
					? 'static'
					: 'animated'
				: 'static'

	return {
		json,
		quiet: flags.quiet,
		logLevel,
		progressMode,
		eventsConfig: resolveEventsConfig({ eventsUrl: flags.eventsUrl }),
	}
}

function usageText(): string {
	return [
		'asset-sync',
		'',
		'Usage:',
		'  asset-sync <command> [flags]',
		'',
		'Commands:',
		'  sync           Reconcile the spreadsheet with Lansweeper (alias: run)',
		'  help           Show help',
		'',
		'Sync Flags:',
		'  --execute            Send updates and save the spreadsheet',
		'  --dry-run            Compare and report only (default)',
		'  --spreadsheet <path> Spreadsheet to reconcile (default assets.xlsx)',
		'  --report <path>      Report file to append to (default discrepancies.txt)',
		'  --config <path>      JSON config file (default asset-sync.config.json)',
		'  --gate-every <n>     Ask to continue every n requests (default 150)',
		'  --on-conflict <mode> prompt | skip | local | remote (default prompt)',
		'  --yes, -y            Continue past every gate without asking',
		'',
		'Global Flags:',
		'  --json         JSON output',
		'  --quiet        Minimal output',
		'  --verbose      Info logs on stderr',
		'  --debug        Debug logs on stderr (implies verbose)',
		'  --log-file     Append JSON-lines logs to a file',
		'  --events-url   Observability server URL',
		'  --help         Show help',
		'  --version      Show version',
		'',
		'Environment:',
		'  LANSWEEPER_SITE_ID, LANSWEEPER_PAT_TOKEN (required)',
		'  SPREADSHEET_PATH, DISCREPANCIES_FILE, ASSET_SYNC_GATE_EVERY',
	].join('\n')
}

/** Option values safe for structured log properties. */
function sanitizeCliOptions(options: CliOptions): Record<string, unknown> {
	const { eventsConfig: _eventsConfig, ...rest } = options
	return { ...rest }
}

/** Derive the output mode label for events: json > quiet > human. */
function resolveMode(ctx: OutputContext): 'json' | 'quiet' | 'human' {
	if (ctx.json) return 'json'
	if (ctx.quiet) return 'quiet'
	return 'human'
}

/** Run the CLI and return an exit code for process exit. */
export async function runCli(argv: readonly string[]): Promise<ExitCode> {
	const parsed = parseCli(argv)
	if (!parsed.ok) {
		const ctx: OutputContext = {
			json: parsed.json,
			quiet: parsed.quiet,
			logLevel: 'silent',
			progressMode: parsed.json || parsed.quiet ? 'off' : 'static',
			eventsConfig: resolveEventsConfig(),
		}
		writeError(
			ctx,
			parsed.message,
			parsed.errorCode,
			'UsageError',
			parsed.context,
		)
		if (!ctx.json && !ctx.quiet) {
			process.stderr.write(`${parsed.output}\n`)
		}
		return parsed.exitCode
	}

	const options = parsed.options
	const ctx: OutputContext = {
		json: options.json,
		quiet: options.quiet,
		logLevel: options.logLevel,
		progressMode: options.progressMode,
		eventsConfig: options.eventsConfig,
	}

	return await withContext({ runId: randomUUID() }, async () => {
		const startTime = Date.now()
		const mode = resolveMode(ctx)
		try {
			setupLogging({ ...ctx, logFile: options.logFile })
			cliLogger.info('CLI started: {command}', {
				command: options.command,
			})
			emitEvent(ctx.eventsConfig, 'asset-sync-started', {
				command: options.command,
				mode,
			})
			cliLogger.debug('Parsed options: {options}', {
				options: sanitizeCliOptions(options),
			})
			let exitCode: ExitCode
			switch (options.command) {
				case 'sync':
					exitCode = await runSync(ctx, options)
					break
				case 'help': {
					if (options.topic === 'version') {
						writeSuccess(
							ctx,
							{ command: 'version', version: VERSION },
							[`asset-sync v${VERSION}`],
							VERSION,
						)
						exitCode = EXIT_OK
						break
					}
					writeSuccess(
						ctx,
						{ command: 'help', topic: options.topic },
						[usageText()],
						'asset-sync help',
					)
					exitCode = EXIT_OK
					break
				}
				default: {
					const _exhaustive: never = options
					return _exhaustive
				}
			}
			const durationMs = Date.now() - startTime
			cliLogger.info(
				'CLI completed: {command} exitCode={exitCode} duration={durationMs}ms',
				{
					command: options.command,
					exitCode,
					durationMs,
				},
			)
			emitEvent(ctx.eventsConfig, 'asset-sync-exited', {
				command: options.command,
				exitCode,
				durationMs,
				mode,
			})
			return exitCode
		} catch (err) {
			const durationMs = Date.now() - startTime
			if (err instanceof Error && err.name === 'AbortError') {
				cliLogger.info('CLI interrupted: {command} duration={durationMs}ms', {
					command: options.command,
					durationMs,
				})
				emitEvent(ctx.eventsConfig, 'asset-sync-exited', {
					command: options.command,
					exitCode: EXIT_INTERRUPTED,
					durationMs,
					mode,
				})
				return EXIT_INTERRUPTED
			}
			const rawMessage = err instanceof Error ? err.message : String(err)
			const message = sanitizeErrorMessage(rawMessage)
			cliLogger.error(
				'CLI failed: {command} error={error} duration={durationMs}ms',
				{
					command: options.command,
					error: message,
					durationMs,
				},
			)
			writeError(ctx, message, 'E_RUNTIME', 'RuntimeError')
			emitEvent(ctx.eventsConfig, 'asset-sync-exited', {
				command: options.command,
				exitCode: EXIT_RUNTIME,
				durationMs,
				mode,
			})
			return EXIT_RUNTIME
		} finally {
			await shutdownLogging()
		}
	})
}

/** Execute the CLI and exit with its code. */
export async function main(): Promise<void> {
	const code = await runCli(process.argv)
	process.exit(code)
}
