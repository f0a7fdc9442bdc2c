import {
	PreconditionError,
	RunCancelledError,
	ServiceRejectedError,
	StructuredError,
	TransportError,
} from '../errors'
import type { EventsConfig } from '../events'

/** Standard exit codes for the CLI process. */
export const EXIT_OK = 0 as const
export const EXIT_RUNTIME = 1 as const
export const EXIT_USAGE = 2 as const
export const EXIT_PRECONDITION = 3 as const
export const EXIT_UNAUTHORIZED = 4 as const
export const EXIT_INTERRUPTED = 130 as const

/** Union of all valid CLI exit codes. */
export type ExitCode = 0 | 1 | 2 | 3 | 4 | 130

/** Schema version embedded in all JSON output envelopes. */
const SCHEMA_VERSION_OUTPUT = 1

export type LogLevel = 'silent' | 'info' | 'debug'
export type ProgressMode = 'animated' | 'static' | 'off'

/** Shared context threaded through every command for output formatting. */
export interface OutputContext {
	readonly json: boolean
	readonly quiet: boolean
	readonly logLevel: LogLevel
	readonly progressMode: ProgressMode
	readonly eventsConfig: EventsConfig
}

/**
 * Machine-readable hint for each error code, emitted as `action` and
 * `retryable` in JSON error output.
 */
export const ERROR_CODE_ACTIONS: Record<
	string,
	{ action: string; retryable: boolean }
> = {
	E_NETWORK: { action: 'CHECK_NETWORK', retryable: false },
	E_TIMEOUT: { action: 'CHECK_NETWORK', retryable: true },
	E_SERVER_ERROR: { action: 'RETRY_WITH_BACKOFF', retryable: true },
	E_RATE_LIMITED: { action: 'WAIT_AND_RETRY', retryable: true },
	E_API_ERROR: { action: 'ESCALATE', retryable: false },
	E_SERVICE_REJECTED: { action: 'INSPECT_AND_RESOLVE', retryable: false },
	E_RUNTIME: { action: 'ESCALATE', retryable: false },
	E_USAGE: { action: 'FIX_ARGS', retryable: false },
	E_CONFIG: { action: 'FIX_CONFIG', retryable: false },
	E_PRECONDITION: { action: 'FIX_INPUT', retryable: false },
	E_UNAUTHORIZED: { action: 'CHECK_TOKEN', retryable: false },
	E_LOCK_CONTENTION: { action: 'WAIT_AND_RETRY', retryable: true },
	E_CANCELLED: { action: 'NONE', retryable: false },
	E_INTERRUPTED: { action: 'NONE', retryable: false },
}

/** Write successful output in JSON or human mode. */
export function writeSuccess<T>(
	ctx: OutputContext,
	data: T,
	humanLines: string[],
	quietLine: string,
	warnings?: readonly string[],
): void {
	const activeWarnings = warnings && warnings.length > 0 ? warnings : undefined
	if (ctx.json) {
		const envelope: Record<string, unknown> = {
			status: 'data',
			schemaVersion: SCHEMA_VERSION_OUTPUT,
			data,
		}
		if (activeWarnings) envelope.warnings = activeWarnings
		process.stdout.write(`${JSON.stringify(envelope)}\n`)
		return
	}
	if (activeWarnings) {
		for (const w of activeWarnings) {
			process.stderr.write(`Warning: ${w}\n`)
		}
	}
	if (ctx.quiet) {
		process.stdout.write(`${quietLine}\n`)
		return
	}
	process.stdout.write(`${humanLines.join('\n')}\n`)
}

/** Write structured errors to stderr (JSON in machine mode). */
export function writeError(
	ctx: OutputContext,
	message: string,
	errorCode: string,
	errorName: string,
	context?: Record<string, unknown>,
): void {
	const sanitized = sanitizeErrorMessage(message)
	if (ctx.json) {
		const fallback = { action: 'ESCALATE', retryable: false }
		const action = ERROR_CODE_ACTIONS[errorCode] ?? fallback
		const errorPayload: Record<string, unknown> = {
			name: errorName,
			code: errorCode,
			action: action.action,
			retryable: action.retryable,
		}
		if (context) errorPayload.context = context
		process.stderr.write(
			`${JSON.stringify({
				status: 'error',
				message: sanitized,
				error: errorPayload,
			})}\n`,
		)
		return
	}
	const line = ctx.quiet ? sanitized : `[asset-sync] ${sanitized}`
	process.stderr.write(`${line}\n`)
}

/** Redact API tokens before a message reaches stdout, stderr or the report. */
export function sanitizeErrorMessage(message: string): string {
	return message
		.replace(/Bearer\s+[A-Za-z0-9._-]+/gi, 'Bearer [REDACTED]')
		.replace(/Token\s+[A-Za-z0-9._-]+/g, 'Token [REDACTED]')
		.replace(/LANSWEEPER_PAT_TOKEN=[^&\s]+/g, 'LANSWEEPER_PAT_TOKEN=[REDACTED]')
}

/**
 * Standardized error catch handler for command functions.
 * Maps structured errors to exit codes and writes consistent error
 * metadata.
 */
export function handleCommandError(ctx: OutputContext, err: unknown): ExitCode {
	if (err instanceof PreconditionError) {
		writeError(ctx, err.message, err.code, err.name, err.context)
		return err.code === 'E_UNAUTHORIZED' ? EXIT_UNAUTHORIZED : EXIT_PRECONDITION
	}
	if (err instanceof RunCancelledError) {
		writeError(ctx, err.message, err.code, err.name, err.context)
		return EXIT_INTERRUPTED
	}
	if (err instanceof TransportError) {
		writeError(ctx, err.message, err.code, err.name, err.context)
		return err.code === 'E_UNAUTHORIZED' ? EXIT_UNAUTHORIZED : EXIT_RUNTIME
	}
	if (err instanceof ServiceRejectedError || err instanceof StructuredError) {
		writeError(ctx, err.message, err.code, err.name, err.context)
		return EXIT_RUNTIME
	}
	writeError(
		ctx,
		err instanceof Error ? err.message : String(err),
		'E_RUNTIME',
		'RuntimeError',
	)
	return EXIT_RUNTIME
}
