import { afterEach, describe, expect, it } from 'vitest'
import {
	EXIT_INTERRUPTED,
	EXIT_PRECONDITION,
	EXIT_RUNTIME,
	EXIT_UNAUTHORIZED,
	handleCommandError,
	type OutputContext,
	sanitizeErrorMessage,
	writeError,
	writeSuccess,
} from '../../src/cli/output'
import {
	PreconditionError,
	RunCancelledError,
	ServiceRejectedError,
	StructuredError,
	TransportError,
} from '../../src/errors'
import { type Capture, captureOutput } from '../helpers/capture-output'

function context(overrides: Partial<OutputContext> = {}): OutputContext {
	return {
		json: false,
		quiet: true,
		logLevel: 'silent',
		progressMode: 'off',
		eventsConfig: { url: null },
		...overrides,
	}
}

describe('handleCommandError', () => {
	let capture: Capture | null = null

	afterEach(() => {
		capture?.restore()
		capture = null
	})

	it('maps precondition failures to exit 3', () => {
		capture = captureOutput()
		const err = new PreconditionError('Missing required columns: Serial Number')
		expect(handleCommandError(context(), err)).toBe(EXIT_PRECONDITION)
		expect(capture.getStderr()).toBe('Missing required columns: Serial Number\n')
	})

	it('maps rejected credentials to exit 4', () => {
		capture = captureOutput()
		const preflight = new PreconditionError('Cannot reach Lansweeper site', {
			code: 'E_UNAUTHORIZED',
		})
		const transport = new TransportError('Lansweeper API error (401)', {
			code: 'E_UNAUTHORIZED',
			recoverable: false,
			status: 401,
		})
		expect(handleCommandError(context(), preflight)).toBe(EXIT_UNAUTHORIZED)
		expect(handleCommandError(context(), transport)).toBe(EXIT_UNAUTHORIZED)
	})

	it('maps cancellation to exit 130', () => {
		capture = captureOutput()
		expect(handleCommandError(context(), new RunCancelledError('Interrupted'))).toBe(
			EXIT_INTERRUPTED,
		)
	})

	it('maps other structured and plain errors to exit 1', () => {
		capture = captureOutput()
		const transport = new TransportError('Network error', {
			code: 'E_NETWORK',
			recoverable: false,
		})
		const generic = new StructuredError('something broke', {
			code: 'E_RUNTIME',
			category: 'runtime',
			recoverable: false,
		})
		expect(handleCommandError(context(), transport)).toBe(EXIT_RUNTIME)
		expect(handleCommandError(context(), new ServiceRejectedError('EditAsset rejected'))).toBe(
			EXIT_RUNTIME,
		)
		expect(handleCommandError(context(), generic)).toBe(EXIT_RUNTIME)
		expect(handleCommandError(context(), new Error('unexpected'))).toBe(EXIT_RUNTIME)
	})

	it('writes a JSON error envelope with the action hint', () => {
		capture = captureOutput()
		const err = new PreconditionError('Invalid env config: LANSWEEPER_SITE_ID is required', {
			code: 'E_CONFIG',
		})

		handleCommandError(context({ json: true, quiet: false }), err)

		expect(JSON.parse(capture.getStderr())).toEqual({
			status: 'error',
			message: 'Invalid env config: LANSWEEPER_SITE_ID is required',
			error: {
				name: 'PreconditionError',
				code: 'E_CONFIG',
				action: 'FIX_CONFIG',
				retryable: false,
			},
		})
	})
})

describe('writeSuccess', () => {
	let capture: Capture | null = null

	afterEach(() => {
		capture?.restore()
		capture = null
	})

	it('wraps data in a versioned envelope in JSON mode', () => {
		capture = captureOutput()
		writeSuccess(context({ json: true, quiet: false }), { command: 'help' }, ['help text'], 'help')
		expect(capture.getStdout()).toBe(
			'{"status":"data","schemaVersion":1,"data":{"command":"help"}}\n',
		)
		expect(capture.getStderr()).toBe('')
	})

	it('prints the quiet line in quiet mode and the human lines otherwise', () => {
		capture = captureOutput()
		writeSuccess(context(), {}, ['line one', 'line two'], '42')
		writeSuccess(context({ quiet: false }), {}, ['line one', 'line two'], '42')
		expect(capture.getStdout()).toBe('42\nline one\nline two\n')
	})

	it('sends warnings to stderr in human mode', () => {
		capture = captureOutput()
		writeSuccess(context({ quiet: false }), {}, ['done'], 'done', ['report not saved'])
		expect(capture.getStderr()).toBe('Warning: report not saved\n')
	})
})

describe('writeError', () => {
	it('prefixes human errors with the tool name', () => {
		const capture = captureOutput()
		writeError(context({ quiet: false }), 'Site not found: site-1', 'E_PRECONDITION', 'PreconditionError')
		capture.restore()
		expect(capture.getStderr()).toBe('[asset-sync] Site not found: site-1\n')
	})
})

describe('sanitizeErrorMessage', () => {
	it('redacts tokens in headers and env assignments', () => {
		expect(sanitizeErrorMessage('Authorization: Token test-secret rejected')).toBe(
			'Authorization: Token [REDACTED] rejected',
		)
		expect(sanitizeErrorMessage('Bearer abc.def-123 expired')).toBe('Bearer [REDACTED] expired')
		expect(sanitizeErrorMessage('LANSWEEPER_PAT_TOKEN=test-secret is invalid')).toBe(
			'LANSWEEPER_PAT_TOKEN=[REDACTED] is invalid',
		)
	})

	it('leaves ordinary messages alone', () => {
		expect(sanitizeErrorMessage('Missing required columns: Invoice Date')).toBe(
			'Missing required columns: Invoice Date',
		)
	})
})
