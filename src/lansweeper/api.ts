import { z } from 'zod'
import { ServiceRejectedError, TransportError } from '../errors'
import { type EventsConfig, emitEvent } from '../events'
import { getLogContext, getSyncLogger } from '../logging'

const DEFAULT_API_URL = 'https://api.lansweeper.com/api/v2/graphql'
const DEFAULT_TIMEOUT_MS = 30_000

export interface GraphqlRequestOptions {
	readonly token: string
	readonly timeoutMs?: number
	readonly eventsConfig?: EventsConfig
}

const apiLogger = getSyncLogger(['lansweeper', 'api'])

const GraphqlEnvelopeSchema = z.object({
	data: z.unknown().optional(),
	errors: z
		.array(
			z
				.object({
					message: z.string(),
				})
				.passthrough(),
		)
		.optional(),
})

function resolveApiUrl(): string {
	return process.env.LANSWEEPER_API_URL ?? DEFAULT_API_URL
}

function operationName(document: string): string {
	const match = /\b(?:query|mutation)\s+(\w+)/.exec(document)
	return match?.[1] ?? 'anonymous'
}

function mapHttpError(status: number, message: string): TransportError {
	if (status === 401 || status === 403) {
		return new TransportError(message, {
			code: 'E_UNAUTHORIZED',
			recoverable: false,
			status,
		})
	}
	if (status === 429) {
		return new TransportError(message, {
			code: 'E_RATE_LIMITED',
			recoverable: true,
			status,
		})
	}
	if (status >= 500) {
		return new TransportError(message, {
			code: 'E_SERVER_ERROR',
			recoverable: true,
			status,
		})
	}
	return new TransportError(message, {
		code: 'E_API_ERROR',
		recoverable: false,
		status,
	})
}

/**
 * Send one GraphQL operation to Lansweeper and validate its `data`.
 *
 * Exactly one HTTP call per invocation: failures surface as TransportError
 * (no usable response) or ServiceRejectedError (GraphQL `errors`, or a
 * payload that does not match the schema). Nothing is retried here.
 */
export async function graphqlRequest<T>(
	document: string,
	variables: Record<string, unknown>,
	schema: z.ZodType<T, z.ZodTypeDef, unknown>,
	options: GraphqlRequestOptions,
): Promise<T> {
	const url = resolveApiUrl()
	const operation = operationName(document)
	const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS
	const eventsConfig = options.eventsConfig ?? { url: null }
	const controller = new AbortController()
	const timeout = setTimeout(() => controller.abort(), timeoutMs)

	try {
		apiLogger.debug('Request {operation} {url}', {
			operation,
			url,
			...getLogContext(),
		})
		emitEvent(eventsConfig, 'lansweeper-request-started', { operation })

		const response = await fetch(url, {
			method: 'POST',
			signal: controller.signal,
			headers: {
				Accept: 'application/json',
				'Content-Type': 'application/json',
				Authorization: `Token ${options.token}`,
			},
			body: JSON.stringify({ query: document, variables }),
		})

		if (!response.ok) {
			const payload = await response.text().catch(() => '')
			const message = payload
				? `Lansweeper API error (${response.status}): ${payload}`
				: `Lansweeper API error (${response.status})`
			throw mapHttpError(response.status, message)
		}

		const body: unknown = await response.json().catch(() => null)
		const envelope = GraphqlEnvelopeSchema.safeParse(body)
		if (!envelope.success) {
			throw new ServiceRejectedError(`Malformed ${operation} response`, {
				context: { operation },
			})
		}
		const errors = envelope.data.errors ?? []
		if (errors.length > 0) {
			throw new ServiceRejectedError(
				`${operation} rejected: ${errors.map((error) => error.message).join('; ')}`,
				{ context: { operation } },
			)
		}
		const parsed = schema.safeParse(envelope.data.data)
		if (!parsed.success) {
			const issues = parsed.error.issues
				.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
				.join('; ')
			throw new ServiceRejectedError(
				`Unexpected ${operation} response: ${issues}`,
				{ context: { operation } },
			)
		}

		emitEvent(eventsConfig, 'lansweeper-request-completed', {
			operation,
			status: response.status,
		})
		return parsed.data
	} catch (err) {
		if (err instanceof TransportError || err instanceof ServiceRejectedError) {
			emitEvent(eventsConfig, 'lansweeper-request-error', {
				operation,
				message: err.message,
				code: err.code,
			})
			throw err
		}
		if (err instanceof Error && err.name === 'AbortError') {
			emitEvent(eventsConfig, 'lansweeper-request-error', {
				operation,
				message: 'Request timed out',
				code: 'E_TIMEOUT',
			})
			throw new TransportError('Request timed out', {
				code: 'E_TIMEOUT',
				recoverable: true,
				context: { operation, timeoutMs },
			})
		}
		emitEvent(eventsConfig, 'lansweeper-request-error', {
			operation,
			message: 'Network error',
			code: 'E_NETWORK',
		})
		throw new TransportError('Network error', {
			code: 'E_NETWORK',
			recoverable: true,
			context: {
				operation,
				cause: err instanceof Error ? err.message : String(err),
			},
		})
	} finally {
		clearTimeout(timeout)
	}
}
