type ErrorCategory =
	| 'precondition'
	| 'transport'
	| 'service'
	| 'cancelled'
	| 'runtime'

interface StructuredErrorOptions {
	readonly code: string
	readonly category: ErrorCategory
	readonly recoverable: boolean
	readonly context?: Record<string, unknown>
}

/** Base structured error for asset-sync (machine-readable fields). */
export class StructuredError extends Error {
	readonly code: string
	readonly category: ErrorCategory
	readonly recoverable: boolean
	readonly context?: Record<string, unknown>

	constructor(message: string, options: StructuredErrorOptions) {
		super(message)
		this.name = 'StructuredError'
		this.code = options.code
		this.category = options.category
		this.recoverable = options.recoverable
		this.context = options.context
	}
}

/**
 * A run cannot start: missing columns, missing or invalid configuration,
 * rejected credentials. Always fatal, raised before any row is processed.
 */
export class PreconditionError extends StructuredError {
	constructor(
		message: string,
		options?: {
			readonly code?: string
			readonly context?: Record<string, unknown>
		},
	) {
		super(message, {
			code: options?.code ?? 'E_PRECONDITION',
			category: 'precondition',
			recoverable: false,
			context: options?.context,
		})
		this.name = 'PreconditionError'
	}
}

/** A remote call could not complete (HTTP failure, network, timeout). */
export class TransportError extends StructuredError {
	readonly status?: number

	constructor(
		message: string,
		options: Omit<StructuredErrorOptions, 'category'> & { status?: number },
	) {
		super(message, {
			code: options.code,
			category: 'transport',
			recoverable: options.recoverable,
			context: options.context,
		})
		this.name = 'TransportError'
		this.status = options.status
	}
}

/** The remote call completed but the service reported an application error. */
export class ServiceRejectedError extends StructuredError {
	constructor(
		message: string,
		options?: {
			readonly recoverable?: boolean
			readonly context?: Record<string, unknown>
		},
	) {
		super(message, {
			code: 'E_SERVICE_REJECTED',
			category: 'service',
			recoverable: options?.recoverable ?? false,
			context: options?.context,
		})
		this.name = 'ServiceRejectedError'
	}
}

/** Raised when a pending remote call is refused because the run was cancelled. */
export class RunCancelledError extends StructuredError {
	constructor(message: string, options?: { context?: Record<string, unknown> }) {
		super(message, {
			code: 'E_CANCELLED',
			category: 'cancelled',
			recoverable: false,
			context: options?.context,
		})
		this.name = 'RunCancelledError'
	}
}

/** Errors that stay local to one identity: recorded, then the run moves on. */
export function isRemoteFailure(
	err: unknown,
): err is TransportError | ServiceRejectedError {
	return err instanceof TransportError || err instanceof ServiceRejectedError
}
