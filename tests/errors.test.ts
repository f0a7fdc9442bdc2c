import { describe, expect, it } from 'vitest'
import {
	isRemoteFailure,
	PreconditionError,
	RunCancelledError,
	ServiceRejectedError,
	TransportError,
} from '../src/errors'

describe('structured errors', () => {
	it('fills in the precondition code when only context is given', () => {
		const error = new PreconditionError('Missing column', { context: { path: 'a.xlsx' } })

		expect(error).toMatchObject({
			name: 'PreconditionError',
			code: 'E_PRECONDITION',
			category: 'precondition',
			recoverable: false,
			context: { path: 'a.xlsx' },
		})
	})

	it('keeps a precondition code the caller chose', () => {
		const error = new PreconditionError('Token rejected', { code: 'E_UNAUTHORIZED' })

		expect(error.code).toBe('E_UNAUTHORIZED')
		expect(error.context).toBeUndefined()
	})

	it('defaults a service rejection to non-recoverable', () => {
		const error = new ServiceRejectedError('Field is read-only', {
			context: { operation: 'EditAsset' },
		})

		expect(error).toMatchObject({
			name: 'ServiceRejectedError',
			code: 'E_SERVICE_REJECTED',
			category: 'service',
			recoverable: false,
			context: { operation: 'EditAsset' },
		})
		expect(new ServiceRejectedError('Busy', { recoverable: true }).recoverable).toBe(true)
		expect(new ServiceRejectedError('Plain').context).toBeUndefined()
	})

	it('treats only transport and service failures as remote failures', () => {
		const transport = new TransportError('HTTP 502', {
			code: 'E_HTTP',
			recoverable: true,
			status: 502,
		})

		expect(isRemoteFailure(transport)).toBe(true)
		expect(isRemoteFailure(new ServiceRejectedError('Rejected'))).toBe(true)
		expect(isRemoteFailure(new PreconditionError('Missing column'))).toBe(false)
		expect(isRemoteFailure(new RunCancelledError('Cancelled'))).toBe(false)
		expect(isRemoteFailure(new Error('boom'))).toBe(false)
	})
})
