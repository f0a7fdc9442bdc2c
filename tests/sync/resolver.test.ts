import { describe, expect, it, vi } from 'vitest'
import {
	alwaysSkip,
	type ConflictRequest,
	createFixedResolver,
	createPolicyResolver,
} from '../../src/sync/resolver'

const request = (field: string): ConflictRequest => ({
	identity: 'SN-1',
	field,
	label: field,
	local: 'a',
	remote: 'b',
})

describe('conflict resolvers', () => {
	it('fixed resolver answers the same decision every time', async () => {
		const resolver = createFixedResolver('adopt-remote')
		expect(await resolver.resolve(request('barcode'))).toBe('adopt-remote')
		expect(await resolver.resolve(request('purchaseDate'))).toBe('adopt-remote')
	})

	it('alwaysSkip skips', async () => {
		expect(await alwaysSkip.resolve(request('barcode'))).toBe('skip')
	})

	it('policy table answers listed fields without asking the fallback', async () => {
		const fallback = { resolve: vi.fn(async () => 'abort' as const) }
		const resolver = createPolicyResolver({ barcode: 'adopt-local' }, fallback)

		expect(await resolver.resolve(request('barcode'))).toBe('adopt-local')
		expect(fallback.resolve).not.toHaveBeenCalled()
	})

	it('policy table defers unlisted fields to the fallback', async () => {
		const fallback = { resolve: vi.fn(async () => 'abort' as const) }
		const resolver = createPolicyResolver({ barcode: 'adopt-local' }, fallback)

		expect(await resolver.resolve(request('warrantyDate'))).toBe('abort')
		expect(fallback.resolve).toHaveBeenCalledWith(request('warrantyDate'))
	})

	it('policy table falls back to skip by default', async () => {
		const resolver = createPolicyResolver({})
		expect(await resolver.resolve(request('barcode'))).toBe('skip')
	})
})
