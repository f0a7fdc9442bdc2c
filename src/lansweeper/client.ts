import { z } from 'zod'
import { ServiceRejectedError } from '../errors'
import type { EventsConfig } from '../events'
import { getSyncLogger } from '../logging'
import type { AssetRecord, AssetSource, StagedUpdate } from '../sync/dispatcher'
import { type GraphqlRequestOptions, graphqlRequest } from './api'

/** Lookups ask for two items: enough to tell "one" from "many". */
const LOOKUP_LIMIT = 2

const clientLogger = getSyncLogger(['lansweeper', 'client'])

export interface LansweeperSettings {
	readonly siteId: string
	readonly token: string
	/** `assetCustom` field names to fetch with every lookup. */
	readonly fields: readonly string[]
	readonly timeoutMs?: number
	readonly eventsConfig?: EventsConfig
}

export interface SiteInfo {
	readonly id: string
	readonly name: string | null
}

const SITE_QUERY = `
query SiteInfo($siteId: ID!) {
	site(id: $siteId) {
		id
		name
	}
}`

const FIND_ASSETS_QUERY = `
query FindAssetsBySerial($siteId: ID!, $serialNumber: String!, $fields: [String!]!) {
	site(id: $siteId) {
		assetResources(
			assetPagination: { limit: ${LOOKUP_LIMIT} }
			filters: {
				conditions: [{
					path: "assetCustom.serialNumber"
					operator: EQUAL
					value: $serialNumber
				}]
			}
			fields: $fields
		) {
			total
			items
		}
	}
}`

const EDIT_ASSET_MUTATION = `
mutation EditAsset($siteId: ID!, $key: ID!, $customFields: AssetCustomInput!) {
	site(id: $siteId) {
		editAsset(key: $key, fields: { assetCustom: $customFields }) {
			key
		}
	}
}`

const SiteResponseSchema = z.object({
	site: z
		.object({
			id: z.string(),
			name: z.string().nullish(),
		})
		.nullable(),
})

const AssetItemSchema = z
	.object({
		key: z.string().min(1),
		assetBasicInfo: z
			.object({ name: z.string().nullish() })
			.passthrough()
			.nullish(),
		assetCustom: z.record(z.unknown()).nullish(),
	})
	.passthrough()

const FindAssetsResponseSchema = z.object({
	site: z.object({
		assetResources: z.object({
			total: z.number().int().nonnegative(),
			items: z.array(AssetItemSchema),
		}),
	}),
})

const EditAssetResponseSchema = z.object({
	site: z.object({
		editAsset: z.object({ key: z.string() }).nullable(),
	}),
})

/** Dates travel as `{ value: <UTC timestamp> }`, text as plain strings. */
export function buildCustomFields(
	updates: ReadonlyMap<string, StagedUpdate>,
): Record<string, unknown> {
	const customFields: Record<string, unknown> = {}
	for (const [name, update] of updates) {
		customFields[name] =
			update.kind === 'date' ? { value: update.value } : update.value
	}
	return customFields
}

/** Lansweeper GraphQL API as an AssetSource. */
export class LansweeperClient implements AssetSource {
	private readonly settings: LansweeperSettings

	constructor(settings: LansweeperSettings) {
		this.settings = settings
	}

	private get requestOptions(): GraphqlRequestOptions {
		return {
			token: this.settings.token,
			timeoutMs: this.settings.timeoutMs,
			eventsConfig: this.settings.eventsConfig,
		}
	}

	/** Preflight: confirm the token can read the configured site. */
	async verifySite(): Promise<SiteInfo | null> {
		const response = await graphqlRequest(
			SITE_QUERY,
			{ siteId: this.settings.siteId },
			SiteResponseSchema,
			this.requestOptions,
		)
		if (!response.site) return null
		return { id: response.site.id, name: response.site.name ?? null }
	}

	async findBySerial(serial: string): Promise<AssetRecord[]> {
		const response = await graphqlRequest(
			FIND_ASSETS_QUERY,
			{
				siteId: this.settings.siteId,
				serialNumber: serial,
				fields: [
					'key',
					'assetBasicInfo.name',
					...this.settings.fields.map((field) => `assetCustom.${field}`),
				],
			},
			FindAssetsResponseSchema,
			this.requestOptions,
		)
		const { total, items } = response.site.assetResources
		clientLogger.debug('Lookup {serial}: {total} match(es)', { serial, total })
		return items.map((item) => ({
			key: item.key,
			name: item.assetBasicInfo?.name ?? null,
			values: item.assetCustom ?? {},
		}))
	}

	async editAsset(
		key: string,
		updates: ReadonlyMap<string, StagedUpdate>,
	): Promise<void> {
		const response = await graphqlRequest(
			EDIT_ASSET_MUTATION,
			{
				siteId: this.settings.siteId,
				key,
				customFields: buildCustomFields(updates),
			},
			EditAssetResponseSchema,
			this.requestOptions,
		)
		if (!response.site.editAsset) {
			throw new ServiceRejectedError(`editAsset returned no asset for ${key}`, {
				context: { key },
			})
		}
	}
}
