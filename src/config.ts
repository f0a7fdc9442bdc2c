import { existsSync } from 'node:fs'
import { readFile } from 'node:fs/promises'
import path from 'node:path'
import { z } from 'zod'
import { PreconditionError } from './errors'
import { DEFAULT_GATE_EVERY } from './sync/dispatcher'
import {
	type ComparableField,
	DEFAULT_FIELDS,
	DEFAULT_IDENTITY_COLUMN,
} from './sync/fields'
import type { PolicyDecision } from './sync/resolver'

export const CONFIG_FILENAME = 'asset-sync.config.json'
const DEFAULT_SPREADSHEET = 'assets.xlsx'
const DEFAULT_REPORT = 'discrepancies.txt'

const GateEverySchema = z.coerce
	.number()
	.int('gateEvery must be an integer')
	.positive('gateEvery must be positive')

const EnvSchema = z.object({
	LANSWEEPER_SITE_ID: z
		.string({ required_error: 'LANSWEEPER_SITE_ID is required' })
		.trim()
		.min(1, 'LANSWEEPER_SITE_ID is required'),
	LANSWEEPER_PAT_TOKEN: z
		.string({ required_error: 'LANSWEEPER_PAT_TOKEN is required' })
		.trim()
		.min(1, 'LANSWEEPER_PAT_TOKEN is required'),
	SPREADSHEET_PATH: z.string().min(1).default(DEFAULT_SPREADSHEET),
	DISCREPANCIES_FILE: z.string().min(1).default(DEFAULT_REPORT),
	ASSET_SYNC_GATE_EVERY: GateEverySchema.default(DEFAULT_GATE_EVERY),
})

const PolicyDecisionSchema = z.enum(['adopt-local', 'adopt-remote', 'skip'])

const FieldSchema = z.object({
	name: z
		.string()
		.regex(/^[A-Za-z][A-Za-z0-9_]*$/, 'field name must be an identifier'),
	label: z.string().min(1).optional(),
	column: z.string().trim().min(1),
	remote: z
		.string()
		.regex(/^[A-Za-z][A-Za-z0-9_]*$/, 'remote must be an assetCustom field name'),
	kind: z.enum(['text', 'date']),
	pattern: z.string().min(1).optional(),
})

const ConfigFileSchema = z
	.object({
		identityColumn: z.string().trim().min(1).optional(),
		gateEvery: GateEverySchema.optional(),
		fields: z.array(FieldSchema).min(1, 'fields must not be empty').optional(),
		conflictPolicy: z.record(PolicyDecisionSchema).optional(),
	})
	.strict()

export type ConfigFile = z.infer<typeof ConfigFileSchema>

interface EnvConfig {
	readonly siteId: string
	readonly token: string
	readonly spreadsheetPath: string
	readonly reportPath: string
	readonly gateEvery: number
}

/** Everything a sync run needs, after env, file and flags are merged. */
export interface RunConfig extends EnvConfig {
	readonly identityColumn: string
	readonly fields: readonly ComparableField[]
	readonly conflictPolicy: Readonly<Record<string, PolicyDecision>>
	/** Config file that was applied, if any. */
	readonly configFile: string | null
}

/** Values from command-line flags; these win over env and the config file. */
export interface ConfigOverrides {
	readonly spreadsheetPath?: string
	readonly reportPath?: string
	readonly configPath?: string
	readonly gateEvery?: number
}

function formatIssues(error: z.ZodError): string {
	return error.issues
		.map((issue) => {
			const where = issue.path.join('.')
			if (!where || issue.message.startsWith(where)) return issue.message
			return `${where}: ${issue.message}`
		})
		.join('; ')
}

function configError(message: string, context?: Record<string, unknown>) {
	return new PreconditionError(message, { code: 'E_CONFIG', context })
}

/** Read and validate the environment variables a run depends on. */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
	const result = EnvSchema.safeParse({
		LANSWEEPER_SITE_ID: env.LANSWEEPER_SITE_ID,
		LANSWEEPER_PAT_TOKEN: env.LANSWEEPER_PAT_TOKEN,
		SPREADSHEET_PATH: env.SPREADSHEET_PATH || undefined,
		DISCREPANCIES_FILE: env.DISCREPANCIES_FILE || undefined,
		ASSET_SYNC_GATE_EVERY: env.ASSET_SYNC_GATE_EVERY || undefined,
	})
	if (!result.success) {
		throw configError(`Invalid env config: ${formatIssues(result.error)}`)
	}
	return {
		siteId: result.data.LANSWEEPER_SITE_ID,
		token: result.data.LANSWEEPER_PAT_TOKEN,
		spreadsheetPath: result.data.SPREADSHEET_PATH,
		reportPath: result.data.DISCREPANCIES_FILE,
		gateEvery: result.data.ASSET_SYNC_GATE_EVERY,
	}
}

/**
 * Load the optional JSON config file. An explicit path must exist; the
 * default file in the working directory may be absent.
 */
export async function loadConfigFile(
	explicitPath?: string,
): Promise<{ readonly path: string; readonly config: ConfigFile } | null> {
	const configPath = explicitPath ?? path.join(process.cwd(), CONFIG_FILENAME)
	if (!existsSync(configPath)) {
		if (explicitPath) {
			throw configError(`Config file not found: ${explicitPath}`, {
				path: explicitPath,
			})
		}
		return null
	}

	const raw = await readFile(configPath, 'utf8')
	let json: unknown
	try {
		json = JSON.parse(raw)
	} catch (err) {
		throw configError(
			`Config file is not valid JSON: ${configPath} (${err instanceof Error ? err.message : String(err)})`,
			{ path: configPath },
		)
	}
	const parsed = ConfigFileSchema.safeParse(json)
	if (!parsed.success) {
		throw configError(`Invalid config file: ${formatIssues(parsed.error)}`, {
			path: configPath,
		})
	}
	return { path: configPath, config: parsed.data }
}

function compilePattern(fieldName: string, source: string): RegExp {
	try {
		return new RegExp(source)
	} catch (err) {
		throw configError(
			`Invalid pattern for field ${fieldName}: ${err instanceof Error ? err.message : String(err)}`,
		)
	}
}

/** Turn config file field entries into comparable fields. */
export function buildFields(
	entries: NonNullable<ConfigFile['fields']>,
): ComparableField[] {
	const seen = new Set<string>()
	return entries.map((entry) => {
		if (seen.has(entry.name)) {
			throw configError(`Duplicate field name: ${entry.name}`)
		}
		seen.add(entry.name)
		return {
			name: entry.name,
			label: entry.label ?? entry.name,
			column: entry.column,
			remote: entry.remote,
			kind: entry.kind,
			...(entry.pattern
				? { pattern: compilePattern(entry.name, entry.pattern) }
				: {}),
		}
	})
}

/** Merge env, the config file and flag overrides into one run config. */
export async function resolveRunConfig(
	overrides: ConfigOverrides = {},
	env: NodeJS.ProcessEnv = process.env,
): Promise<RunConfig> {
	const envConfig = loadEnvConfig(env)
	const file = await loadConfigFile(overrides.configPath)
	const fileConfig = file?.config ?? {}

	const identityColumn = fileConfig.identityColumn ?? DEFAULT_IDENTITY_COLUMN
	const fields = fileConfig.fields
		? buildFields(fileConfig.fields)
		: [...DEFAULT_FIELDS]
	if (fields.some((field) => field.column === identityColumn)) {
		throw configError(
			`Identity column ${identityColumn} cannot also be a compared field`,
		)
	}

	const conflictPolicy = fileConfig.conflictPolicy ?? {}
	const fieldNames = new Set(fields.map((field) => field.name))
	const unknown = Object.keys(conflictPolicy).filter(
		(name) => !fieldNames.has(name),
	)
	if (unknown.length > 0) {
		throw configError(
			`conflictPolicy names unknown fields: ${unknown.join(', ')}`,
		)
	}

	const gateEvery = overrides.gateEvery ?? fileConfig.gateEvery ?? envConfig.gateEvery
	if (!Number.isInteger(gateEvery) || gateEvery <= 0) {
		throw configError(`gateEvery must be a positive integer: ${gateEvery}`)
	}

	return {
		...envConfig,
		spreadsheetPath: overrides.spreadsheetPath ?? envConfig.spreadsheetPath,
		reportPath: overrides.reportPath ?? envConfig.reportPath,
		gateEvery,
		identityColumn,
		fields,
		conflictPolicy,
		configFile: file?.path ?? null,
	}
}
