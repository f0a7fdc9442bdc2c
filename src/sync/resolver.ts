export type ConflictDecision = 'adopt-local' | 'adopt-remote' | 'skip' | 'abort'

/** Decisions a policy table may hold; abort only comes from a person. */
export type PolicyDecision = Exclude<ConflictDecision, 'abort'>

export interface ConflictRequest {
	readonly identity: string
	/** Field key, as in `ComparableField.name`. */
	readonly field: string
	readonly label: string
	/** Values rendered for display (dates as YYYY-MM-DD). */
	readonly local: string
	readonly remote: string
}

/**
 * Source of decisions for fields where both sides hold different values.
 * The engine only sees this contract; prompts, tables and defaults plug in.
 */
export interface ConflictResolver {
	resolve(request: ConflictRequest): Promise<ConflictDecision>
}

/** Always answers with the same decision. */
export function createFixedResolver(
	decision: ConflictDecision,
): ConflictResolver {
	return {
		resolve: async () => decision,
	}
}

/** Default when nobody is around to answer: leave both sides untouched. */
export const alwaysSkip: ConflictResolver = createFixedResolver('skip')

/**
 * Per-field decisions from configuration. Fields missing from the table go
 * to the fallback resolver.
 */
export function createPolicyResolver(
	table: Readonly<Record<string, PolicyDecision>>,
	fallback: ConflictResolver = alwaysSkip,
): ConflictResolver {
	return {
		resolve: async (request) => {
			const decision = table[request.field]
			if (decision) return decision
			return await fallback.resolve(request)
		},
	}
}
