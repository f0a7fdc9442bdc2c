/**
 * The fixed set of fields reconciled between the spreadsheet and Lansweeper.
 *
 * Each entry pairs a spreadsheet column with an `assetCustom` field on the
 * remote asset. The set is configuration: `asset-sync.config.json` may
 * replace it, but the engine never discovers fields on its own.
 */

export type ValueKind = 'text' | 'date'

export interface ComparableField {
	/** Stable key used in config, ledger entries and policy tables. */
	readonly name: string
	/** Human label used in the report. */
	readonly label: string
	/** Column header in the local spreadsheet. */
	readonly column: string
	/** Field name under `assetCustom` on the remote asset. */
	readonly remote: string
	readonly kind: ValueKind
	/** Secondary format check for text values. */
	readonly pattern?: RegExp
}

export const DEFAULT_IDENTITY_COLUMN = 'Serial Number'

export const DEFAULT_FIELDS: readonly ComparableField[] = [
	{
		name: 'barcode',
		label: 'Barcode',
		column: 'Barcode Number',
		remote: 'barCode',
		kind: 'text',
	},
	{
		name: 'purchaseDate',
		label: 'Purchase Date',
		column: 'Invoice Date',
		remote: 'purchaseDate',
		kind: 'date',
	},
	{
		name: 'warrantyDate',
		label: 'Warranty Date',
		column: 'Extended Warranty',
		remote: 'warrantyDate',
		kind: 'date',
	},
]

/** Columns the spreadsheet must carry for a run to start. */
export function requiredColumns(
	identityColumn: string,
	fields: readonly ComparableField[],
): string[] {
	return [identityColumn, ...fields.map((field) => field.column)]
}
