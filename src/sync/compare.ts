import { formatCalendarDate, type NormalizedValue } from './normalize'

function comparableKey(value: NormalizedValue): string | null {
	switch (value.type) {
		case 'empty':
		case 'invalid':
			return null
		case 'text':
			return `text:${value.text.trim()}`
		case 'date':
			return `date:${formatCalendarDate(value.date)}`
		default: {
			const _exhaustive: never = value
			return _exhaustive
		}
	}
}

/**
 * Field equality between a normalized local and remote value.
 *
 * Empty equals Empty, and Empty never equals a present value (that is a gap,
 * not a conflict). Invalid values compare as Empty. Dates compare by
 * calendar day; text is trimmed and case-sensitive.
 */
export function valuesEqual(
	local: NormalizedValue,
	remote: NormalizedValue,
): boolean {
	return comparableKey(local) === comparableKey(remote)
}
