import { getSyncLogger } from '../logging'
import type { ValueKind } from './fields'

const normalizeLogger = getSyncLogger(['sync', 'normalize'])

/** A raw spreadsheet cell as SheetJS hands it over. */
export type CellValue = string | number | boolean | Date | null | undefined

export interface CalendarDate {
	readonly year: number
	readonly month: number
	readonly day: number
}

/**
 * Canonical form of a field value. `invalid` keeps the raw text so the
 * ledger can show what was entered; comparisons treat it as empty.
 */
export type NormalizedValue =
	| { readonly type: 'empty' }
	| { readonly type: 'text'; readonly text: string }
	| { readonly type: 'date'; readonly date: CalendarDate }
	| { readonly type: 'invalid'; readonly raw: string; readonly reason: string }

export const EMPTY: NormalizedValue = { type: 'empty' }

type DateOrder = 'ymd' | 'mdy' | 'dmy'

interface DatePattern {
	readonly format: string
	readonly regex: RegExp
	readonly order: DateOrder
	readonly shortYear?: boolean
}

/**
 * Accepted input formats, tried in order. MM/DD is listed before DD/MM, so
 * "03/04/2024" is always read as March 4th: priority, not locale, decides.
 */
const DATE_PATTERNS: readonly DatePattern[] = [
	{
		format: 'YYYY-MM-DDTHH:MM:SS.fffZ',
		regex: /^(\d{4})-(\d{1,2})-(\d{1,2})T(\d{1,2}):(\d{1,2}):(\d{1,2})\.\d{1,6}Z$/,
		order: 'ymd',
	},
	{
		format: 'YYYY-MM-DDTHH:MM:SSZ',
		regex: /^(\d{4})-(\d{1,2})-(\d{1,2})T(\d{1,2}):(\d{1,2}):(\d{1,2})Z$/,
		order: 'ymd',
	},
	{
		format: 'YYYY-MM-DD HH:MM:SS',
		regex: /^(\d{4})-(\d{1,2})-(\d{1,2}) (\d{1,2}):(\d{1,2}):(\d{1,2})$/,
		order: 'ymd',
	},
	{
		format: 'YYYY-MM-DDTHH:MM:SS',
		regex: /^(\d{4})-(\d{1,2})-(\d{1,2})T(\d{1,2}):(\d{1,2}):(\d{1,2})$/,
		order: 'ymd',
	},
	{
		format: 'YYYY-MM-DD',
		regex: /^(\d{4})-(\d{1,2})-(\d{1,2})$/,
		order: 'ymd',
	},
	{ format: 'MM/DD/YYYY', regex: /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/, order: 'mdy' },
	{ format: 'DD/MM/YYYY', regex: /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/, order: 'dmy' },
	{ format: 'YYYY/MM/DD', regex: /^(\d{4})\/(\d{1,2})\/(\d{1,2})$/, order: 'ymd' },
	{ format: 'MM-DD-YYYY', regex: /^(\d{1,2})-(\d{1,2})-(\d{4})$/, order: 'mdy' },
	{ format: 'DD-MM-YYYY', regex: /^(\d{1,2})-(\d{1,2})-(\d{4})$/, order: 'dmy' },
	{
		format: 'MM/DD/YY',
		regex: /^(\d{1,2})\/(\d{1,2})\/(\d{2})$/,
		order: 'mdy',
		shortYear: true,
	},
	{
		format: 'DD/MM/YY',
		regex: /^(\d{1,2})\/(\d{1,2})\/(\d{2})$/,
		order: 'dmy',
		shortYear: true,
	},
]

const MONTH_DAYS = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31]

function isLeapYear(year: number): boolean {
	return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0
}

function isValidCalendarDate(date: CalendarDate): boolean {
	const { year, month, day } = date
	if (!Number.isInteger(year) || year < 1 || year > 9999) return false
	if (!Number.isInteger(month) || month < 1 || month > 12) return false
	const monthDays =
		month === 2 && isLeapYear(year) ? 29 : (MONTH_DAYS[month - 1] ?? 0)
	return Number.isInteger(day) && day >= 1 && day <= monthDays
}

function isValidTime(match: RegExpExecArray): boolean {
	if (match.length <= 4) return true
	const hours = Number(match[4])
	const minutes = Number(match[5])
	const seconds = Number(match[6])
	return hours <= 23 && minutes <= 59 && seconds <= 61
}

/** Two-digit years pivot at 69: 00-68 is 20xx, 69-99 is 19xx. */
function expandShortYear(year: number): number {
	return year < 69 ? 2000 + year : 1900 + year
}

function matchDatePattern(
	pattern: DatePattern,
	text: string,
): CalendarDate | null {
	const match = pattern.regex.exec(text)
	if (!match) return null
	const first = Number(match[1])
	const second = Number(match[2])
	const third = Number(match[3])
	let date: CalendarDate
	if (pattern.order === 'ymd') {
		date = { year: first, month: second, day: third }
	} else if (pattern.order === 'mdy') {
		date = { year: third, month: first, day: second }
	} else {
		date = { year: third, month: second, day: first }
	}
	if (pattern.shortYear) {
		date = { ...date, year: expandShortYear(date.year) }
	}
	if (!isValidTime(match) || !isValidCalendarDate(date)) return null
	return date
}

/** Parse a date string against the ordered pattern list. First match wins. */
export function parseDateText(text: string): CalendarDate | null {
	const trimmed = text.trim()
	for (const pattern of DATE_PATTERNS) {
		const date = matchDatePattern(pattern, trimmed)
		if (date) return date
	}
	return null
}

/** Emptiness gate used by every gap-filling decision. */
export function isEmpty(raw: unknown): boolean {
	if (raw === null || raw === undefined) return true
	if (typeof raw === 'number') return Number.isNaN(raw)
	if (typeof raw === 'string') return raw.trim().length === 0
	return false
}

function describeRaw(raw: unknown): string {
	if (raw instanceof Date) {
		return Number.isNaN(raw.getTime()) ? 'Invalid Date' : raw.toISOString()
	}
	if (typeof raw === 'object' && raw !== null) {
		return JSON.stringify(raw)
	}
	return String(raw).trim()
}

function describeType(raw: unknown): string {
	if (raw instanceof Date) return 'date'
	if (Array.isArray(raw)) return 'array'
	return typeof raw
}

function invalid(raw: unknown, reason: string): NormalizedValue {
	return { type: 'invalid', raw: describeRaw(raw), reason }
}

function normalizeText(raw: unknown, pattern?: RegExp): NormalizedValue {
	let text: string
	if (typeof raw === 'string') {
		text = raw.trim()
	} else if (typeof raw === 'number' && Number.isFinite(raw)) {
		text = String(raw)
	} else {
		return invalid(raw, `expected text, got ${describeType(raw)}`)
	}
	if (pattern && !pattern.test(text)) {
		return invalid(raw, 'does not match expected format')
	}
	return { type: 'text', text }
}

function normalizeDate(raw: unknown): NormalizedValue {
	if (raw instanceof Date) {
		// Spreadsheet dates carry local wall-clock components.
		if (Number.isNaN(raw.getTime())) return invalid(raw, 'unparseable date')
		return {
			type: 'date',
			date: {
				year: raw.getFullYear(),
				month: raw.getMonth() + 1,
				day: raw.getDate(),
			},
		}
	}
	if (typeof raw === 'string') {
		const date = parseDateText(raw)
		if (date) return { type: 'date', date }
	}
	normalizeLogger.warn('Could not parse date: {raw}', {
		raw: describeRaw(raw),
	})
	return invalid(raw, 'unparseable date')
}

/** Canonicalize a raw cell or remote field value into a comparable form. */
export function normalize(
	raw: unknown,
	kind: ValueKind,
	options?: { readonly pattern?: RegExp },
): NormalizedValue {
	if (isEmpty(raw)) return EMPTY
	if (kind === 'date') return normalizeDate(raw)
	return normalizeText(raw, options?.pattern)
}

function pad(value: number, width: number): string {
	return String(value).padStart(width, '0')
}

export function formatCalendarDate(date: CalendarDate): string {
	return `${pad(date.year, 4)}-${pad(date.month, 2)}-${pad(date.day, 2)}`
}

/** Render for the spreadsheet and for display: dates as YYYY-MM-DD. */
export function renderLocal(value: NormalizedValue): string {
	switch (value.type) {
		case 'empty':
			return ''
		case 'text':
			return value.text
		case 'date':
			return formatCalendarDate(value.date)
		case 'invalid':
			return value.raw
		default: {
			const _exhaustive: never = value
			return _exhaustive
		}
	}
}

/** Render for remote updates: dates as a UTC midnight timestamp. */
export function renderRemote(value: NormalizedValue): string {
	if (value.type === 'date') {
		return `${formatCalendarDate(value.date)}T00:00:00Z`
	}
	return renderLocal(value)
}
