import { existsSync } from 'node:fs'
import { readFile, rename, unlink, writeFile } from 'node:fs/promises'
import path from 'node:path'
import * as XLSX from 'xlsx'
import { PreconditionError } from '../errors'
import { getSyncLogger } from '../logging'
import type { LocalRow } from '../sync/engine'
import type { CellValue } from '../sync/normalize'

const spreadsheetLogger = getSyncLogger(['spreadsheet'])

const BOOK_TYPES: Record<string, XLSX.BookType> = {
	'.xlsx': 'xlsx',
	'.xls': 'xls',
	'.csv': 'csv',
}

/** The first worksheet of a workbook, as rows the engine mutates in place. */
export interface LoadedSheet {
	readonly path: string
	readonly bookType: XLSX.BookType
	readonly workbook: XLSX.WorkBook
	readonly sheetName: string
	readonly rows: LocalRow[]
	/** 1-based sheet row number of each entry in `rows`. */
	readonly rowNumbers: readonly number[]
	/** Worksheet column index of each named column. */
	readonly columnIndex: ReadonlyMap<string, number>
	/** Row values as loaded, for detecting which cells changed. */
	readonly original: readonly LocalRow[]
}

function resolveBookType(filePath: string): XLSX.BookType {
	const bookType = BOOK_TYPES[path.extname(filePath).toLowerCase()]
	if (!bookType) {
		throw new PreconditionError(
			`Unsupported spreadsheet type: ${path.basename(filePath)} (use .xlsx, .xls or .csv)`,
			{ context: { path: filePath } },
		)
	}
	return bookType
}

function toCellValue(value: unknown): CellValue {
	if (
		value === null ||
		value === undefined ||
		typeof value === 'string' ||
		typeof value === 'number' ||
		typeof value === 'boolean' ||
		value instanceof Date
	) {
		return value ?? null
	}
	return String(value)
}

function isBlankRow(cells: readonly unknown[]): boolean {
	return cells.every(
		(cell) =>
			cell === null ||
			cell === undefined ||
			(typeof cell === 'string' && cell.trim().length === 0),
	)
}

function sameCell(a: CellValue, b: CellValue): boolean {
	if (a instanceof Date && b instanceof Date) return a.getTime() === b.getTime()
	return (a ?? null) === (b ?? null)
}

function toCellObject(value: CellValue): XLSX.CellObject | null {
	if (value === null || value === undefined) return null
	if (value instanceof Date) return { t: 'd', v: value }
	if (typeof value === 'number') return { t: 'n', v: value }
	if (typeof value === 'boolean') return { t: 'b', v: value }
	return { t: 's', v: value }
}

/**
 * Read the first worksheet. A missing file or a missing required column is
 * fatal and reported before any row is processed.
 */
export async function loadSheet(
	filePath: string,
	requiredColumns: readonly string[],
): Promise<LoadedSheet> {
	const bookType = resolveBookType(filePath)
	if (!existsSync(filePath)) {
		throw new PreconditionError(`Spreadsheet file not found: ${filePath}`, {
			context: { path: filePath },
		})
	}
	spreadsheetLogger.info('Reading spreadsheet: {path}', { path: filePath })
	const buffer = await readFile(filePath)
	// CSV text stays text: date parsing belongs to the normalizer.
	const workbook = XLSX.read(buffer, {
		type: 'buffer',
		cellDates: true,
		raw: bookType === 'csv',
	})
	const sheetName = workbook.SheetNames[0]
	const sheet = sheetName ? workbook.Sheets[sheetName] : undefined
	if (!sheetName || !sheet) {
		throw new PreconditionError(`Spreadsheet has no worksheets: ${filePath}`, {
			context: { path: filePath },
		})
	}

	const range = XLSX.utils.decode_range(sheet['!ref'] ?? 'A1')
	const matrix = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
		header: 1,
		defval: null,
		raw: true,
		blankrows: true,
	})
	const [header = [], ...body] = matrix

	const columnIndex = new Map<string, number>()
	header.forEach((cell, offset) => {
		if (cell === null || cell === undefined) return
		const name = String(cell).trim()
		if (name && !columnIndex.has(name)) {
			columnIndex.set(name, range.s.c + offset)
		}
	})

	const missing = requiredColumns.filter((column) => !columnIndex.has(column))
	if (missing.length > 0) {
		throw new PreconditionError(
			`Missing required columns: ${missing.join(', ')}`,
			{ context: { path: filePath, missing } },
		)
	}

	const rows: LocalRow[] = []
	const rowNumbers: number[] = []
	body.forEach((cells, offset) => {
		if (isBlankRow(cells)) return
		const row: LocalRow = {}
		for (const [column, index] of columnIndex) {
			row[column] = toCellValue(cells[index - range.s.c])
		}
		rows.push(row)
		// Header sits at range.s.r (0-based); sheet rows are 1-based.
		rowNumbers.push(range.s.r + offset + 2)
	})
	spreadsheetLogger.debug('Loaded {rowCount} rows from {sheetName}', {
		rowCount: rows.length,
		sheetName,
	})
	return {
		path: filePath,
		bookType,
		workbook,
		sheetName,
		rows,
		rowNumbers,
		columnIndex,
		original: rows.map((row) => ({ ...row })),
	}
}

/**
 * Write changed cells back into the worksheet and replace the file
 * atomically. Returns the number of cells written.
 */
export async function saveSheet(sheet: LoadedSheet): Promise<number> {
	const worksheet = sheet.workbook.Sheets[sheet.sheetName]
	if (!worksheet) {
		throw new Error(`Worksheet disappeared: ${sheet.sheetName}`)
	}
	let changed = 0
	sheet.rows.forEach((row, index) => {
		const before = sheet.original[index] ?? {}
		const rowNumber = sheet.rowNumbers[index]
		if (rowNumber === undefined) return
		for (const [column, columnNumber] of sheet.columnIndex) {
			const value = row[column]
			if (sameCell(value, before[column])) continue
			const address = XLSX.utils.encode_cell({ r: rowNumber - 1, c: columnNumber })
			const cell = toCellObject(value)
			if (cell) {
				worksheet[address] = cell
			} else {
				delete worksheet[address]
			}
			changed += 1
		}
	})

	const output: Buffer = XLSX.write(sheet.workbook, {
		type: 'buffer',
		bookType: sheet.bookType,
		cellDates: true,
	})
	const tempPath = `${sheet.path}.tmp-${Date.now()}-${Math.random()
		.toString(36)
		.slice(2)}`
	try {
		await writeFile(tempPath, output, { flag: 'wx' })
		await rename(tempPath, sheet.path)
	} catch (err) {
		if (existsSync(tempPath)) await unlink(tempPath)
		throw err
	}
	spreadsheetLogger.info('Saved {changed} changed cell(s) to {path}', {
		changed,
		path: sheet.path,
	})
	return changed
}
