import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import path from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import * as XLSX from 'xlsx'
import { PreconditionError } from '../../src/errors'
import { loadSheet, saveSheet } from '../../src/spreadsheet/workbook'

const COLUMNS = ['Serial Number', 'Barcode Number', 'Invoice Date', 'Extended Warranty']

async function writeWorkbook(filePath: string): Promise<void> {
	const workbook = XLSX.utils.book_new()
	const assets = XLSX.utils.aoa_to_sheet(
		[
			[...COLUMNS, 'Notes'],
			['SN1', 'BC1', '2024-01-15', null, 'keep me'],
			[null, null, null, null, null],
			['SN2', null, '03/04/2024', null, null],
		],
		{ cellDates: true },
	)
	XLSX.utils.book_append_sheet(workbook, assets, 'Assets')
	XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet([['untouched']]), 'Other')
	const buffer: Buffer = XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' })
	await writeFile(filePath, buffer)
}

describe('spreadsheet workbook', () => {
	let dir: string

	beforeEach(async () => {
		dir = await mkdtemp(path.join(tmpdir(), 'asset-sync-sheet-'))
	})

	afterEach(async () => {
		await rm(dir, { recursive: true, force: true })
	})

	it('loads the first worksheet, skipping blank rows', async () => {
		const filePath = path.join(dir, 'assets.xlsx')
		await writeWorkbook(filePath)

		const sheet = await loadSheet(filePath, COLUMNS)

		expect(sheet.sheetName).toBe('Assets')
		expect([...sheet.columnIndex.keys()]).toEqual([...COLUMNS, 'Notes'])
		expect(sheet.rowNumbers).toEqual([2, 4])
		expect(sheet.rows).toEqual([
			{
				'Serial Number': 'SN1',
				'Barcode Number': 'BC1',
				'Invoice Date': '2024-01-15',
				'Extended Warranty': null,
				Notes: 'keep me',
			},
			{
				'Serial Number': 'SN2',
				'Barcode Number': null,
				'Invoice Date': '03/04/2024',
				'Extended Warranty': null,
				Notes: null,
			},
		])
	})

	it('fails before reading rows when a required column is missing', async () => {
		const filePath = path.join(dir, 'assets.xlsx')
		await writeWorkbook(filePath)

		const error = await loadSheet(filePath, [...COLUMNS, 'Purchase Order', 'Owner']).catch(
			(err: unknown) => err,
		)

		expect(error).toBeInstanceOf(PreconditionError)
		expect(error).toMatchObject({
			code: 'E_PRECONDITION',
			message: 'Missing required columns: Purchase Order, Owner',
		})
	})

	it('fails when the file does not exist', async () => {
		const filePath = path.join(dir, 'missing.xlsx')

		await expect(loadSheet(filePath, COLUMNS)).rejects.toThrow(
			`Spreadsheet file not found: ${filePath}`,
		)
	})

	it('refuses file types it cannot write back', async () => {
		await expect(loadSheet(path.join(dir, 'assets.txt'), COLUMNS)).rejects.toBeInstanceOf(
			PreconditionError,
		)
	})

	it('keeps CSV values as text', async () => {
		const filePath = path.join(dir, 'assets.csv')
		await writeFile(
			filePath,
			'Serial Number,Barcode Number,Invoice Date,Extended Warranty\nSN1,,2024-01-15,\n',
		)

		const sheet = await loadSheet(filePath, COLUMNS)

		expect(sheet.rows).toEqual([
			{
				'Serial Number': 'SN1',
				'Barcode Number': null,
				'Invoice Date': '2024-01-15',
				'Extended Warranty': null,
			},
		])
	})

	it('writes back only changed cells and keeps other sheets', async () => {
		const filePath = path.join(dir, 'assets.xlsx')
		await writeWorkbook(filePath)
		const sheet = await loadSheet(filePath, COLUMNS)
		const [first, second] = sheet.rows
		if (!first || !second) throw new Error('expected two rows')
		first['Extended Warranty'] = '2026-01-15'
		second['Barcode Number'] = 'BC2'

		const changed = await saveSheet(sheet)

		expect(changed).toBe(2)
		const reloaded = await loadSheet(filePath, COLUMNS)
		expect(reloaded.workbook.SheetNames).toEqual(['Assets', 'Other'])
		expect(reloaded.rowNumbers).toEqual([2, 4])
		expect(reloaded.rows[0]).toEqual({
			'Serial Number': 'SN1',
			'Barcode Number': 'BC1',
			'Invoice Date': '2024-01-15',
			'Extended Warranty': '2026-01-15',
			Notes: 'keep me',
		})
		expect(reloaded.rows[1]?.['Barcode Number']).toBe('BC2')
	})
})
