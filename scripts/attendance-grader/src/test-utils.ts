import { mkdtemp, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import ExcelJS from 'exceljs'
import type { CellValue } from 'exceljs'
import type { Logger } from './logger'

// collects lines instead of printing them
export const memoryLogger = () => {
	const lines: { level: keyof Logger; message: string }[] = []

	const push =
		(level: keyof Logger) =>
		(...args: unknown[]) => {
			lines.push({ level, message: args.map(String).join(' ') })
		}

	const logger: Logger = {
		log: push('log'),
		warn: push('warn'),
		error: push('error'),
	}

	return { logger, lines }
}

export const makeTempDir = () => mkdtemp(join(tmpdir(), 'attendance-grader-'))

export const removeTempDir = (dir: string) =>
	rm(dir, { recursive: true, force: true })

export const defaultHeaders = [
	'OrgDefinedId',
	'Username',
	'Tutorial 6 Points Grade',
]

// sheets: name -> rows, the first row being the header
export const writeWorkbook = async (
	path: string,
	sheets: Record<string, CellValue[][]>
) => {
	const workbook = new ExcelJS.Workbook()

	for (const [name, rows] of Object.entries(sheets)) {
		const worksheet = workbook.addWorksheet(name)
		rows.forEach((values, i) => {
			values.forEach((value, j) => {
				worksheet.getCell(i + 1, j + 1).value = value
			})
		})
	}

	await workbook.xlsx.writeFile(path)
}

// rows 1..count of a sheet as plain cell values over the first `width` columns
export const readSheet = async (
	path: string,
	sheetName: string,
	width = 3
): Promise<CellValue[][]> => {
	const workbook = new ExcelJS.Workbook()
	await workbook.xlsx.readFile(path)

	const worksheet = workbook.getWorksheet(sheetName)
	if (!worksheet) throw new Error(`missing sheet ${sheetName}`)

	const rows: CellValue[][] = []
	for (let row = 1; row <= worksheet.rowCount; row++) {
		rows.push(
			Array.from(
				{ length: width },
				(_, i) => worksheet.getCell(row, i + 1).value
			)
		)
	}

	return rows
}
