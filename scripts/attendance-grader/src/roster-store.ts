import ExcelJS from 'exceljs'
import type { CellValue, Worksheet } from 'exceljs'
import { clamp } from 'es-toolkit'
import {
	DuplicateUsernameError,
	MissingSheetError,
	SchemaError,
	WriteFailureError,
} from './errors'
import { headerWidth, resolveColumns, type ColumnMap } from './roster-schema'
import {
	sortByStudentId,
	type RosterIndex,
	type StudentId,
	type StudentRecord,
} from './student'

export type RosterStoreOptions = {
	path: string
	sheetName: string
	maxScore: number

	// carry existing scores forward instead of resetting them to 0
	overwriteMode: boolean

	// write 0 as an empty cell
	blankZeroScores?: boolean
}

type PlainValue = string | number | boolean | Date | null

// formula cells yield their cached result, like reading with data_only
export const plainValue = (value: CellValue): PlainValue => {
	if (value === null || value === undefined) return null
	if (typeof value !== 'object' || value instanceof Date) return value

	if ('richText' in value) return value.richText.map(r => r.text).join('')
	if ('hyperlink' in value) return value.text
	if ('formula' in value || 'sharedFormula' in value) {
		return value.result === undefined ? null : plainValue(value.result)
	}
	if ('error' in value) return value.error

	return null
}

const isBlank = (value: PlainValue) =>
	value === null || (typeof value === 'string' && value.trim() === '')

const toScore = (value: PlainValue, row: number): number | null => {
	if (isBlank(value)) return null
	if (typeof value === 'number') return value
	if (typeof value === 'string' && Number.isFinite(Number(value))) {
		return Number(value)
	}

	throw new SchemaError(
		`Score in row ${row} is not a number: ${JSON.stringify(value)}`
	)
}

const toStudentId = (value: PlainValue, row: number): StudentId => {
	if (typeof value === 'number') return value
	if (typeof value === 'string' && !isBlank(value)) return value.trim()

	throw new SchemaError(`Missing OrgDefinedId in row ${row}`)
}

/**
 * One sheet of the tutorial workbook, e.g. "Tutorial 6":
 *
 * | OrgDefinedId | Username | Tutorial 6 Points Grade |
 * | ------------ | -------- | ----------------------- |
 * | 100          | #alice   | 1                       |
 * | 101          | #bob     |                         |
 *
 * The three columns may come in any order.
 */
export class RosterStore {
	#path: string
	#sheetName: string
	#maxScore: number
	#overwriteMode: boolean
	#blankZeroScores: boolean

	constructor(options: RosterStoreOptions) {
		this.#path = options.path
		this.#sheetName = options.sheetName
		this.#maxScore = options.maxScore
		this.#overwriteMode = options.overwriteMode
		this.#blankZeroScores = options.blankZeroScores ?? true
	}

	async #openSheet() {
		const workbook = new ExcelJS.Workbook()
		await workbook.xlsx.readFile(this.#path)

		const worksheet = workbook.getWorksheet(this.#sheetName)
		if (!worksheet) throw new MissingSheetError(this.#sheetName)

		return { workbook, worksheet }
	}

	#columns(worksheet: Worksheet): ColumnMap {
		const header = worksheet.getRow(1)

		const headers = Array.from({ length: headerWidth }, (_, i) =>
			plainValue(header.getCell(i + 1).value)
		)

		return resolveColumns(headers)
	}

	async load(): Promise<RosterIndex> {
		const { worksheet } = await this.#openSheet()
		const columns = this.#columns(worksheet)

		// header included
		const rowCount = worksheet.actualRowCount

		const roster = new Map<string, StudentRecord>()

		for (let row = 2; row <= rowCount; row++) {
			const cell = (column: number) =>
				plainValue(worksheet.getCell(row, column).value)

			const rawUsername = cell(columns.username)
			if (typeof rawUsername !== 'string' || isBlank(rawUsername)) {
				throw new SchemaError(`Missing username in row ${row}`)
			}
			const username = rawUsername.trim()

			if (roster.has(username)) {
				throw new DuplicateUsernameError(username, row)
			}

			const studentId = toStudentId(cell(columns.id), row)
			const current = toScore(cell(columns.score), row)

			const score =
				this.#overwriteMode && current !== null && current > 0
					? clamp(current, 0, this.#maxScore)
					: 0

			roster.set(username, { username, studentId, score })
		}

		return roster
	}

	// rewrites the sheet sorted by student id, returns the number of rows.
	// the workbook is written in place, a failure half way can leave it truncated.
	async save(records: readonly StudentRecord[]): Promise<number> {
		const sorted = sortByStudentId(records)

		try {
			const { workbook, worksheet } = await this.#openSheet()
			const columns = this.#columns(worksheet)

			sorted.forEach((student, i) => {
				const row = i + 2

				worksheet.getCell(row, columns.id).value = student.studentId
				worksheet.getCell(row, columns.username).value = student.username
				worksheet.getCell(row, columns.score).value =
					student.score === 0 && this.#blankZeroScores ? null : student.score
			})

			await workbook.xlsx.writeFile(this.#path)
		} catch (e) {
			if (e instanceof SchemaError) throw e

			throw new WriteFailureError(`Unable to write ${this.#path}`, {
				cause: e,
			})
		}

		return sorted.length
	}
}
