export class GraderError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options)
		this.name = new.target.name
	}
}

export class ConfigError extends GraderError {
	readonly fieldErrors: Record<string, string[] | undefined>

	constructor(
		message: string,
		fieldErrors: Record<string, string[] | undefined> = {},
		options?: { cause?: unknown }
	) {
		super(message, options)
		this.fieldErrors = fieldErrors
	}
}

export class FileNotFoundError extends GraderError {
	constructor(
		readonly prefix: string,
		readonly directory: string
	) {
		super(`No file starting with "${prefix}" in ${directory}`)
	}
}

export class AttendanceLogParseError extends GraderError {}

// header layout, sheet or cell content does not match the roster schema
export class SchemaError extends GraderError {}

export class UndefinedColumnError extends SchemaError {
	constructor(
		readonly header: unknown,
		readonly column: number
	) {
		super(`Undefined column name ${JSON.stringify(header)} in column ${column}`)
	}
}

export class MissingColumnError extends SchemaError {
	constructor(readonly role: string) {
		super(`No header found for the ${role} column`)
	}
}

export class DuplicateColumnError extends SchemaError {
	constructor(
		readonly role: string,
		readonly columns: [number, number]
	) {
		super(
			`The ${role} column appears twice (columns ${columns[0]} and ${columns[1]})`
		)
	}
}

export class MissingSheetError extends SchemaError {
	constructor(readonly sheetName: string) {
		super(`Sheet "${sheetName}" not found`)
	}
}

export class DuplicateUsernameError extends GraderError {
	constructor(
		readonly username: string,
		readonly row: number
	) {
		super(`Duplicate username found: ${username} (row ${row})`)
	}
}

export class InvalidAttendanceCountError extends GraderError {
	constructor(
		readonly username: string,
		readonly count: number
	) {
		super(
			`Invalid student attendance with username: ${username} (count: ${count})`
		)
	}
}

export class WriteFailureError extends GraderError {}
