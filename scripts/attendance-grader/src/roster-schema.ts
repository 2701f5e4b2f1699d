import {
	DuplicateColumnError,
	MissingColumnError,
	UndefinedColumnError,
} from './errors'

export type ColumnRole = 'id' | 'username' | 'score'

export type ColumnRule =
	| { role: ColumnRole; label: string }
	| { role: ColumnRole; labelPrefix: string }

export const rosterColumns: readonly ColumnRule[] = [
	{ role: 'id', label: 'OrgDefinedId' },
	{ role: 'username', label: 'Username' },
	{ role: 'score', labelPrefix: 'Tutorial' },
]

// only this many leading header cells are inspected
export const headerWidth = rosterColumns.length

// 1-based column index per role
export type ColumnMap = Record<ColumnRole, number>

const matches = (rule: ColumnRule, header: unknown) => {
	if (typeof header !== 'string') return false
	return 'label' in rule
		? header === rule.label
		: header.startsWith(rule.labelPrefix)
}

export const classifyHeader = (
	header: unknown,
	column: number,
	rules: readonly ColumnRule[] = rosterColumns
): ColumnRole => {
	const rule = rules.find(r => matches(r, header))
	if (!rule) throw new UndefinedColumnError(header, column)

	return rule.role
}

/**
 * Maps the leading header cells of a sheet to column roles.
 * `headers[0]` is column 1.
 */
export const resolveColumns = (
	headers: readonly unknown[],
	rules: readonly ColumnRule[] = rosterColumns
): ColumnMap => {
	const found: Partial<ColumnMap> = {}

	headers.slice(0, rules.length).forEach((header, i) => {
		const column = i + 1
		const role = classifyHeader(header, column, rules)

		const previous = found[role]
		if (previous !== undefined) {
			throw new DuplicateColumnError(role, [previous, column])
		}

		found[role] = column
	})

	const { id, username, score } = found
	if (id === undefined) throw new MissingColumnError('id')
	if (username === undefined) throw new MissingColumnError('username')
	if (score === undefined) throw new MissingColumnError('score')

	return { id, username, score }
}
