// OrgDefinedId cells hold either numbers or text, passed through untouched
export type StudentId = string | number

export type StudentRecord = Readonly<{
	username: string
	studentId: StudentId
	score: number
}>

export type RosterIndex = ReadonlyMap<string, StudentRecord>

// numbers before strings, numbers numerically, strings by code point
export const compareStudentIds = (a: StudentId, b: StudentId): number => {
	if (typeof a === 'number' && typeof b === 'number') return a - b
	if (typeof a === 'number') return -1
	if (typeof b === 'number') return 1
	return a < b ? -1 : a > b ? 1 : 0
}

export const sortByStudentId = (records: readonly StudentRecord[]) =>
	[...records].sort((a, b) => compareStudentIds(a.studentId, b.studentId))
