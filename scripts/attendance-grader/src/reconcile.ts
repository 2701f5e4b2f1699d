import { countBy, uniq } from 'es-toolkit'
import type { AttendanceToken } from './attendance-log'
import { InvalidAttendanceCountError } from './errors'
import type { Logger } from './logger'
import { scoringPolicies, type ScoringPolicy } from './scoring'
import type { RosterIndex, StudentRecord } from './student'

// a student cannot check in more than twice in one session
export const maxCheckIns = 2

export type ScoreUpdate = {
	username: string
	oldScore: number
	newScore: number
	multiplicity: number
}

export type ReconcileOptions = {
	maxScore: number
	policy?: ScoringPolicy
	logger?: Logger
}

export type ReconcileResult = {
	// every roster record, attended or not, in roster order
	records: StudentRecord[]
	updates: ScoreUpdate[]
	// attendees without a roster row, in order of first appearance
	unmatched: string[]
}

export const formatUpdate = ({
	username,
	oldScore,
	newScore,
}: ScoreUpdate) =>
	`Updated ${username.padEnd(25)} ${'-'.padEnd(2)} Old: ${oldScore} | New: ${newScore}`

export const reconcile = (
	tokens: readonly AttendanceToken[],
	roster: RosterIndex,
	{
		maxScore,
		policy = scoringPolicies.occurrence,
		logger = console,
	}: ReconcileOptions
): ReconcileResult => {
	const multiplicities = countBy(tokens, token => token)

	const next = new Map(roster)
	const updates: ScoreUpdate[] = []
	const unmatched: string[] = []

	for (const username of uniq(tokens)) {
		const multiplicity = multiplicities[username] ?? 0
		const student = roster.get(username)

		if (!student) {
			logger.warn(
				`WARNING >>> Username: ${username} not found in tutorial list!`
			)
			unmatched.push(username)
			continue
		}

		if (multiplicity > maxCheckIns) {
			throw new InvalidAttendanceCountError(username, multiplicity)
		}

		const update: ScoreUpdate = {
			username,
			oldScore: student.score,
			newScore: policy(student.score, multiplicity, maxScore),
			multiplicity,
		}

		next.set(username, { ...student, score: update.newScore })
		updates.push(update)

		logger.log(formatUpdate(update))
	}

	return { records: [...next.values()], updates, unmatched }
}
