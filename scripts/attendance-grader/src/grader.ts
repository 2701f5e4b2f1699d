import { readAttendanceLog, type AttendanceToken } from './attendance-log'
import type { GraderConfig } from './config'
import type { Logger } from './logger'
import { reconcile, type ScoreUpdate } from './reconcile'
import { RosterStore } from './roster-store'
import { scoringPolicies } from './scoring'
import type { RosterIndex } from './student'

export type GraderPaths = {
	roster: string
	attendance: string
}

export type GradingSummary = {
	attendanceCount: number
	rosterCount: number
	written: number
	updates: ScoreUpdate[]
	unmatched: string[]
}

export class AttendanceGrader {
	#config: GraderConfig
	#paths: GraderPaths
	#logger: Logger
	#store: RosterStore

	constructor(
		config: GraderConfig,
		paths: GraderPaths,
		logger: Logger = console
	) {
		this.#config = config
		this.#paths = paths
		this.#logger = logger

		this.#store = new RosterStore({
			path: paths.roster,
			sheetName: config.sheetName,
			maxScore: config.maxScore,
			overwriteMode: config.overwriteMode,
			blankZeroScores: config.blankZeroScores,
		})
	}

	// log which phase failed, then let the error abort the run
	async #phase<T>(failure: string, task: () => Promise<T> | T): Promise<T> {
		try {
			return await task()
		} catch (e) {
			this.#logger.error(`ERROR >>> ${failure}`)
			throw e
		}
	}

	async run(): Promise<GradingSummary> {
		const tokens: AttendanceToken[] = await this.#phase(
			'Unable to parse student attendance file!',
			() => readAttendanceLog(this.#paths.attendance, this.#config.logFormat)
		)
		this.#logger.log(
			`Loaded ${tokens.length} students from ${this.#paths.attendance}`
		)

		const roster: RosterIndex = await this.#phase(
			'Unable to parse tutorial file!',
			() => this.#store.load()
		)
		this.#logger.log(`Found ${roster.size} students from ${this.#paths.roster}`)

		const { records, updates, unmatched } = await this.#phase(
			'Unable to update attendance!',
			() =>
				reconcile(tokens, roster, {
					maxScore: this.#config.maxScore,
					policy: scoringPolicies[this.#config.scoringPolicy],
					logger: this.#logger,
				})
		)

		const written = await this.#phase('Unable to write to tutorial file!', () =>
			this.#store.save(records)
		)
		this.#logger.log(
			`Successfully wrote ${written} students to ${this.#paths.roster}!`
		)

		if (unmatched.length > 0) {
			this.#logger.warn(
				`WARNING >>> ${unmatched.length} attendee(s) not in the tutorial list: ${unmatched.join(', ')}`
			)
		}

		return {
			attendanceCount: tokens.length,
			rosterCount: roster.size,
			written,
			updates,
			unmatched,
		}
	}
}
