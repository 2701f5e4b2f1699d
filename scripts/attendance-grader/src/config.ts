import { readFile } from 'node:fs/promises'
import { dirname, resolve } from 'node:path'
import { parse } from 'smol-toml'
import { z } from 'zod'
import { ConfigError } from './errors'
import { scoringPolicyNames } from './scoring'
import { logFormats } from './attendance-log'

export const configSchema = z.object({
	tutorial_number: z.number().int().positive(),
	max_score: z.number().int().positive().default(2),

	// false resets every score of the sheet to 0 before attendance is applied
	overwrite_mode: z.boolean().default(true),

	scoring_policy: z.enum(scoringPolicyNames).default('occurrence'),
	log_format: z.enum(logFormats).default('tagged'),

	// write a score of 0 as an empty cell
	blank_zero_scores: z.boolean().default(true),

	files: z.object({
		directory: z.string().min(1).default('.'),
		roster_prefix: z.string().min(1),
		attendance_prefix: z.string().min(1),
	}),
})

export type GraderConfig = {
	tutorialNumber: number
	sheetName: string
	maxScore: number
	overwriteMode: boolean
	scoringPolicy: (typeof scoringPolicyNames)[number]
	logFormat: (typeof logFormats)[number]
	blankZeroScores: boolean
	files: {
		directory: string
		rosterPrefix: string
		attendancePrefix: string
	}
}

export const sheetNameFor = (tutorialNumber: number) =>
	`Tutorial ${tutorialNumber}`

// `baseDir` anchors a relative files.directory
export const parseConfig = (raw: unknown, baseDir: string): GraderConfig => {
	const parsed = configSchema.safeParse(raw)
	if (!parsed.success) {
		throw new ConfigError(
			'Invalid configuration',
			parsed.error.flatten().fieldErrors
		)
	}

	const data = parsed.data

	return {
		tutorialNumber: data.tutorial_number,
		sheetName: sheetNameFor(data.tutorial_number),
		maxScore: data.max_score,
		overwriteMode: data.overwrite_mode,
		scoringPolicy: data.scoring_policy,
		logFormat: data.log_format,
		blankZeroScores: data.blank_zero_scores,
		files: {
			directory: resolve(baseDir, data.files.directory),
			rosterPrefix: data.files.roster_prefix,
			attendancePrefix: data.files.attendance_prefix,
		},
	}
}

export const readConfig = async (configPath: string): Promise<GraderConfig> => {
	let raw: unknown
	try {
		raw = parse(await readFile(configPath, 'utf-8'))
	} catch (e) {
		throw new ConfigError(`Unable to read configuration ${configPath}`, {}, {
			cause: e,
		})
	}

	return parseConfig(raw, dirname(resolve(configPath)))
}
