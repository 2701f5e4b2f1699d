import { writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { parseConfig, readConfig } from './config'
import { ConfigError } from './errors'
import { makeTempDir, removeTempDir } from './test-utils'

const files = { roster_prefix: 'tutorials_merged', attendance_prefix: 'bot_input' }

describe('parseConfig', () => {
	it('fills in defaults', () => {
		expect(parseConfig({ tutorial_number: 6, files }, '/course')).toEqual({
			tutorialNumber: 6,
			sheetName: 'Tutorial 6',
			maxScore: 2,
			overwriteMode: true,
			scoringPolicy: 'occurrence',
			logFormat: 'tagged',
			blankZeroScores: true,
			files: {
				directory: '/course',
				rosterPrefix: 'tutorials_merged',
				attendancePrefix: 'bot_input',
			},
		})
	})

	it('resolves the directory against the base directory', () => {
		const config = parseConfig(
			{ tutorial_number: 1, files: { ...files, directory: 'week1' } },
			'/course'
		)

		expect(config.files.directory).toBe('/course/week1')
	})

	it('reports invalid fields', () => {
		const error = (() => {
			try {
				parseConfig({ tutorial_number: 0, scoring_policy: 'sum', files }, '/')
			} catch (e) {
				return e
			}
		})()

		expect(error).toBeInstanceOf(ConfigError)
		expect(error).toHaveProperty('fieldErrors.tutorial_number', [
			'Number must be greater than 0',
		])
		expect(error).toHaveProperty('fieldErrors.scoring_policy')
		expect(error).not.toHaveProperty('fieldErrors.files')
	})

	it('requires the file prefixes', () => {
		expect(() => parseConfig({ tutorial_number: 6 }, '/')).toThrow(ConfigError)
	})
})

describe('readConfig', () => {
	let dir: string

	beforeEach(async () => {
		dir = await makeTempDir()
	})

	afterEach(async () => {
		await removeTempDir(dir)
	})

	it('reads a TOML file', async () => {
		const path = join(dir, 'grader.toml')
		await writeFile(
			path,
			[
				'tutorial_number = 3',
				'max_score = 4',
				'overwrite_mode = false',
				'scoring_policy = "first-attendance"',
				'log_format = "raw"',
				'',
				'[files]',
				'roster_prefix = "roster"',
				'attendance_prefix = "log"',
			].join('\n')
		)

		const config = await readConfig(path)

		expect(config).toMatchObject({
			sheetName: 'Tutorial 3',
			maxScore: 4,
			overwriteMode: false,
			scoringPolicy: 'first-attendance',
			logFormat: 'raw',
			files: { directory: dir },
		})
	})

	it('wraps TOML syntax errors', async () => {
		const path = join(dir, 'grader.toml')
		await writeFile(path, 'tutorial_number = = 3')

		await expect(readConfig(path)).rejects.toBeInstanceOf(ConfigError)
	})
})
