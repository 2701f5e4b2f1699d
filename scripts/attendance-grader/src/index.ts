import { dirname, join, resolve } from 'node:path'
import { fileURLToPath } from 'node:url'
import { parseArgs } from 'node:util'
import { readConfig } from './config'
import { ConfigError } from './errors'
import { AttendanceGrader } from './grader'
import { findFilePath } from './locate'
import { confirm } from './prompt'

const dir = dirname(fileURLToPath(import.meta.url))
const defaultConfigPath = join(dir, '../../..', 'grader.toml')

const main = async () => {
	const { values, positionals } = parseArgs({
		allowPositionals: true,
		options: { yes: { type: 'boolean', short: 'y', default: false } },
	})

	const config = await readConfig(
		positionals[0] ? resolve(positionals[0]) : defaultConfigPath
	)
	const { directory, rosterPrefix, attendancePrefix } = config.files

	const roster = await findFilePath(rosterPrefix, directory)
	console.log(`Found file: ${rosterPrefix} at ${roster}!`)
	const attendance = await findFilePath(attendancePrefix, directory)
	console.log(`Found file: ${attendancePrefix} at ${attendance}!`)

	if (!config.overwriteMode) {
		console.warn(
			`WARNING: You are about to perform an operation that will reset all existing scores in Sheet ${config.tutorialNumber}.`
		)

		if (!values.yes && !(await confirm('Do you wish to continue (Y/n)?: '))) {
			console.log('Aborting...')
			return
		}
		console.log('Continuing...')
	} else {
		console.log(
			`Updating scores in Sheet ${config.tutorialNumber} - (${config.sheetName})...`
		)
	}

	await new AttendanceGrader(config, { roster, attendance }).run()
}

try {
	await main()
} catch (e) {
	if (e instanceof ConfigError) {
		console.error(`${e.message}:`, e.fieldErrors)
	} else {
		console.error(e instanceof Error ? `${e.name}: ${e.message}` : e)
	}
	process.exitCode = 1
}
