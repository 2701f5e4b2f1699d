import { readFile } from 'node:fs/promises'
import { AttendanceLogParseError } from './errors'

export const logFormats = ['tagged', 'raw'] as const

export type LogFormat = (typeof logFormats)[number]

// a username as it appears in the bot log, e.g. `#alice`
export type AttendanceToken = string

/**
 * The current bot writes one check-in per line, `<display name>,#<username>`
 * or `#<username>,<rest>`: the line is split at its first comma and the first
 * field starting with `#` is the username.
 *
 * The older bot wrote a bare username per line.
 */
export const parseAttendanceLog = (
	text: string,
	format: LogFormat = 'tagged'
): AttendanceToken[] => {
	const tokens: AttendanceToken[] = []

	text.split(/\r?\n/).forEach((line, i) => {
		if (line.trim() === '') return

		if (format === 'raw') {
			tokens.push(line.trim())
			return
		}

		const token = splitFirst(line, ',')
			.map(field => field.trim())
			.find(field => field.startsWith('#'))

		if (token === undefined) {
			throw new AttendanceLogParseError(
				`No username field on line ${i + 1}: ${JSON.stringify(line)}`
			)
		}

		tokens.push(token)
	})

	return tokens
}

const splitFirst = (line: string, separator: string): string[] => {
	const at = line.indexOf(separator)
	return at === -1 ? [line] : [line.slice(0, at), line.slice(at + 1)]
}

export const readAttendanceLog = async (
	path: string,
	format: LogFormat = 'tagged'
): Promise<AttendanceToken[]> => {
	let text: string
	try {
		text = await readFile(path, 'utf-8')
	} catch (e) {
		throw new AttendanceLogParseError(
			`Unable to read attendance file ${path}`,
			{ cause: e }
		)
	}

	return parseAttendanceLog(text, format)
}
