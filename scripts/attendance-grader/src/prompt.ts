import { createInterface } from 'node:readline/promises'

export const isConfirmation = (answer: string) =>
	['y', 'yes'].includes(answer.trim().toLowerCase())

// a closed input (piped stdin, ctrl-d) counts as "no"
export const confirm = async (
	question: string,
	input: NodeJS.ReadableStream = process.stdin,
	output: NodeJS.WritableStream = process.stdout
): Promise<boolean> => {
	const rl = createInterface({ input, output })

	const closed = new Promise<string>(resolve => {
		rl.once('close', () => resolve(''))
	})
	const answered = rl.question(question).catch(() => '')

	try {
		return isConfirmation(await Promise.race([answered, closed]))
	} finally {
		rl.close()
	}
}
