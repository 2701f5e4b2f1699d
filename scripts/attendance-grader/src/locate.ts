import { readdir } from 'node:fs/promises'
import { join, resolve } from 'node:path'
import { FileNotFoundError } from './errors'

// first entry in listing order, which the platform does not keep stable
export const findFilePath = async (
	prefix: string,
	directory: string
): Promise<string> => {
	const dir = resolve(directory)
	const entries = await readdir(dir)

	const match = entries.find(name => name.startsWith(prefix))
	if (match === undefined) throw new FileNotFoundError(prefix, dir)

	return join(dir, match)
}
