/**
 * Text entry through the user's editor
 */

import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import path from 'node:path'

import { MissingDependencyError } from '#utils/errors'

import { runAttached } from './process.js'

export interface TextEditor {
	/** Open a buffer holding `initial` and resolve with its saved contents */
	edit(initial: string): Promise<string>
}

/**
 * The editor command from the environment, VISUAL before EDITOR.
 */
export function editorFromEnv(env: NodeJS.ProcessEnv = process.env): string | null {
	const command = env.VISUAL?.trim() || env.EDITOR?.trim()
	return command ? command : null
}

export const LINK_BUFFER_TEMPLATE = `
# Paste YouTube links above, as many per line as you like.
# Lines starting with # are ignored. Save and quit to index them.
`

export class ExternalEditor implements TextEditor {
	constructor(private readonly command: string) {}

	static fromEnv(env: NodeJS.ProcessEnv = process.env): ExternalEditor {
		const command = editorFromEnv(env)
		if (!command) {
			throw new MissingDependencyError(
				'no editor configured',
				'Set EDITOR or VISUAL, or pass link files with --file',
			)
		}
		return new ExternalEditor(command)
	}

	async edit(initial: string): Promise<string> {
		const dir = await mkdtemp(path.join(tmpdir(), 'ytthumbs-edit-'))
		const file = path.join(dir, 'links.txt')
		try {
			await writeFile(file, initial, 'utf-8')
			// EDITOR may carry flags, e.g. "code --wait"
			const [program = this.command, ...args] = this.command.split(/\s+/)
			const exitCode = await runAttached(program, [...args, file])
			if (exitCode !== 0) {
				throw new Error(`editor exited with code ${exitCode}`)
			}
			return stripComments(await readFile(file, 'utf-8'))
		} finally {
			await rm(dir, { recursive: true, force: true })
		}
	}
}

export function stripComments(text: string): string {
	return text
		.split('\n')
		.filter((line) => !line.trimStart().startsWith('#'))
		.join('\n')
}
