/**
 * Interactive selection surface
 *
 * The search engine talks to InteractiveSelector only; FzfSelector is the
 * terminal implementation. Items travel to fzf as tab-separated lines
 * `key<TAB>label<TAB>previewPath<TAB>form`, of which only the label is shown.
 */

import { createLogger } from '#utils/logger'

import type { ImageRenderer } from './renderer.js'
import { runInteractive } from './process.js'

const logger = createLogger('terminal:selector')

export type SelectorItem = {
	key: string
	label: string
	previewPath?: string
	form?: string
}

export type SelectorRequest = {
	items: ReadonlyArray<SelectorItem>
	multi: boolean
	prompt?: string
	header?: string
	/** Extra keys that end selection with an action instead of accepting */
	actionKeys?: ReadonlyArray<string>
	preview?: ImageRenderer | null
}

export type SelectorResult =
	| { kind: 'accept'; keys: string[] }
	| { kind: 'action'; action: string; keys: string[] }
	| { kind: 'cancel' }

export interface InteractiveSelector {
	select(request: SelectorRequest): Promise<SelectorResult>
}

function sanitizeField(value: string): string {
	return value.replace(/[\t\r\n]+/g, ' ')
}

export function formatSelectorLines(items: ReadonlyArray<SelectorItem>): string {
	return items
		.map((item) =>
			[item.key, item.label, item.previewPath ?? '', item.form ?? ''].map(sanitizeField).join('\t'),
		)
		.join('\n')
}

/**
 * Decode fzf output. With `--expect` the first line is the key that ended
 * selection (empty for enter) and the rest are the chosen lines.
 */
export function parseSelectorOutput(stdout: string, actionKeys: ReadonlyArray<string>): SelectorResult {
	const lines = stdout.split('\n')
	const pressed = actionKeys.length > 0 ? (lines.shift() ?? '') : ''
	const keys = lines
		.filter((line) => line.length > 0)
		.map((line) => line.split('\t')[0] ?? line)

	if (pressed && actionKeys.includes(pressed)) {
		return { kind: 'action', action: pressed, keys }
	}
	return keys.length > 0 ? { kind: 'accept', keys } : { kind: 'cancel' }
}

export class FzfSelector implements InteractiveSelector {
	constructor(private readonly command = 'fzf') {}

	buildArgs(request: SelectorRequest): string[] {
		const args = ['--delimiter=\t', '--with-nth=2', '--bind', 'ctrl-space:refresh-preview']
		if (request.multi) args.push('--multi')
		if (request.prompt) args.push(`--prompt=${request.prompt}`)
		if (request.header) args.push(`--header=${request.header}`)
		if (request.actionKeys && request.actionKeys.length > 0) {
			args.push(`--expect=${request.actionKeys.join(',')}`)
		}
		if (request.preview) {
			args.push('--preview', request.preview.previewCommand({ path: '{3}', form: '{4}' }))
		}
		return args
	}

	async select(request: SelectorRequest): Promise<SelectorResult> {
		if (request.items.length === 0) return { kind: 'cancel' }

		const { exitCode, stdout } = await runInteractive(this.command, this.buildArgs(request), {
			input: `${formatSelectorLines(request.items)}\n`,
		})

		// 1: no match, 130: interrupted
		if (exitCode === 1 || exitCode === 130) {
			return { kind: 'cancel' }
		}
		if (exitCode !== 0) {
			throw new Error(`${this.command} exited with code ${exitCode}`)
		}

		const result = parseSelectorOutput(stdout, request.actionKeys ?? [])
		logger.debug('selection finished', { kind: result.kind, count: result.kind === 'cancel' ? 0 : result.keys.length })
		return result
	}
}
