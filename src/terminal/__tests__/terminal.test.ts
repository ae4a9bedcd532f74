import { describe, expect, it } from 'vitest'

import { MissingDependencyError } from '#utils/errors'

import { FixedConfirmer, isAffirmative } from '../confirm'
import { editorFromEnv, stripComments } from '../editor'
import { requireExecutables } from '../process'
import { ChafaRenderer } from '../renderer'
import { FzfSelector, formatSelectorLines, parseSelectorOutput } from '../selector'

describe('selector wire format', () => {
	it('formats items as tab separated lines with tabs in labels flattened', () => {
		const lines = formatSelectorLines([
			{ key: 'AAAAAAAAAAA', label: 'A\ttitle', previewPath: '/r/longs/AAAAAAAAAAA.jpg', form: 'long' },
			{ key: 'BBBBBBBBBBB', label: 'B title' },
		])

		expect(lines).toBe('AAAAAAAAAAA\tA title\t/r/longs/AAAAAAAAAAA.jpg\tlong\nBBBBBBBBBBB\tB title\t\t')
	})

	it('parses accepted lines back to keys', () => {
		expect(parseSelectorOutput('AAAAAAAAAAA\tA\tp\tlong\nBBBBBBBBBBB\tB\tp\tshort\n', [])).toEqual({
			kind: 'accept',
			keys: ['AAAAAAAAAAA', 'BBBBBBBBBBB'],
		})
	})

	it('parses an action key from the first line when action keys are in use', () => {
		expect(parseSelectorOutput('ctrl-d\nAAAAAAAAAAA\tA\tp\tlong\n', ['ctrl-d'])).toEqual({
			kind: 'action',
			action: 'ctrl-d',
			keys: ['AAAAAAAAAAA'],
		})
		expect(parseSelectorOutput('\nAAAAAAAAAAA\tA\tp\tlong\n', ['ctrl-d'])).toEqual({
			kind: 'accept',
			keys: ['AAAAAAAAAAA'],
		})
	})

	it('treats empty output as cancel', () => {
		expect(parseSelectorOutput('', [])).toEqual({ kind: 'cancel' })
	})

	it('builds fzf arguments with preview and action keys', () => {
		const args = new FzfSelector().buildArgs({
			items: [],
			multi: true,
			actionKeys: ['ctrl-d'],
			preview: new ChafaRenderer(),
		})

		expect(args).toEqual([
			'--delimiter=\t',
			'--with-nth=2',
			'--bind',
			'ctrl-space:refresh-preview',
			'--multi',
			'--expect=ctrl-d',
			'--preview',
			'chafa --view-size "${FZF_PREVIEW_COLUMNS}x${FZF_PREVIEW_LINES}" --align center,center {3}',
		])
	})
})

describe('ChafaRenderer', () => {
	it('crops shorts through convert when asked to', () => {
		const renderer = new ChafaRenderer({ cropShorts: true })

		expect(renderer.previewCommand({ path: '{3}', form: '{4}' })).toBe(
			'if [ {4} = short ]; ' +
				'then convert {3} -gravity center -crop 9:16 +repage - | chafa --view-size "${FZF_PREVIEW_COLUMNS}x${FZF_PREVIEW_LINES}" --align center,center -; ' +
				'else chafa --view-size "${FZF_PREVIEW_COLUMNS}x${FZF_PREVIEW_LINES}" --align center,center {3}; fi',
		)
		expect(renderer.requiredExecutables()).toEqual(['chafa', 'convert'])
	})
})

describe('editor', () => {
	it('prefers VISUAL over EDITOR', () => {
		expect(editorFromEnv({ VISUAL: 'nvim', EDITOR: 'nano' })).toBe('nvim')
		expect(editorFromEnv({ EDITOR: 'nano' })).toBe('nano')
		expect(editorFromEnv({ EDITOR: '  ' })).toBeNull()
	})

	it('drops comment lines from the buffer', () => {
		expect(stripComments('https://youtu.be/AAAAAAAAAAA\n  # note\n# help\nBBBBBBBBBBB')).toBe(
			'https://youtu.be/AAAAAAAAAAA\nBBBBBBBBBBB',
		)
	})
})

describe('requireExecutables', () => {
	it('names every missing program', async () => {
		const locate = async (name: string) => (name === 'fzf' ? '/usr/bin/fzf' : null)

		await expect(requireExecutables(['fzf', 'chafa', 'convert'], locate)).rejects.toThrow(
			'missing dependencies: chafa, convert',
		)
		await expect(requireExecutables(['fzf', 'chafa'], locate)).rejects.toBeInstanceOf(MissingDependencyError)
	})

	it('passes when everything is present', async () => {
		await expect(requireExecutables(['fzf'], async () => '/usr/bin/fzf')).resolves.toBeUndefined()
	})
})

describe('confirmers', () => {
	it('accepts y and yes in any case', () => {
		expect(isAffirmative('Y')).toBe(true)
		expect(isAffirmative(' yes ')).toBe(true)
		expect(isAffirmative('')).toBe(false)
		expect(isAffirmative('no')).toBe(false)
	})

	it('answers with a fixed value', async () => {
		expect(await new FixedConfirmer(false).confirm()).toBe(false)
	})
})
