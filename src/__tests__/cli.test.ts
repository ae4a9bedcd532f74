import { describe, expect, it } from 'vitest'

import {
	type Config,
	createProgram,
	DEFAULT_CONFIG,
	ExitCode,
	extractVideoReferences,
	loadConfig,
	openRepository,
	type ThumbnailEntry,
} from '../index.js'

describe('library surface', () => {
	it('exports loadConfig function', () => {
		expect(typeof loadConfig).toBe('function')
	})

	it('exports openRepository function', () => {
		expect(typeof openRepository).toBe('function')
	})

	it('exports the link extractor', () => {
		expect(extractVideoReferences('https://youtu.be/AAAAAAAAAAA').references).toEqual([
			{ id: 'AAAAAAAAAAA', form: 'long' },
		])
	})

	it('exports stable exit codes', () => {
		expect(ExitCode).toEqual({
			Success: 0,
			MissingDependency: 1,
			NoConnectivity: 2,
			BadArgument: 3,
			NotARepository: 4,
			UnknownCommand: 5,
			Unexpected: 6,
		})
	})

	it('exports a program with every command registered', () => {
		const names = createProgram().commands.map((command) => command.name())
		expect(names).toEqual([
			'init',
			'add',
			'exec',
			'scrape',
			'get',
			'stats',
			'search',
			'absorb',
			'troubleshoot',
			'grab',
			'delete',
		])
	})

	it('exports Config type with schema defaults', () => {
		const config: Config = DEFAULT_CONFIG
		expect(config.download.maxAttempts).toBe(1)
		expect(config.search.output).toBe('path')
	})

	it('exports ThumbnailEntry type (compile-time type check)', () => {
		const entry: Partial<ThumbnailEntry> = { id: 'AAAAAAAAAAA', form: 'short' }
		expect(entry).toBeDefined()
	})
})
