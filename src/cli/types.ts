/**
 * CLI Option Types
 *
 * Shared type definitions for all CLI command options. Commander hands
 * option values over as strings; commands parse and validate them.
 */

export type InitOptions = {
	withConfig: boolean
	format: string
	force: boolean
}

export type AddOptions = {
	file?: Array<string>
	as?: string
}

export type DownloadOptions = {
	maxAttempts?: string
	concurrency?: string
}

export type ScrapeOptions = {
	concurrency?: string
}

export type GetOptions = AddOptions & DownloadOptions

export type SearchOptions = {
	long?: boolean
	short?: boolean
	channel?: boolean
	url?: boolean
	path?: boolean
	/** Unset unless --preview or --no-preview was given */
	preview?: boolean
}

export type AbsorbOptions = {
	dryRun: boolean
	delete: boolean
	yes: boolean
}

export type GrabOptions = {
	quality?: string
	best: boolean
	all: boolean
	force: boolean
	count: boolean
	output?: string
}

/**
 * CLI Log Event Metadata
 */
export type CLILogMeta = {
	command: string
	phase: 'start' | 'progress' | 'summary' | 'warning' | 'error'
	message?: string
	options?: Record<string, unknown>
	metrics?: Record<string, unknown>
	error?: { type?: string; message: string; stack?: string }
	context?: Record<string, unknown>
	exitCode?: number
}

/**
 * Global CLI options from Commander program
 */
export type GlobalOptions = {
	verbose: boolean
	quiet: boolean
	json: boolean
	/** false under --no-progress */
	progress: boolean
	repository?: string
	config?: string
}
