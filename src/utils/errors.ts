/**
 * Error taxonomy with stable exit codes
 *
 * Environment and precondition failures abort a command before it mutates
 * anything. Per-item failures (a single fetch or scrape) are never thrown;
 * they travel as result values.
 */

export const ExitCode = {
	Success: 0,
	MissingDependency: 1,
	NoConnectivity: 2,
	BadArgument: 3,
	NotARepository: 4,
	UnknownCommand: 5,
	Unexpected: 6,
} as const

export type ExitCodeValue = (typeof ExitCode)[keyof typeof ExitCode]

export abstract class ThumbnailRepoError extends Error {
	abstract readonly exitCode: ExitCodeValue
	readonly details?: string

	constructor(message: string, details?: string) {
		super(message)
		this.name = new.target.name
		this.details = details
	}
}

export class MissingDependencyError extends ThumbnailRepoError {
	readonly exitCode = ExitCode.MissingDependency

	static fromCommands(commands: string[]): MissingDependencyError {
		return new MissingDependencyError(
			`missing dependencies: ${commands.join(', ')}`,
			'Install the listed programs and make sure they are on PATH',
		)
	}
}

export class ConnectivityError extends ThumbnailRepoError {
	readonly exitCode = ExitCode.NoConnectivity

	static fromProbe(host: string, port: number, reason: string): ConnectivityError {
		return new ConnectivityError('no internet connectivity', `Probe of ${host}:${port} failed: ${reason}`)
	}
}

export class BadArgumentError extends ThumbnailRepoError {
	readonly exitCode = ExitCode.BadArgument
}

export class NotARepositoryError extends ThumbnailRepoError {
	readonly exitCode = ExitCode.NotARepository

	static fromPath(dir: string): NotARepositoryError {
		return new NotARepositoryError(
			`not a repository: ${dir}`,
			'Run `ytthumbs init` there, pass -r <dir>, or set DEFAULT_YOUTUBE_THUMBNAIL_REPOSITORY',
		)
	}
}

/**
 * Map any thrown value to the process exit code.
 */
export function exitCodeFor(error: unknown): ExitCodeValue {
	if (error instanceof ThumbnailRepoError) {
		return error.exitCode
	}
	return ExitCode.Unexpected
}

export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error)
}
