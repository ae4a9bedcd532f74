/**
 * CLI Services
 *
 * The outside world as the commands see it: working directory, environment,
 * network, terminal tools and the exit status. createProgram() takes these
 * so tests can run every command in process against stand-ins.
 */

import type { Config } from '../config/schema.js'
import { type ConnectivityProbe, probeTcp } from '../net/connectivity.js'
import { createHttpClient, type HttpClient } from '../net/http.js'
import { type Confirmer, FixedConfirmer, ReadlineConfirmer } from '../terminal/confirm.js'
import { ExternalEditor, type TextEditor } from '../terminal/editor.js'
import { findExecutable } from '../terminal/process.js'
import { FzfSelector, type InteractiveSelector } from '../terminal/selector.js'

export type CliServices = {
	cwd: () => string
	env: NodeJS.ProcessEnv
	http: (config: Config) => HttpClient
	probe: ConnectivityProbe
	locate: (name: string) => Promise<string | null>
	selector: () => InteractiveSelector
	/** @throws MissingDependencyError when no editor is configured */
	editor: () => TextEditor
	confirmer: (assumeYes: boolean) => Confirmer
	exit: (code: number) => void
}

export function createHttpForConfig(config: Config): HttpClient {
	return createHttpClient({
		timeoutMs: config.download.timeoutMs,
		maxRetries: config.download.maxRetries,
		requestDelayMs: config.download.requestDelayMs,
		userAgent: config.scrape.userAgent,
	})
}

export function defaultServices(): CliServices {
	return {
		cwd: () => process.cwd(),
		env: process.env,
		http: createHttpForConfig,
		probe: probeTcp,
		locate: (name) => findExecutable(name, process.env),
		selector: () => new FzfSelector(),
		editor: () => ExternalEditor.fromEnv(process.env),
		confirmer: (assumeYes) => (assumeYes ? new FixedConfirmer(true) : new ReadlineConfirmer()),
		exit: (code) => {
			process.exitCode = code
		},
	}
}
