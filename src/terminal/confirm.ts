/**
 * Yes/no confirmation
 *
 * Prompts go to stderr; stdout carries command results only.
 */

import { createInterface } from 'node:readline/promises'

export interface Confirmer {
	confirm(question: string): Promise<boolean>
}

export function isAffirmative(answer: string): boolean {
	return /^(y|yes)$/i.test(answer.trim())
}

export class ReadlineConfirmer implements Confirmer {
	async confirm(question: string): Promise<boolean> {
		const rl = createInterface({ input: process.stdin, output: process.stderr })
		try {
			return isAffirmative(await rl.question(`${question} [y/N] `))
		} finally {
			rl.close()
		}
	}
}

/**
 * Answers every question the same way (for --yes and non-interactive runs).
 */
export class FixedConfirmer implements Confirmer {
	constructor(private readonly answer: boolean) {}

	async confirm(): Promise<boolean> {
		return this.answer
	}
}
