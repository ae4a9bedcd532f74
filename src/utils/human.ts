/**
 * Human Output Helper
 *
 * Centralizes human-facing console output so it can be toggled globally
 * (suppressed when --json is active). Every human message goes to stderr.
 * Command results that other programs consume, such as the paths printed by
 * `search`, go through humanResult on stdout and are never suppressed.
 */

let humanEnabled = true
let warningsEnabled = true

export function setHumanLoggingEnabled(enabled: boolean): void {
	humanEnabled = enabled
}

/**
 * `-q` silences warnings but not errors.
 */
export function setHumanWarningsEnabled(enabled: boolean): void {
	warningsEnabled = enabled
}

export function humanInfo(...args: Array<unknown>): void {
	if (!humanEnabled) return
	console.error(...args)
}

export function humanWarn(...args: Array<unknown>): void {
	if (!humanEnabled || !warningsEnabled) return
	console.warn(...args)
}

export function humanError(...args: Array<unknown>): void {
	if (!humanEnabled) return
	console.error(...args)
}

export function humanResult(line: string): void {
	process.stdout.write(`${line}\n`)
}

/**
 * Align rows into space-separated columns, first row being the header.
 */
export function formatTable(rows: ReadonlyArray<ReadonlyArray<string | number>>): string {
	const cells = rows.map((row) => row.map((cell) => String(cell)))
	const widths: number[] = []
	for (const row of cells) {
		row.forEach((cell, index) => {
			widths[index] = Math.max(widths[index] ?? 0, cell.length)
		})
	}
	return cells
		.map((row) =>
			row
				.map((cell, index) => (index === row.length - 1 ? cell : cell.padEnd((widths[index] ?? 0) + 2)))
				.join('')
				.trimEnd(),
		)
		.join('\n')
}

/**
 * Human-readable byte count in the style of `du -h` (1024 based, one decimal
 * below 10).
 */
export function formatBytes(bytes: number): string {
	const units = ['B', 'K', 'M', 'G', 'T']
	let value = bytes
	let unit = 0
	while (value >= 1024 && unit < units.length - 1) {
		value /= 1024
		unit++
	}
	if (unit === 0) return `${bytes}B`
	const rounded = value < 10 ? Math.ceil(value * 10) / 10 : Math.ceil(value)
	return `${rounded}${units[unit]}`
}
