/**
 * Child process helpers for the interactive tools (fzf, chafa, the editor)
 */

import { spawn } from 'node:child_process'
import { constants } from 'node:fs'
import { access } from 'node:fs/promises'
import path from 'node:path'

import { MissingDependencyError } from '#utils/errors'

export type ProcessResult = { exitCode: number; stdout: string }

/**
 * Run a program with its UI on the terminal: stdin is fed from `input`
 * (or inherited), stdout is captured, stderr is inherited.
 */
export function runInteractive(
  command: string,
  args: ReadonlyArray<string>,
  options: { input?: string; env?: NodeJS.ProcessEnv } = {},
): Promise<ProcessResult> {
  return new Promise((resolve, reject) => {
    const proc = spawn(command, [...args], {
      stdio: [options.input === undefined ? 'inherit' : 'pipe', 'pipe', 'inherit'],
      env: options.env ?? process.env,
    })

    let stdout = ''
    proc.stdout?.on('data', (data: Buffer) => {
      stdout += data.toString()
    })

    proc.on('error', reject)
    proc.on('close', (code) => resolve({ exitCode: code ?? -1, stdout }))

    if (options.input !== undefined && proc.stdin) {
      proc.stdin.on('error', reject)
      proc.stdin.end(options.input)
    }
  })
}

/**
 * Run a program attached to the terminal and wait for it to exit.
 */
export function runAttached(command: string, args: ReadonlyArray<string>): Promise<number> {
  return new Promise((resolve, reject) => {
    const proc = spawn(command, [...args], { stdio: 'inherit' })
    proc.on('error', reject)
    proc.on('close', (code) => resolve(code ?? -1))
  })
}

/**
 * Locate a program on PATH.
 */
export async function findExecutable(name: string, env: NodeJS.ProcessEnv = process.env): Promise<string | null> {
  if (name.includes(path.sep)) {
    return (await isExecutable(name)) ? name : null
  }
  for (const dir of (env.PATH ?? '').split(path.delimiter)) {
    if (!dir) continue
    const candidate = path.join(dir, name)
    if (await isExecutable(candidate)) return candidate
  }
  return null
}

async function isExecutable(filePath: string): Promise<boolean> {
  try {
    await access(filePath, constants.X_OK)
    return true
  } catch {
    return false
  }
}

/**
 * @throws MissingDependencyError naming every program that is not on PATH
 */
export async function requireExecutables(
  names: ReadonlyArray<string>,
  locate: (name: string) => Promise<string | null> = findExecutable,
): Promise<void> {
  const missing: string[] = []
  for (const name of names) {
    if ((await locate(name)) === null) missing.push(name)
  }
  if (missing.length > 0) {
    throw MissingDependencyError.fromCommands(missing)
  }
}
