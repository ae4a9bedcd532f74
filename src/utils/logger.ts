/**
 * Structured JSON Logger (Pino + JSONL)
 *
 * - Uses Pino for JSON logging to stderr (stdout is reserved for command
 *   results such as `search` paths)
 * - Writes JSON Lines to ./logs/YYYY-MM-DD.jsonl when enabled
 * - Stable keys: ts, level, component, msg, context, pid, ver, seq
 *
 * Environment variables:
 *  LOG_LEVEL=debug|info|warn|error  minimum level (default warn, error under tests)
 *  LOG_FORMAT=json|pretty           pretty prints through pino-pretty when set to pretty
 *  LOG_TO_FILE=true|false           write JSONL to ./logs (default false)
 */

import { AsyncLocalStorage } from 'node:async_hooks'
import fs from 'node:fs'
import path from 'node:path'
import { fileURLToPath } from 'node:url'

import pino, { type Logger as PinoLogger } from 'pino'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export type LogEntry = {
  ts: string
  level: LogLevel
  component: string
  msg: string
  context?: Record<string, unknown>
  pid: number
  ver?: string
  seq: number
  correlationId?: string
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
}

let sequenceCounter = 0
let cachedVersion: string | undefined
const correlationStore = new AsyncLocalStorage<string>()

function loadVersion(): string {
  if (cachedVersion) return cachedVersion
  try {
    const pkgPath = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '../../package.json')
    const parsed: unknown = JSON.parse(fs.readFileSync(pkgPath, 'utf-8'))
    const version =
      typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string'
        ? parsed.version
        : '0.0.0'
    cachedVersion = version
  } catch {
    cachedVersion = '0.0.0'
  }
  return cachedVersion
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error'
}

const isTestEnv = process.env.VITEST === 'true' || process.env.NODE_ENV === 'test'
const shouldWriteFile = () => (process.env.LOG_TO_FILE ?? 'false') === 'true'

const envLevel = process.env.LOG_LEVEL
const baseLevel: LogLevel = isLogLevel(envLevel) ? envLevel : isTestEnv ? 'error' : 'warn'

// stderr logger via Pino
const pinoStderr: PinoLogger =
  process.env.LOG_FORMAT === 'pretty'
    ? pino(
        { level: baseLevel, base: null },
        pino.transport({
          target: 'pino-pretty',
          options: { colorize: true, singleLine: true, destination: 2 },
        }),
      )
    : pino({ level: baseLevel, base: null }, pino.destination(2))

// JSONL file stream (lazy)
let fileStream: fs.WriteStream | undefined
let fileDate: string | undefined
function ensureFileStream(): void {
  const nowDate = new Date().toISOString().slice(0, 10)
  if (fileStream && fileDate === nowDate) return
  try {
    const logsDir = path.resolve(process.cwd(), 'logs')
    fs.mkdirSync(logsDir, { recursive: true })
    const filePath = path.join(logsDir, `${nowDate}.jsonl`)
    if (fileStream) fileStream.end()
    fileStream = fs.createWriteStream(filePath, { flags: 'a' })
    fileDate = nowDate
  } catch (error) {
    fileStream = undefined
    fileDate = undefined
    pinoStderr.warn({ error: error instanceof Error ? error.message : String(error) }, 'log file sink disabled')
  }
}

export function log(
  component: string,
  level: LogLevel,
  msg: string,
  context?: Record<string, unknown>,
): void {
  if (!shouldLog(level)) return
  const effectiveCorrelationId = getCorrelationId()
  const entry: LogEntry = {
    ts: new Date().toISOString(),
    level,
    component,
    msg,
    pid: process.pid,
    ver: loadVersion(),
    seq: ++sequenceCounter,
    ...(effectiveCorrelationId ? { correlationId: effectiveCorrelationId } : {}),
    ...(context ? { context } : {}),
  }

  // 1) stderr via Pino
  const bindings: Record<string, unknown> = {
    component,
    ver: entry.ver,
    seq: entry.seq,
  }
  if (entry.correlationId) bindings.correlationId = entry.correlationId
  const logger = pinoStderr.child(bindings)
  logger[level](context ?? {}, msg)

  // 2) JSONL file sink
  if (shouldWriteFile()) {
    ensureFileStream()
    if (fileStream) fileStream.write(`${JSON.stringify(entry)}\n`)
  }

  // 3) Custom sinks (if any registered)
  for (const sink of sinks) sink(entry)
}

export type ComponentLogger = {
  debug: (msg: string, context?: Record<string, unknown>) => void
  info: (msg: string, context?: Record<string, unknown>) => void
  warn: (msg: string, context?: Record<string, unknown>) => void
  error: (msg: string, context?: Record<string, unknown>) => void
}

export function createLogger(component: string): ComponentLogger {
  return {
    debug: (msg, context) => log(component, 'debug', msg, context),
    info: (msg, context) => log(component, 'info', msg, context),
    warn: (msg, context) => log(component, 'warn', msg, context),
    error: (msg, context) => log(component, 'error', msg, context),
  }
}

export type LogSink = (entry: LogEntry) => void
let sinks: LogSink[] = []
export function registerSink(sink: LogSink): void {
  sinks.push(sink)
}
export function clearSinks(): void {
  sinks = []
}

// Correlation ID management
export function getCorrelationId(): string | undefined {
  return correlationStore.getStore()
}

export async function withCorrelationId<T>(id: string, fn: () => Promise<T> | T): Promise<T> {
  return await correlationStore.run(id, async () => await fn())
}

// Dynamic log level control
let dynamicLevel: LogLevel | undefined
export function setLogLevel(level: LogLevel): void {
  dynamicLevel = level
  pinoStderr.level = level
}

export function getLogLevel(): LogLevel {
  return dynamicLevel ?? baseLevel
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[getLogLevel()]
}
