/**
 * HTTP client
 *
 * Bounded GET requests returning bytes or a failure value:
 * - every request carries an AbortSignal timeout
 * - a minimum delay between consecutive requests (requestDelayMs)
 * - 429 and 5xx are retried with exponential backoff and ±25% jitter,
 *   honoring Retry-After; 404 and other 4xx fail immediately
 *
 * Failures are returned, never thrown: a missing thumbnail level is an
 * expected outcome, not an exception.
 */

import { createLogger } from '#utils/logger'

// ============================================================================
// Types
// ============================================================================

export type HttpResponse =
  | { ok: true; status: number; body: Buffer; contentType: string | null }
  | { ok: false; status: number | null; error: string }

export type HttpRequestOptions = {
  timeoutMs?: number
  headers?: Record<string, string>
}

export interface HttpClient {
  get(url: string, options?: HttpRequestOptions): Promise<HttpResponse>
}

export type FetchHttpClientConfig = {
  timeoutMs: number
  maxRetries: number
  requestDelayMs: number
  /** Base of the exponential backoff in ms (2^attempt * base) */
  backoffBaseMs: number
  userAgent?: string
  fetchImpl?: typeof fetch
  sleep?: (ms: number) => Promise<void>
}

const logger = createLogger('net:http')

// ============================================================================
// Retry helpers
// ============================================================================

export function is5xx(status: number): boolean {
  return status >= 500 && status < 600
}

export function isRetryableStatus(status: number): boolean {
  return status === 429 || is5xx(status)
}

/**
 * Parse Retry-After (integer seconds or HTTP date) into ms, or null
 */
export function parseRetryAfter(value: string | null, now: number = Date.now()): number | null {
  if (value === null) return null
  const trimmed = value.trim()
  if (/^\d+$/.test(trimmed)) {
    return Number.parseInt(trimmed, 10) * 1000
  }
  const date = Date.parse(trimmed)
  if (Number.isNaN(date)) return null
  return Math.max(0, date - now)
}

/**
 * 2^attempt * base, ±25% jitter
 */
export function backoffDelay(attempt: number, baseMs: number, random: () => number = Math.random): number {
  const delay = Math.pow(2, attempt) * baseMs
  const jitter = (random() - 0.5) * 2 * delay * 0.25
  return Math.round(delay + jitter)
}

const defaultSleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms))

// ============================================================================
// Client
// ============================================================================

export class FetchHttpClient implements HttpClient {
  private readonly config: FetchHttpClientConfig
  private readonly fetchImpl: typeof fetch
  private readonly sleep: (ms: number) => Promise<void>
  private lastCallTime: number | null = null

  constructor(partialConfig: Partial<FetchHttpClientConfig> = {}) {
    this.config = {
      timeoutMs: partialConfig.timeoutMs ?? 15000,
      maxRetries: partialConfig.maxRetries ?? 2,
      requestDelayMs: partialConfig.requestDelayMs ?? 0,
      backoffBaseMs: partialConfig.backoffBaseMs ?? 1000,
      userAgent: partialConfig.userAgent,
    }
    if (this.config.maxRetries < 0) throw new Error('maxRetries must be non-negative')
    if (this.config.requestDelayMs < 0) throw new Error('requestDelayMs must be non-negative')
    this.fetchImpl = partialConfig.fetchImpl ?? fetch
    this.sleep = partialConfig.sleep ?? defaultSleep
  }

  public async get(url: string, options: HttpRequestOptions = {}): Promise<HttpResponse> {
    const timeoutMs = options.timeoutMs ?? this.config.timeoutMs
    const headers: Record<string, string> = { ...options.headers }
    if (this.config.userAgent && !headers['User-Agent']) {
      headers['User-Agent'] = this.config.userAgent
    }

    let attempt = 0
    for (;;) {
      await this.pace()
      const result = await this.attempt(url, headers, timeoutMs)

      if (result.response.ok || attempt >= this.config.maxRetries || !result.retryable) {
        return result.response
      }

      attempt++
      const delayMs = result.retryAfterMs ?? backoffDelay(attempt, this.config.backoffBaseMs)
      logger.debug('retrying request', { url, attempt, delayMs, status: result.response.status })
      await this.sleep(delayMs)
    }
  }

  private async pace(): Promise<void> {
    if (this.lastCallTime !== null && this.config.requestDelayMs > 0) {
      const wait = this.config.requestDelayMs - (Date.now() - this.lastCallTime)
      if (wait > 0) await this.sleep(wait)
    }
    this.lastCallTime = Date.now()
  }

  private async attempt(
    url: string,
    headers: Record<string, string>,
    timeoutMs: number,
  ): Promise<{ response: HttpResponse; retryable: boolean; retryAfterMs: number | null }> {
    try {
      const response = await this.fetchImpl(url, {
        headers,
        redirect: 'follow',
        signal: AbortSignal.timeout(timeoutMs),
      })

      if (!response.ok) {
        return {
          response: { ok: false, status: response.status, error: `HTTP ${response.status}` },
          retryable: isRetryableStatus(response.status),
          retryAfterMs: parseRetryAfter(response.headers.get('Retry-After')),
        }
      }

      const body = Buffer.from(await response.arrayBuffer())
      return {
        response: { ok: true, status: response.status, body, contentType: response.headers.get('Content-Type') },
        retryable: false,
        retryAfterMs: null,
      }
    } catch (error) {
      const message =
        error instanceof Error && error.name === 'TimeoutError'
          ? `timed out after ${timeoutMs}ms`
          : error instanceof Error
            ? error.message
            : String(error)
      return {
        response: { ok: false, status: null, error: message },
        retryable: true,
        retryAfterMs: null,
      }
    }
  }
}

export function createHttpClient(config?: Partial<FetchHttpClientConfig>): HttpClient {
  return new FetchHttpClient(config)
}
