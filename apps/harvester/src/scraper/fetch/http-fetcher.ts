/**
 * HTTP Fetcher Implementation
 *
 * One logical GET per call, driven by the retry state machine in ./retry.ts:
 * - 200 returns the body
 * - retryable statuses and transport failures back off exponentially
 * - any other status is abandoned after a single attempt
 *
 * Never throws. Every failure ends as a FetchUnavailable result.
 */

import type { ILogger, LogContext } from '@unitcost/logger'
import { loggers } from '../../config/logger.js'
import { sleep as defaultSleep } from '../../utils/sleep.js'
import type { Sleep } from '../../utils/sleep.js'
import type { Fetcher, FetchImpl, FetchOptions, FetchResult, RetryPolicy } from '../types.js'
import { DEFAULT_RETRY_POLICY, DEFAULT_TIMEOUT_MS } from '../types.js'
import { classifyFetchError } from './errors.js'
import { initialState, resume, transition } from './retry.js'
import type { AttemptingState, AttemptOutcome } from './retry.js'

export interface HttpFetcherOptions {
  /** Retry policy for rate-limit statuses and transport failures */
  retryPolicy?: RetryPolicy

  /** Headers sent identically on every request */
  headers?: Record<string, string>

  /** Default per-attempt timeout */
  timeoutMs?: number

  /** Transport (defaults to the global fetch) */
  fetchImpl?: FetchImpl

  /** Backoff sleep (tests pass a recorder) */
  sleep?: Sleep

  logger?: ILogger
}

type AttemptResult =
  | { outcome: AttemptOutcome & { kind: 'response' }; body?: string }
  | { outcome: AttemptOutcome & { kind: 'transport_error' } }

/**
 * HTTP fetcher with exponential backoff. A single instance is shared by
 * every worker in a run; it holds no per-request state.
 */
export class HttpFetcher implements Fetcher {
  private readonly retryPolicy: RetryPolicy
  private readonly headers: Record<string, string>
  private readonly timeoutMs: number
  private readonly fetchImpl: FetchImpl
  private readonly sleep: Sleep
  private readonly log: ILogger

  constructor(options: HttpFetcherOptions = {}) {
    this.retryPolicy = options.retryPolicy ?? DEFAULT_RETRY_POLICY
    this.headers = { ...(options.headers ?? {}) }
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS
    this.fetchImpl = options.fetchImpl ?? ((url, init) => fetch(url, init))
    this.sleep = options.sleep ?? defaultSleep
    this.log = options.logger ?? loggers.fetch
  }

  async fetch(url: string, options: FetchOptions = {}): Promise<FetchResult> {
    const startTime = Date.now()
    const timeoutMs = options.timeoutMs ?? this.timeoutMs
    const maxAttempts = Math.min(options.maxAttempts ?? this.retryPolicy.maxAttempts, this.retryPolicy.maxAttempts)

    let current: AttemptingState = initialState(this.retryPolicy)
    let lastStatusCode: number | undefined
    let lastError: string | undefined

    for (;;) {
      const result = await this.fetchOnce(url, timeoutMs)
      const next = transition(current, result.outcome, this.retryPolicy, maxAttempts)

      if (result.outcome.kind === 'response') {
        lastStatusCode = result.outcome.statusCode
        lastError = undefined
      } else {
        lastStatusCode = undefined
        lastError = result.outcome.error
        this.logFailure(maxAttempts, 'Request failed', { url, attempt: current.attempt, error: lastError })
      }

      switch (next.state) {
        case 'success':
          return {
            ok: true,
            statusCode: lastStatusCode ?? 200,
            body: 'body' in result && result.body !== undefined ? result.body : '',
            attempts: next.attempt,
            durationMs: Date.now() - startTime,
          }

        case 'abandoned':
          this.logFailure(maxAttempts, 'Unexpected status, not retrying', { url, statusCode: next.statusCode })
          return {
            ok: false,
            reason: 'non_retryable',
            statusCode: next.statusCode,
            error: `HTTP ${next.statusCode}`,
            attempts: next.attempt,
            durationMs: Date.now() - startTime,
          }

        case 'exhausted':
          this.logFailure(maxAttempts, 'Giving up after retries', {
            url,
            attempts: next.attempt,
            statusCode: lastStatusCode,
          })
          return {
            ok: false,
            reason: 'exhausted',
            statusCode: lastStatusCode,
            error: lastError ?? (lastStatusCode !== undefined ? `HTTP ${lastStatusCode}` : undefined),
            attempts: next.attempt,
            durationMs: Date.now() - startTime,
          }

        case 'backoff':
          if (lastStatusCode !== undefined) {
            this.log.warn('Rate limited, backing off', {
              url,
              statusCode: lastStatusCode,
              attempt: next.attempt,
              delayMs: next.delayMs,
            })
          }
          await this.sleep(next.delayMs)
          current = resume(next)
          break

        case 'attempting':
          current = next
          break
      }
    }
  }

  /**
   * Single attempt (no retries). Transport failures come back as values.
   */
  private async fetchOnce(url: string, timeoutMs: number): Promise<AttemptResult> {
    const controller = new AbortController()
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs)

    try {
      const response = await this.fetchImpl(url, {
        method: 'GET',
        headers: this.headers,
        signal: controller.signal,
        redirect: 'follow',
      })

      if (response.status !== 200) {
        await this.discardBody(response)
        return { outcome: { kind: 'response', statusCode: response.status } }
      }

      const body = await response.text()
      return { outcome: { kind: 'response', statusCode: response.status }, body }
    } catch (error) {
      const classified = classifyFetchError(error, timeoutMs)
      return { outcome: { kind: 'transport_error', error: classified.message } }
    } finally {
      clearTimeout(timeoutId)
    }
  }

  /**
   * Single-attempt callers report their own failures, so the fetcher keeps
   * those at debug.
   */
  private logFailure(maxAttempts: number, message: string, meta: LogContext): void {
    if (maxAttempts === 1) {
      this.log.debug(message, meta)
    } else {
      this.log.error(message, meta)
    }
  }

  /**
   * Release the connection behind a response we will not read.
   */
  private async discardBody(response: Response): Promise<void> {
    try {
      await response.body?.cancel()
    } catch (error) {
      this.log.debug('Failed to discard response body', { error: classifyFetchError(error).message })
    }
  }
}
