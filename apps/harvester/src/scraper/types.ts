/**
 * Scraper Core Types
 *
 * Fetch contract shared by the catalog extractors: the Fetcher interface,
 * its result union, and the retry policy that drives backoff.
 */

// ═══════════════════════════════════════════════════════════════════════════════
// Fetch Result
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Why a fetch ended without content.
 * - exhausted: every attempt hit a retryable status or a transport failure
 * - non_retryable: a status outside the retryable set, abandoned on the spot
 */
export type UnavailableReason = 'exhausted' | 'non_retryable'

export interface FetchSuccess {
  ok: true
  statusCode: number
  body: string
  attempts: number
  durationMs: number
}

/**
 * Terminal failure of one logical retrieval. The fetcher never throws;
 * callers turn this into an empty listing or a zero cost.
 */
export interface FetchUnavailable {
  ok: false
  reason: UnavailableReason
  statusCode?: number
  error?: string
  attempts: number
  durationMs: number
}

export type FetchResult = FetchSuccess | FetchUnavailable

// ═══════════════════════════════════════════════════════════════════════════════
// Fetcher Interface
// ═══════════════════════════════════════════════════════════════════════════════

export interface FetchOptions {
  /** Per-attempt timeout in ms */
  timeoutMs?: number

  /** Cap on attempts for this call; never raises the policy's own cap */
  maxAttempts?: number
}

/**
 * One logical GET with retries. Implementations must be safe to call
 * concurrently from several workers.
 */
export interface Fetcher {
  fetch(url: string, options?: FetchOptions): Promise<FetchResult>
}

/**
 * Transport used by HttpFetcher. The global fetch satisfies it; tests pass
 * a stub that replays canned responses.
 */
export type FetchImpl = (url: string, init: RequestInit) => Promise<Response>

// ═══════════════════════════════════════════════════════════════════════════════
// Retry Policy
// ═══════════════════════════════════════════════════════════════════════════════

export interface RetryPolicy {
  maxAttempts: number // Default: 5
  initialDelayMs: number // Default: 1000
  maxDelayMs: number // Default: 30000
  backoffMultiplier: number // Default: 2
  retryableStatusCodes: number[] // Default: [403, 405, 429]
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 5,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
  retryableStatusCodes: [403, 405, 429],
}

export const DEFAULT_TIMEOUT_MS = 15000

/** Only a plain 200 counts as content; anything else is classified by the retry policy. */
export const SUCCESS_STATUS = 200
