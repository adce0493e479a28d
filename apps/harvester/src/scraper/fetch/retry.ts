/**
 * Retry State Machine
 *
 * Pure transitions for one logical fetch:
 *
 *   attempting ──200──────────────▶ success
 *       │ ──other status─────────▶ abandoned
 *       │ ──retryable / transport─▶ backoff ──sleep──▶ attempting
 *       └ ──retryable / transport, last attempt──▶ exhausted
 *
 * The fetcher performs I/O and sleeps; this module only decides.
 */

import type { RetryPolicy } from '../types.js'
import { SUCCESS_STATUS } from '../types.js'

export type AttemptOutcome =
  | { kind: 'response'; statusCode: number }
  | { kind: 'transport_error'; error: string }

export type OutcomeClass = 'success' | 'retry' | 'abandon'

export interface AttemptingState {
  state: 'attempting'
  attempt: number
  delayMs: number
}

export type RetryState =
  | AttemptingState
  | { state: 'backoff'; attempt: number; delayMs: number; nextDelayMs: number }
  | { state: 'success'; attempt: number }
  | { state: 'exhausted'; attempt: number }
  | { state: 'abandoned'; attempt: number; statusCode: number }

export function initialState(policy: RetryPolicy): AttemptingState {
  return {
    state: 'attempting',
    attempt: 1,
    delayMs: Math.min(policy.initialDelayMs, policy.maxDelayMs),
  }
}

export function classifyOutcome(outcome: AttemptOutcome, policy: RetryPolicy): OutcomeClass {
  if (outcome.kind === 'transport_error') {
    return 'retry'
  }
  if (outcome.statusCode === SUCCESS_STATUS) {
    return 'success'
  }
  return policy.retryableStatusCodes.includes(outcome.statusCode) ? 'retry' : 'abandon'
}

export function nextDelay(delayMs: number, policy: RetryPolicy): number {
  return Math.min(delayMs * policy.backoffMultiplier, policy.maxDelayMs)
}

/**
 * Decide what follows an attempt. `maxAttempts` defaults to the policy's cap.
 */
export function transition(
  current: AttemptingState,
  outcome: AttemptOutcome,
  policy: RetryPolicy,
  maxAttempts: number = policy.maxAttempts
): RetryState {
  const verdict = classifyOutcome(outcome, policy)

  if (verdict === 'success') {
    return { state: 'success', attempt: current.attempt }
  }

  if (verdict === 'abandon' && outcome.kind === 'response') {
    return { state: 'abandoned', attempt: current.attempt, statusCode: outcome.statusCode }
  }

  if (current.attempt >= maxAttempts) {
    return { state: 'exhausted', attempt: current.attempt }
  }

  return {
    state: 'backoff',
    attempt: current.attempt,
    delayMs: current.delayMs,
    nextDelayMs: nextDelay(current.delayMs, policy),
  }
}

/**
 * Leave backoff after the sleep.
 */
export function resume(state: Extract<RetryState, { state: 'backoff' }>): AttemptingState {
  return { state: 'attempting', attempt: state.attempt + 1, delayMs: state.nextDelayMs }
}
