import { describe, it, expect } from 'vitest'
import { classifyOutcome, initialState, nextDelay, resume, transition } from '../fetch/retry.js'
import type { RetryPolicy } from '../types.js'
import { DEFAULT_RETRY_POLICY } from '../types.js'

const policy: RetryPolicy = { ...DEFAULT_RETRY_POLICY }

describe('classifyOutcome', () => {
  it('separates success, retryable and fatal outcomes', () => {
    expect(classifyOutcome({ kind: 'response', statusCode: 200 }, policy)).toBe('success')
    expect(classifyOutcome({ kind: 'response', statusCode: 403 }, policy)).toBe('retry')
    expect(classifyOutcome({ kind: 'response', statusCode: 405 }, policy)).toBe('retry')
    expect(classifyOutcome({ kind: 'response', statusCode: 429 }, policy)).toBe('retry')
    expect(classifyOutcome({ kind: 'response', statusCode: 204 }, policy)).toBe('abandon')
    expect(classifyOutcome({ kind: 'response', statusCode: 404 }, policy)).toBe('abandon')
    expect(classifyOutcome({ kind: 'response', statusCode: 502 }, policy)).toBe('abandon')
    expect(classifyOutcome({ kind: 'transport_error', error: 'fetch failed' }, policy)).toBe('retry')
  })
})

describe('transition', () => {
  it('moves to backoff with the current delay and doubles the next one', () => {
    const next = transition(initialState(policy), { kind: 'response', statusCode: 429 }, policy)

    expect(next).toEqual({ state: 'backoff', attempt: 1, delayMs: 1000, nextDelayMs: 2000 })
  })

  it('resumes on the following attempt with the grown delay', () => {
    const next = transition(initialState(policy), { kind: 'transport_error', error: 'x' }, policy)
    if (next.state !== 'backoff') throw new Error(`unexpected ${next.state}`)

    expect(resume(next)).toEqual({ state: 'attempting', attempt: 2, delayMs: 2000 })
  })

  it('exhausts on a retryable outcome at the last attempt', () => {
    const last = { state: 'attempting' as const, attempt: 5, delayMs: 16000 }

    expect(transition(last, { kind: 'response', statusCode: 429 }, policy)).toEqual({
      state: 'exhausted',
      attempt: 5,
    })
  })

  it('honours a lower per-call attempt cap', () => {
    expect(transition(initialState(policy), { kind: 'response', statusCode: 429 }, policy, 1)).toEqual({
      state: 'exhausted',
      attempt: 1,
    })
  })

  it('abandons non-retryable statuses regardless of remaining attempts', () => {
    expect(transition(initialState(policy), { kind: 'response', statusCode: 500 }, policy)).toEqual({
      state: 'abandoned',
      attempt: 1,
      statusCode: 500,
    })
  })

  it('succeeds on 200', () => {
    expect(transition(initialState(policy), { kind: 'response', statusCode: 200 }, policy)).toEqual({
      state: 'success',
      attempt: 1,
    })
  })
})

describe('nextDelay', () => {
  it('applies the multiplier then the ceiling', () => {
    expect(nextDelay(4000, { ...policy, backoffMultiplier: 3, maxDelayMs: 10000 })).toBe(10000)
    expect(nextDelay(1500, policy)).toBe(3000)
  })
})
