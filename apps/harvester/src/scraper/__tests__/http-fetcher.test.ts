import { describe, it, expect } from 'vitest'
import { HttpFetcher } from '../fetch/http-fetcher.js'
import type { RetryPolicy } from '../types.js'
import { networkError, recordingSleep, sequenceFetch } from '../../__tests__/helpers/fake-fetch.js'
import { recordingLogger } from '../../__tests__/helpers/recording-logger.js'

const policy: RetryPolicy = {
  maxAttempts: 5,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
  retryableStatusCodes: [403, 405, 429],
}

describe('HttpFetcher', () => {
  it('returns the body of a 200 after one attempt', async () => {
    const fetchImpl = sequenceFetch([{ status: 200, body: '<html>ok</html>' }])
    const sleep = recordingSleep()
    const fetcher = new HttpFetcher({ retryPolicy: policy, fetchImpl, sleep })

    const result = await fetcher.fetch('https://example.com/unit/a')

    expect(result).toMatchObject({ ok: true, statusCode: 200, body: '<html>ok</html>', attempts: 1 })
    expect(fetchImpl).toHaveBeenCalledTimes(1)
    expect(sleep).not.toHaveBeenCalled()
  })

  it.each([403, 405, 429])('makes exactly maxAttempts calls when every attempt returns %i', async status => {
    const fetchImpl = sequenceFetch([status])
    const sleep = recordingSleep()
    const fetcher = new HttpFetcher({ retryPolicy: policy, fetchImpl, sleep })

    const result = await fetcher.fetch('https://example.com/unit/a')

    expect(result).toMatchObject({ ok: false, reason: 'exhausted', statusCode: status, attempts: 5 })
    expect(fetchImpl).toHaveBeenCalledTimes(5)
    expect(sleep.mock.calls.map(call => call[0])).toEqual([1000, 2000, 4000, 8000])
  })

  it('makes exactly maxAttempts calls when every attempt fails in transport', async () => {
    const fetchImpl = sequenceFetch([networkError()])
    const sleep = recordingSleep()
    const fetcher = new HttpFetcher({ retryPolicy: { ...policy, maxAttempts: 3 }, fetchImpl, sleep })

    const result = await fetcher.fetch('https://example.com/unit/a')

    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.reason).toBe('exhausted')
    expect(result.attempts).toBe(3)
    expect(result.statusCode).toBeUndefined()
    expect(result.error).toBe('fetch failed (ECONNRESET)')
    expect(fetchImpl).toHaveBeenCalledTimes(3)
  })

  it.each([1, 2, 3, 4, 5])('returns content after exactly %i attempts when that attempt succeeds', async n => {
    const steps = [429, networkError(), 403, 405].slice(0, n - 1)
    const fetchImpl = sequenceFetch([...steps, { status: 200, body: `attempt ${n}` }])
    const fetcher = new HttpFetcher({ retryPolicy: policy, fetchImpl, sleep: recordingSleep() })

    const result = await fetcher.fetch('https://example.com/unit/a')

    expect(result).toMatchObject({ ok: true, body: `attempt ${n}`, attempts: n })
    expect(fetchImpl).toHaveBeenCalledTimes(n)
  })

  it.each([404, 500, 503, 301])('abandons after one attempt on non-retryable status %i', async status => {
    const fetchImpl = sequenceFetch([status, 200])
    const sleep = recordingSleep()
    const fetcher = new HttpFetcher({ retryPolicy: policy, fetchImpl, sleep })

    const result = await fetcher.fetch('https://example.com/unit/a')

    expect(result).toMatchObject({ ok: false, reason: 'non_retryable', statusCode: status, attempts: 1 })
    expect(fetchImpl).toHaveBeenCalledTimes(1)
    expect(sleep).not.toHaveBeenCalled()
  })

  it('abandons a non-retryable status reached after retries without further attempts', async () => {
    const fetchImpl = sequenceFetch([429, 429, 404, 200])
    const fetcher = new HttpFetcher({ retryPolicy: policy, fetchImpl, sleep: recordingSleep() })

    const result = await fetcher.fetch('https://example.com/unit/a')

    expect(result).toMatchObject({ ok: false, reason: 'non_retryable', statusCode: 404, attempts: 3 })
    expect(fetchImpl).toHaveBeenCalledTimes(3)
  })

  it('caps backoff delays at maxDelayMs', async () => {
    const fetchImpl = sequenceFetch([429])
    const sleep = recordingSleep()
    const fetcher = new HttpFetcher({
      retryPolicy: { ...policy, maxAttempts: 6, maxDelayMs: 5000 },
      fetchImpl,
      sleep,
    })

    await fetcher.fetch('https://example.com/unit/a')

    expect(sleep.mock.calls.map(call => call[0])).toEqual([1000, 2000, 4000, 5000, 5000])
  })

  it('doubles each backoff until the ceiling and never exceeds it', async () => {
    const fetchImpl = sequenceFetch([networkError()])
    const sleep = recordingSleep()
    const fetcher = new HttpFetcher({
      retryPolicy: { ...policy, maxAttempts: 8, maxDelayMs: 10000 },
      fetchImpl,
      sleep,
    })

    await fetcher.fetch('https://example.com/unit/a')

    const delays = sleep.mock.calls.map(call => call[0])
    expect(delays).toEqual([1000, 2000, 4000, 8000, 10000, 10000, 10000])
    for (let i = 1; i < delays.length; i++) {
      expect(delays[i]).toBe(Math.min(delays[i - 1] * 2, 10000))
    }
  })

  it('clamps an initial delay above the ceiling', async () => {
    const fetchImpl = sequenceFetch([429])
    const sleep = recordingSleep()
    const fetcher = new HttpFetcher({
      retryPolicy: { ...policy, maxAttempts: 3, initialDelayMs: 50, maxDelayMs: 20 },
      fetchImpl,
      sleep,
    })

    await fetcher.fetch('https://example.com/unit/a')

    expect(sleep.mock.calls.map(call => call[0])).toEqual([20, 20])
  })

  it('limits a call to the per-call maxAttempts', async () => {
    const fetchImpl = sequenceFetch([429])
    const sleep = recordingSleep()
    const fetcher = new HttpFetcher({ retryPolicy: policy, fetchImpl, sleep })

    const result = await fetcher.fetch('https://example.com/', { maxAttempts: 1 })

    expect(result).toMatchObject({ ok: false, reason: 'exhausted', attempts: 1 })
    expect(fetchImpl).toHaveBeenCalledTimes(1)
    expect(sleep).not.toHaveBeenCalled()
  })

  it('logs retries at warn and the final failure at error', async () => {
    const { logger, lines } = recordingLogger()
    const fetcher = new HttpFetcher({
      retryPolicy: { ...policy, maxAttempts: 2 },
      fetchImpl: sequenceFetch([429]),
      sleep: recordingSleep(),
      logger,
    })

    await fetcher.fetch('https://example.com/unit/a')

    expect(lines.map(line => `${line.level} ${line.message}`)).toEqual([
      'warn Rate limited, backing off',
      'error Giving up after retries',
    ])
  })

  it.each([429, 503])('keeps single-attempt failures at debug for status %i', async status => {
    const { logger, lines } = recordingLogger()
    const fetcher = new HttpFetcher({ retryPolicy: policy, fetchImpl: sequenceFetch([status]), sleep: recordingSleep(), logger })

    await fetcher.fetch('https://example.com/', { maxAttempts: 1 })

    expect(lines).toHaveLength(1)
    expect(lines[0].level).toBe('debug')
  })

  it('sends the configured headers on every attempt', async () => {
    const fetchImpl = sequenceFetch([429, 200])
    const headers = { 'User-Agent': 'test-agent', Referer: 'https://example.com' }
    const fetcher = new HttpFetcher({ retryPolicy: policy, headers, fetchImpl, sleep: recordingSleep() })

    await fetcher.fetch('https://example.com/unit/a')

    expect(fetchImpl).toHaveBeenCalledTimes(2)
    for (const [url, init] of fetchImpl.mock.calls) {
      expect(url).toBe('https://example.com/unit/a')
      expect(init.method).toBe('GET')
      expect(init.headers).toEqual(headers)
    }
  })

  it('treats an attempt that outlives the timeout as a transport failure', async () => {
    const fetchImpl = hangingFetch()
    const fetcher = new HttpFetcher({
      retryPolicy: { ...policy, maxAttempts: 2 },
      timeoutMs: 5,
      fetchImpl,
      sleep: recordingSleep(),
    })

    const result = await fetcher.fetch('https://example.com/unit/a')

    expect(result).toMatchObject({
      ok: false,
      reason: 'exhausted',
      attempts: 2,
      error: 'Request timed out after 5ms',
    })
  })
})

function hangingFetch() {
  return (_url: string, init: RequestInit): Promise<Response> =>
    new Promise<Response>((_resolve, reject) => {
      init.signal?.addEventListener('abort', () => {
        reject(Object.assign(new Error('This operation was aborted'), { name: 'AbortError' }))
      })
    })
}
