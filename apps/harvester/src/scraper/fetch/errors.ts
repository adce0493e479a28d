/**
 * Transport error classification for fetch attempts.
 *
 * Node's fetch rejects with a TypeError('fetch failed') whose `cause`
 * carries the socket-level code (ECONNRESET, ENOTFOUND, ...).
 */

export type TransportErrorKind = 'timeout' | 'network'

export interface ClassifiedTransportError {
  kind: TransportErrorKind
  message: string
  code?: string
}

function causeCode(error: Error): string | undefined {
  const cause: unknown = error.cause
  if (typeof cause === 'object' && cause !== null && 'code' in cause && typeof cause.code === 'string') {
    return cause.code
  }
  return undefined
}

export function classifyFetchError(error: unknown, timeoutMs?: number): ClassifiedTransportError {
  if (error instanceof Error) {
    if (error.name === 'AbortError' || error.name === 'TimeoutError') {
      return {
        kind: 'timeout',
        message: timeoutMs !== undefined ? `Request timed out after ${timeoutMs}ms` : 'Request timed out',
      }
    }

    const code = causeCode(error)
    return {
      kind: 'network',
      message: code ? `${error.message} (${code})` : error.message,
      code,
    }
  }

  return { kind: 'network', message: String(error) }
}
