/**
 * Catalog session: the browser-like headers every request carries, and the
 * home page visit that opens a run.
 */

import type { ILogger } from '@unitcost/logger'
import { loggers } from '../config/logger.js'
import type { Fetcher } from '../scraper/types.js'

const USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/114.0.0.0 Safari/537.36'

export function buildCatalogHeaders(baseUrl: string): Record<string, string> {
  return {
    'User-Agent': USER_AGENT,
    Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,image/webp,*/*;q=0.8',
    'Accept-Language': 'en-US,en;q=0.9',
    Referer: baseUrl,
    Connection: 'keep-alive',
  }
}

/**
 * Single-attempt home page fetch. Best effort: a failure is only logged.
 */
export async function warmUpSession(
  fetcher: Fetcher,
  baseUrl: string,
  timeoutMs: number,
  logger: ILogger = loggers.catalog
): Promise<boolean> {
  logger.info('Initializing session with homepage fetch', { url: baseUrl })
  const result = await fetcher.fetch(baseUrl, { timeoutMs, maxAttempts: 1 })

  if (!result.ok) {
    logger.warn('Homepage fetch failed, continuing anyway', {
      statusCode: result.statusCode,
      error: result.error,
    })
    return false
  }

  return true
}
