/**
 * Listing extractor: unit references of one tech tree.
 */

import type { ILogger } from '@unitcost/logger'
import { loggers } from '../config/logger.js'
import type { Fetcher } from '../scraper/types.js'
import type { Category, ItemReference } from './categories.js'
import { parseUnitLinks } from './parse.js'

export interface ListingDeps {
  fetcher: Fetcher
  baseUrl: string
  logger?: ILogger
}

/**
 * Tree view of a category; `?v=t` selects the tree layout the selectors target.
 */
export function buildListingUrl(baseUrl: string, category: Category): string {
  return `${baseUrl}/${category}?v=t`
}

/**
 * References in listing order. An unreachable listing yields [] so the run
 * continues with the remaining categories.
 */
export async function listUnits(category: Category, deps: ListingDeps): Promise<ItemReference[]> {
  const log = deps.logger ?? loggers.catalog
  const url = buildListingUrl(deps.baseUrl, category)

  log.info('Fetching unit URLs', { category, url })
  const result = await deps.fetcher.fetch(url)

  if (!result.ok) {
    log.error('Failed to fetch tech tree page', {
      category,
      url,
      reason: result.reason,
      statusCode: result.statusCode,
    })
    return []
  }

  const references = parseUnitLinks(result.body)
  log.info('Found units', { category, count: references.length })
  return references
}
