/**
 * Detail extractor: Golden Eagle cost of one unit page.
 */

import type { ILogger } from '@unitcost/logger'
import { loggers } from '../config/logger.js'
import type { Fetcher } from '../scraper/types.js'
import { sleep as defaultSleep } from '../utils/sleep.js'
import type { Sleep } from '../utils/sleep.js'
import { COST_CEILING } from './categories.js'
import type { CostFigure, ItemReference } from './categories.js'
import { EMPTY_BREAKDOWN, parseCostFields, toBreakdown } from './parse.js'
import type { CostBreakdown, CostFields } from './parse.js'

export interface DetailDeps {
  fetcher: Fetcher
  baseUrl: string
  /** Pause before each unit fetch */
  courtesyDelayMs: number
  sleep?: Sleep
  /** Page parser; swap when the wiki markup changes */
  parse?: (html: string) => CostFields
  logger?: ILogger
}

/** Position of the unit in the run, for progress lines */
export interface ItemProgress {
  index: number
  total: number
}

/**
 * Absolute URL of a unit page, or undefined when the reference does not parse
 * or points off the catalog host.
 */
export function resolveItemUrl(baseUrl: string, reference: ItemReference): string | undefined {
  const base = new URL(`${baseUrl}/`)
  let resolved: URL
  try {
    resolved = new URL(reference, base)
  } catch {
    return undefined
  }
  return resolved.origin === base.origin ? resolved.toString() : undefined
}

export async function extractCostBreakdown(
  reference: ItemReference,
  deps: DetailDeps,
  progress?: ItemProgress
): Promise<CostBreakdown> {
  const log = deps.logger ?? loggers.catalog
  const pause = deps.sleep ?? defaultSleep

  const url = resolveItemUrl(deps.baseUrl, reference)
  if (url === undefined) {
    log.error('Skipping unit reference outside the catalog', { reference })
    return { ...EMPTY_BREAKDOWN }
  }

  await pause(deps.courtesyDelayMs)

  const result = await deps.fetcher.fetch(url)

  if (!result.ok) {
    log.error('Failed to fetch unit page', { url, reason: result.reason, statusCode: result.statusCode })
    return { ...EMPTY_BREAKDOWN }
  }

  const breakdown = toBreakdown((deps.parse ?? parseCostFields)(result.body))
  if (breakdown.total === COST_CEILING) {
    log.warn('Unit cost clamped to the numeric ceiling', { reference, ceiling: COST_CEILING })
  }

  log.info(
    progress ? `Processing unit ${progress.index}/${progress.total}` : 'Processed unit',
    { reference, ...breakdown }
  )

  return breakdown
}

export async function extractCost(
  reference: ItemReference,
  deps: DetailDeps,
  progress?: ItemProgress
): Promise<CostFigure> {
  const breakdown = await extractCostBreakdown(reference, deps, progress)
  return breakdown.total
}
