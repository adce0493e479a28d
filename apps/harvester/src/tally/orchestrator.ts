/**
 * Tally orchestrator
 *
 * Run flow:
 * 1. Warm up the session (best effort)
 * 2. List every category in order, one at a time
 * 3. Extract unit costs on a bounded worker pool
 * 4. Report the summed total
 *
 * Item failures add 0 and never abort the run. Only an unusable pool size
 * is fatal, and it is rejected before any request goes out.
 */

import type { ILogger } from '@unitcost/logger'
import { COST_CEILING } from '../catalog/categories.js'
import type { Category, CostFigure, ItemReference } from '../catalog/categories.js'
import type { ItemProgress } from '../catalog/detail.js'
import { loggers } from '../config/logger.js'
import { assertPoolSize, mapWithConcurrency } from './pool.js'
import { RunTotal } from './run-total.js'

export interface TallyDeps {
  warmUp(): Promise<unknown>
  listUnits(category: Category): Promise<ItemReference[]>
  extractCost(reference: ItemReference, progress: ItemProgress): Promise<CostFigure>
  concurrency: number
  logger?: ILogger
}

export interface RunSummary {
  total: number
  categoryCount: number
  itemCount: number
  /** Extractor calls that rejected and were counted as 0 */
  failedItems: number
  durationMs: number
}

export async function collectReferences(
  categories: readonly Category[],
  deps: Pick<TallyDeps, 'listUnits' | 'logger'>
): Promise<ItemReference[]> {
  const log = deps.logger ?? loggers.tally
  const references: ItemReference[] = []

  for (const category of categories) {
    try {
      references.push(...(await deps.listUnits(category)))
    } catch (error) {
      log.error('Listing failed, skipping category', { category }, error)
    }
  }

  return references
}

export async function runTally(categories: readonly Category[], deps: TallyDeps): Promise<RunSummary> {
  assertPoolSize(deps.concurrency)

  const log = deps.logger ?? loggers.tally
  const startTime = Date.now()

  try {
    await deps.warmUp()
  } catch (error) {
    log.warn('Session warm-up failed, continuing anyway', {}, error)
  }

  const references = await collectReferences(categories, deps)
  log.info('Total units found', { count: references.length })

  const total = new RunTotal()
  let failedItems = 0

  await mapWithConcurrency(references, deps.concurrency, async (reference, index) => {
    try {
      const figure = await deps.extractCost(reference, { index: index + 1, total: references.length })
      total.add(figure)
    } catch (error) {
      failedItems += 1
      log.error('Cost extraction failed, counting 0', { reference }, error)
    }
  })

  const summary: RunSummary = {
    total: total.value,
    categoryCount: categories.length,
    itemCount: references.length,
    failedItems,
    durationMs: Date.now() - startTime,
  }

  if (summary.total === COST_CEILING) {
    log.warn('Total reached the numeric ceiling and is a lower bound', { ceiling: COST_CEILING })
  }
  log.info('Run complete', { ...summary })
  return summary
}
