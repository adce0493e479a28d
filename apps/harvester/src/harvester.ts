/**
 * Wires settings into a runnable harvester: one shared fetcher, the catalog
 * extractors bound to it, and the tally orchestrator on top.
 */

import { extractCost } from './catalog/detail.js'
import type { DetailDeps } from './catalog/detail.js'
import { listUnits } from './catalog/listing.js'
import type { ListingDeps } from './catalog/listing.js'
import { buildCatalogHeaders, warmUpSession } from './catalog/session.js'
import type { HarvesterSettings } from './config/settings.js'
import { HttpFetcher } from './scraper/fetch/http-fetcher.js'
import type { FetchImpl } from './scraper/types.js'
import { runTally } from './tally/orchestrator.js'
import type { RunSummary } from './tally/orchestrator.js'
import type { Sleep } from './utils/sleep.js'

export interface HarvesterOverrides {
  fetchImpl?: FetchImpl
  sleep?: Sleep
}

export interface Harvester {
  run(): Promise<RunSummary>
}

export function createHarvester(settings: HarvesterSettings, overrides: HarvesterOverrides = {}): Harvester {
  const fetcher = new HttpFetcher({
    retryPolicy: settings.retry,
    headers: buildCatalogHeaders(settings.baseUrl),
    timeoutMs: settings.requestTimeoutMs,
    fetchImpl: overrides.fetchImpl,
    sleep: overrides.sleep,
  })

  const listingDeps: ListingDeps = { fetcher, baseUrl: settings.baseUrl }
  const detailDeps: DetailDeps = {
    fetcher,
    baseUrl: settings.baseUrl,
    courtesyDelayMs: settings.courtesyDelayMs,
    sleep: overrides.sleep,
  }

  return {
    run: () =>
      runTally(settings.categories, {
        concurrency: settings.concurrency,
        warmUp: () => warmUpSession(fetcher, settings.baseUrl, settings.warmUpTimeoutMs),
        listUnits: category => listUnits(category, listingDeps),
        extractCost: (reference, progress) => extractCost(reference, detailDeps, progress),
      }),
  }
}
