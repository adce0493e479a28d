/**
 * Harvester run settings.
 *
 * Defaults reproduce the fixed run: five tech trees, three workers, a
 * 1.5s courtesy delay per unit page and five attempts per request.
 * Overrides come from CLI flags and are validated here.
 */

import { z } from 'zod'
import { CATALOG_BASE_URL, TECH_TREE_CATEGORIES } from '../catalog/categories.js'
import { DEFAULT_RETRY_POLICY, DEFAULT_TIMEOUT_MS } from '../scraper/types.js'

export class ConfigError extends Error {
  readonly issues: string[]

  constructor(issues: string[]) {
    super(`Invalid settings: ${issues.join('; ')}`)
    this.name = 'ConfigError'
    this.issues = issues
  }
}

const retryPolicySchema = z.object({
  maxAttempts: z.number().int().positive().default(DEFAULT_RETRY_POLICY.maxAttempts),
  initialDelayMs: z.number().int().nonnegative().default(DEFAULT_RETRY_POLICY.initialDelayMs),
  maxDelayMs: z.number().int().nonnegative().default(DEFAULT_RETRY_POLICY.maxDelayMs),
  backoffMultiplier: z.number().min(1).default(DEFAULT_RETRY_POLICY.backoffMultiplier),
  retryableStatusCodes: z
    .array(z.number().int().min(100).max(599))
    .default([...DEFAULT_RETRY_POLICY.retryableStatusCodes]),
})

export const settingsSchema = z
  .object({
    baseUrl: z
      .string()
      .url()
      .default(CATALOG_BASE_URL)
      .transform(url => url.replace(/\/+$/, '')),
    categories: z.array(z.string().trim().min(1)).min(1).default([...TECH_TREE_CATEGORIES]),
    concurrency: z.number().int().positive().default(3),
    courtesyDelayMs: z.number().int().nonnegative().default(1500),
    requestTimeoutMs: z.number().int().positive().default(DEFAULT_TIMEOUT_MS),
    warmUpTimeoutMs: z.number().int().positive().default(10000),
    retry: retryPolicySchema.default({}),
  })
  .refine(settings => settings.retry.initialDelayMs <= settings.retry.maxDelayMs, {
    message: 'initialDelayMs must not exceed maxDelayMs',
    path: ['retry', 'initialDelayMs'],
  })

export type SettingsInput = z.input<typeof settingsSchema>
export type HarvesterSettings = Readonly<z.output<typeof settingsSchema>>

export function loadSettings(overrides: SettingsInput = {}): HarvesterSettings {
  const parsed = settingsSchema.safeParse(overrides)
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(issue =>
        issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
      )
    )
  }
  return Object.freeze(parsed.data)
}
