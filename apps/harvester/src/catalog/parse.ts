/**
 * Page parsers for the War Thunder wiki.
 *
 * Pure functions from raw HTML to values. Markup that does not match the
 * selectors yields empty lists and absent fields, never an exception.
 */

import * as cheerio from 'cheerio'
import { COST_CEILING } from './categories.js'
import type { CostFigure, ItemReference } from './categories.js'
import { COST_LABELS, SELECTORS } from './selectors.js'

export type CostField = keyof typeof COST_LABELS

/** Named optional cost fields found on a unit page */
export type CostFields = Partial<Record<CostField, number>>

export interface CostBreakdown {
  talisman: CostFigure
  aces: CostFigure
  total: CostFigure
}

/**
 * Strip thousands separators and every non-digit; no digits means 0.
 * "1,234 GE" -> 1234. Values past COST_CEILING are clamped to it.
 */
export function parseCostValue(text: string): CostFigure {
  const digits = text.replace(/,/g, '').replace(/\D/g, '')
  return digits ? Math.min(Number.parseInt(digits, 10), COST_CEILING) : 0
}

/**
 * Unit links of a tech-tree listing, hrefs returned verbatim in document order.
 */
export function parseUnitLinks(html: string): ItemReference[] {
  const $ = cheerio.load(html)
  const links: ItemReference[] = []

  $(SELECTORS.treeItem).each((_, element) => {
    const href = $(element).find(SELECTORS.treeItemLink).first().attr('href')
    if (href) {
      links.push(href)
    }
  })

  return links
}

/**
 * Talisman and Aces costs. Each field is located by its label; only the first
 * container carrying the label is read.
 */
export function parseCostFields(html: string): CostFields {
  const $ = cheerio.load(html)
  const fields: CostFields = {}

  for (const element of $(SELECTORS.charsLine).toArray()) {
    const $line = $(element)
    if ($line.find(SELECTORS.charsHeader).first().text().trim() !== COST_LABELS.talisman) continue

    const $value = $line.find(SELECTORS.charsValue).first()
    if ($value.length > 0) {
      fields.talisman = parseCostValue($value.text())
    }
    break
  }

  for (const element of $(SELECTORS.charsSubline).toArray()) {
    const $subline = $(element)
    if ($subline.find('span').first().text().trim() !== COST_LABELS.aces) continue

    const $value = $subline.find(SELECTORS.charsValue).first()
    if ($value.length > 0) {
      fields.aces = parseCostValue($value.text())
    }
    break
  }

  return fields
}

export function toBreakdown(fields: CostFields): CostBreakdown {
  const talisman = fields.talisman ?? 0
  const aces = fields.aces ?? 0
  return { talisman, aces, total: Math.min(talisman + aces, COST_CEILING) }
}

export const EMPTY_BREAKDOWN: Readonly<CostBreakdown> = Object.freeze({ talisman: 0, aces: 0, total: 0 })
