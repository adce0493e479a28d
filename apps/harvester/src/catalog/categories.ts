/**
 * War Thunder wiki catalog: host and tech-tree categories, listed in run order.
 */

export const CATALOG_BASE_URL = 'https://wiki.warthunder.com'

export const TECH_TREE_CATEGORIES = ['aviation', 'helicopters', 'ground', 'ships', 'boats'] as const

/** Tech-tree path segment, e.g. "aviation" */
export type Category = string

/** Relative locator of a unit page as it appears in a tree listing, e.g. "/unit/f_16a" */
export type ItemReference = string

/** Golden Eagle cost of one unit; 0 when unobtainable */
export type CostFigure = number

/** Costs and totals saturate here rather than lose integer precision */
export const COST_CEILING = Number.MAX_SAFE_INTEGER
