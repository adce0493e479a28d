/**
 * War Thunder wiki CSS selectors
 *
 * Tech-tree pages render every unit as a tree item with a link.
 * Unit pages list characteristics as header/value span pairs; the Aces
 * price sits on a subline under the Talisman line.
 */

export const SELECTORS = {
  // Tech tree listing (?v=t)
  treeItem: 'div.wt-tree_item',
  treeItemLink: 'a.wt-tree_item-link',

  // Unit page characteristics
  charsLine: 'div.game-unit_chars-line',
  charsHeader: 'span.game-unit_chars-header',
  charsSubline: 'div.game-unit_chars-subline',
  charsValue: 'span.game-unit_chars-value',
} as const

export const COST_LABELS = {
  talisman: 'Talisman cost',
  aces: 'Aces',
} as const
