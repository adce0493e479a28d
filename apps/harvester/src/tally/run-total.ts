import { COST_CEILING } from '../catalog/categories.js'
import type { CostFigure } from '../catalog/categories.js'

/**
 * Running sum of unit costs. Workers share one instance; `add` is
 * synchronous, so the event loop serializes updates and none is lost.
 * The sum saturates at COST_CEILING.
 */
export class RunTotal {
  private sum = 0

  /**
   * Returns the new total. Rejects figures that are not non-negative safe
   * integers so the total never decreases.
   */
  add(figure: CostFigure): number {
    if (!Number.isSafeInteger(figure) || figure < 0) {
      throw new RangeError(`Cost figure must be a non-negative integer, got ${figure}`)
    }
    this.sum = Math.min(this.sum + figure, COST_CEILING)
    return this.sum
  }

  get value(): number {
    return this.sum
  }
}
