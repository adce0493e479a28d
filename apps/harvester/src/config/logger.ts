/**
 * Harvester loggers, one child per component.
 */

import { createLogger } from '@unitcost/logger'

export const logger = createLogger('harvester')

export const loggers = {
  fetch: logger.child('fetch'),
  catalog: logger.child('catalog'),
  tally: logger.child('tally'),
  cli: logger.child('cli'),
}
