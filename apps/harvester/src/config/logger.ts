import { createLogger } from '@studfee/logger'

export const logger = createLogger('harvester')

export const loggers = {
  fetch: logger.child('fetch'),
  resolver: logger.child('resolver'),
  extractor: logger.child('extractor'),
  aggregator: logger.child('aggregator'),
  pipeline: logger.child('pipeline'),
  cli: logger.child('cli'),
}
