import { createLogger } from '@carlist/logger'

export const rootLogger = createLogger('crawler')

/**
 * Component loggers. Import the one for your module:
 *   const log = loggers.fetch
 */
export const loggers = {
  crawler: rootLogger.child('run'),
  fetch: rootLogger.child('fetch'),
  proxy: rootLogger.child('proxy'),
  discovery: rootLogger.child('discovery'),
  redis: rootLogger.child('redis'),
  cli: rootLogger.child('cli'),
}
