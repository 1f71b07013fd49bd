/**
 * Matcher loggers
 *
 * One child logger per engine component so every event carries its
 * component path (e.g. "matcher:cache").
 */

import { createLogger } from '@refwatch/logger'
import type { ILogger } from '@refwatch/logger'

export const rootLogger = createLogger('matcher')

export const loggers = {
  cache: rootLogger.child('cache'),
  limiter: rootLogger.child('limiter'),
  pipeline: rootLogger.child('pipeline'),
  feed: rootLogger.child('feed'),
  fetch: rootLogger.child('fetch'),
  stores: rootLogger.child('stores'),
  report: rootLogger.child('report'),
  cli: rootLogger.child('cli'),
} satisfies Record<string, ILogger>

export type { ILogger }
