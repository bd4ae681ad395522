/**
 * Entity Resolver
 *
 * Maps a free-text stallion name to its canonical `(id, slug)` by trying an
 * ordered list of strategies; the first hit wins. A miss from every strategy
 * is NOT_FOUND, which the caller handles by skipping the entity. Resolution
 * is never retried here beyond what the fetcher does per request.
 *
 * New strategies plug in by implementing ResolutionStrategy and adding an id
 * to `createStrategy`; the crawl loop does not change.
 */

import type { ILogger } from '@studfee/logger'
import { loggers } from '../config/logger.js'
import type { HarvestConfig } from '../config/settings.js'
import { noDelay } from '../scraper/fetch/delay.js'
import type {
  DelayStrategy,
  EntityRecord,
  Fetcher,
  ResolutionStrategyId,
  ResolveResult,
} from '../scraper/types.js'
import { ProbeRedirectStrategy } from './strategies/probe-redirect.js'
import { SearchQueryStrategy } from './strategies/search-query.js'
import { WebSearchStrategy } from './strategies/web-search.js'
import type { ResolutionStrategy, StrategyDependencies } from './types.js'

export type { ResolutionStrategy, StrategyDependencies } from './types.js'
export { normalizeSlug, slugCandidates, slugify, searchQueries, splitSuffix } from './slug.js'

export function createStrategy(
  id: ResolutionStrategyId,
  deps: StrategyDependencies
): ResolutionStrategy {
  switch (id) {
    case 'probe-redirect':
      return new ProbeRedirectStrategy(deps)
    case 'search-query':
      return new SearchQueryStrategy(deps)
    case 'web-search':
      return new WebSearchStrategy(deps)
  }
}

export interface EntityResolverOptions {
  fetcher: Fetcher
  config: HarvestConfig

  /** Sleeps between search-engine queries (default: none) */
  delay?: DelayStrategy

  logger?: ILogger

  /** Explicit strategy list; defaults to `config.strategies` */
  strategies?: ResolutionStrategy[]
}

export class EntityResolver {
  private readonly strategies: ResolutionStrategy[]
  private readonly log: ILogger

  constructor(options: EntityResolverOptions) {
    this.log = options.logger ?? loggers.resolver
    const deps: StrategyDependencies = {
      fetcher: options.fetcher,
      config: options.config,
      delay: options.delay ?? noDelay,
      logger: this.log,
    }
    this.strategies =
      options.strategies ?? options.config.strategies.map(id => createStrategy(id, deps))
  }

  get strategyIds(): ResolutionStrategyId[] {
    return this.strategies.map(strategy => strategy.id)
  }

  async resolve(query: EntityRecord | string): Promise<ResolveResult> {
    const record: EntityRecord = typeof query === 'string' ? { name: query } : query
    const attempted: ResolutionStrategyId[] = []

    for (const strategy of this.strategies) {
      attempted.push(strategy.id)
      try {
        const entity = await strategy.resolve(record)
        if (entity) {
          this.log.debug('Resolved entity', {
            name: record.name,
            strategy: strategy.id,
            id: entity.id,
            slug: entity.slug,
          })
          return { ok: true, entity, strategy: strategy.id }
        }
      } catch (error) {
        this.log.warn('Resolution strategy failed', { name: record.name, strategy: strategy.id }, error)
      }
    }

    return { ok: false, reason: 'NOT_FOUND', attempted }
  }
}
