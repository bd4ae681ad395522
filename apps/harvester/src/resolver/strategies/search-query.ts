/**
 * Search-query resolution against the register's own search page.
 * First query is the exact name, then its slug ("yoshida-jpn").
 */

import { bodyOf } from '../../scraper/types.js'
import type { EntityRecord, ResolvedEntity } from '../../scraper/types.js'
import { linkTargets } from '../../scraper/utils/html.js'
import { buildSearchUrl, parseStallionPath } from '../../scraper/utils/url.js'
import { searchQueries } from '../slug.js'
import type { ResolutionStrategy, StrategyDependencies } from '../types.js'

/**
 * First anchor in the markup whose target is a stallion page.
 */
export function findStallionLink(html: string): ResolvedEntity | null {
  for (const href of linkTargets(html)) {
    const entity = parseStallionPath(href)
    if (entity) {
      return entity
    }
  }
  return null
}

export class SearchQueryStrategy implements ResolutionStrategy {
  readonly id = 'search-query' as const
  private readonly deps: StrategyDependencies

  constructor(deps: StrategyDependencies) {
    this.deps = deps
  }

  async resolve(record: EntityRecord): Promise<ResolvedEntity | null> {
    const { fetcher, config, logger } = this.deps

    for (const query of searchQueries(record.name)) {
      const html = bodyOf(await fetcher.fetch(buildSearchUrl(config.baseUrl, query)))
      if (html === null) {
        continue
      }

      const entity = findStallionLink(html)
      if (entity) {
        return entity
      }
      logger.debug('No stallion link in search results', { query })
    }

    return null
  }
}
