/**
 * Web-search resolution.
 *
 * Asks a general web search engine for the stallion's auction results page
 * around the record's sale year (the year itself, then the year after, then
 * the year before) and reads the id/slug off the first result that links
 * to an auctions page. Records without a contextYear are skipped.
 */

import { bodyOf } from '../../scraper/types.js'
import type { EntityRecord, ResolvedEntity } from '../../scraper/types.js'
import { linkTargets } from '../../scraper/utils/html.js'
import { toResolvedEntity } from '../../scraper/utils/url.js'
import type { ResolutionStrategy, StrategyDependencies } from '../types.js'

const AUCTIONS_PATH_PATTERN = /\/stallions\/(\d{6})\/([^/?#]+)\/auctions\/\d{4}/

export function buildWebSearchQuery(name: string, year: number): string {
  return `${name.trim()} ${year} worldwide sales results bloodhorse`
}

/**
 * Search engines wrap result links in a redirect (`/l/?uddg=<target>`);
 * unwrap it when present.
 */
export function unwrapResultLink(href: string): string {
  try {
    const parsed = new URL(href, 'https://duckduckgo.com')
    return parsed.searchParams.get('uddg') ?? href
  } catch {
    return href
  }
}

export function findAuctionsLink(html: string): ResolvedEntity | null {
  for (const href of linkTargets(html)) {
    const match = AUCTIONS_PATH_PATTERN.exec(unwrapResultLink(href))
    if (!match) continue
    const entity = toResolvedEntity(match[1], match[2])
    if (entity) {
      return entity
    }
  }
  return null
}

export class WebSearchStrategy implements ResolutionStrategy {
  readonly id = 'web-search' as const
  private readonly deps: StrategyDependencies

  constructor(deps: StrategyDependencies) {
    this.deps = deps
  }

  async resolve(record: EntityRecord): Promise<ResolvedEntity | null> {
    const { fetcher, config, delay, logger } = this.deps
    const contextYear = record.contextYear
    if (contextYear === undefined) {
      logger.debug('Web search skipped without a context year', { name: record.name })
      return null
    }

    const offsets = config.webSearch.yearOffsets
    for (const [index, offset] of offsets.entries()) {
      if (index > 0) {
        await delay.wait(config.pageDelay)
      }

      const query = buildWebSearchQuery(record.name, contextYear + offset)
      const html = bodyOf(await fetcher.fetch(`${config.webSearch.endpoint}${encodeURIComponent(query)}`))
      if (html === null) {
        continue
      }

      const entity = findAuctionsLink(html)
      if (entity) {
        return entity
      }
    }

    return null
  }
}
