/**
 * Deduplicating Aggregator
 *
 * Crawls every page-year of one resolved entity in ascending order and merges
 * the per-page facts into a single table keyed by fact year. The merge is
 * first-wins: once a fact year has a value, later page-years never replace it,
 * even when they disagree.
 *
 * A page that fails to fetch is skipped; the crawl always continues.
 */

import type { ILogger } from '@studfee/logger'
import { loggers } from '../config/logger.js'
import type { HarvestConfig } from '../config/settings.js'
import { noDelay } from '../scraper/fetch/delay.js'
import { bodyOf } from '../scraper/types.js'
import type {
  DelayStrategy,
  FactTable,
  FactYearMapping,
  Fetcher,
  HarvestMetrics,
  HarvestResult,
  PageFactExtractor,
  PageFacts,
  ResolvedEntity,
  YearRange,
} from '../scraper/types.js'
import { buildAuctionsUrl } from '../scraper/utils/url.js'

/**
 * Closed range as an ascending list.
 */
export function pageYears(range: YearRange): number[] {
  const years: number[] = []
  for (let year = range.first; year <= range.last; year++) {
    years.push(year)
  }
  return years
}

/**
 * Re-key one page's facts. Under `prior-page-year` every fact collapses onto
 * `pageYear - 1` and the last fee match on the page wins.
 */
export function mapPageFacts(facts: PageFacts, pageYear: number, mapping: FactYearMapping): PageFacts {
  if (mapping === 'embedded') {
    return facts
  }
  const mapped: PageFacts = new Map()
  for (const amount of facts.values()) {
    mapped.set(pageYear - 1, amount)
  }
  return mapped
}

/**
 * Insert facts whose year is not yet present. Returns how many were shadowed.
 */
export function mergeFirstWins(table: Map<number, number>, facts: PageFacts): number {
  let shadowed = 0
  for (const [year, amount] of facts) {
    if (table.has(year)) {
      shadowed++
      continue
    }
    table.set(year, amount)
  }
  return shadowed
}

export function toFactTable(table: Map<number, number>): FactTable {
  return [...table.entries()]
    .sort(([a], [b]) => a - b)
    .map(([factYear, amount]) => ({ factYear, amount }))
}

export interface FactAggregatorOptions {
  fetcher: Fetcher
  extractor: PageFactExtractor
  config: HarvestConfig

  /** Sleeps between successive page fetches (default: none) */
  delay?: DelayStrategy

  logger?: ILogger
}

export class FactAggregator {
  private readonly fetcher: Fetcher
  private readonly extractor: PageFactExtractor
  private readonly config: HarvestConfig
  private readonly delay: DelayStrategy
  private readonly log: ILogger

  constructor(options: FactAggregatorOptions) {
    this.fetcher = options.fetcher
    this.extractor = options.extractor
    this.config = options.config
    this.delay = options.delay ?? noDelay
    this.log = options.logger ?? loggers.aggregator
  }

  async harvest(entity: ResolvedEntity): Promise<HarvestResult> {
    const table = new Map<number, number>()
    const metrics: HarvestMetrics = {
      pagesAttempted: 0,
      pagesFailed: 0,
      pagesWithoutFacts: 0,
      pagesWithFacts: 0,
      factsShadowed: 0,
    }
    const log = this.log.child({ id: entity.id, slug: entity.slug })

    for (const [index, pageYear] of pageYears(this.config.pageYears).entries()) {
      if (index > 0) {
        await this.delay.wait(this.config.pageDelay)
      }

      metrics.pagesAttempted++
      const url = buildAuctionsUrl(this.config.baseUrl, entity, pageYear)
      const result = await this.fetcher.fetch(url)
      const body = bodyOf(result)

      if (body === null) {
        metrics.pagesFailed++
        log.warn('Page fetch failed, skipping', {
          pageYear,
          status: result.status,
          statusCode: result.statusCode,
          error: result.error,
        })
        continue
      }

      const facts = mapPageFacts(this.extractor.extract(body), pageYear, this.config.factYearMapping)
      if (facts.size === 0) {
        metrics.pagesWithoutFacts++
        log.debug('No facts on page', { pageYear })
        continue
      }

      metrics.pagesWithFacts++
      metrics.factsShadowed += mergeFirstWins(table, facts)
    }

    const facts = toFactTable(table)
    log.info('Harvested entity', { facts: facts.length, ...metrics })

    return { entity, facts, metrics }
  }
}
