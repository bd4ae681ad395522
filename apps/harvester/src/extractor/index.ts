/**
 * Page Fact Extractor
 *
 * Pulls `{factYear → amount}` out of one auctions page. The register exposes
 * no stable structure at this level, so extraction is a gated pattern scan:
 *
 * 1. The page must contain the section marker literal (e.g. "Weanlings").
 *    Without it the page has no applicable data and yields nothing.
 * 2. Every `<YYYY> ... Fee ... $<digits,commas>` match becomes a fact.
 *    Commas are stripped from the amount. A later match for the same year on
 *    the same page replaces an earlier one and moves to the end, so the last
 *    entry of the map is always the last match on the page.
 */

import type { ILogger } from '@studfee/logger'
import { loggers } from '../config/logger.js'
import type { HarvestConfig } from '../config/settings.js'
import type { PageExtractResult, PageFactExtractor, PageFacts } from '../scraper/types.js'

/**
 * `<4-digit year>` (not part of a longer number), optional words, `Fee`,
 * anything but `$`, then `$<amount>`. Case-insensitive, spans newlines.
 */
export const FEE_PATTERN = /(?<!\d)(\d{4})\s*(?:[a-z]+\s+)*?fee[^$]*\$(\d[\d,]*)/gi

export interface ExtractorOptions {
  sectionMarker: string
  factYearBounds: { min: number; max: number }
}

export function parseAmount(raw: string): number | null {
  const amount = Number.parseInt(raw.replace(/,/g, ''), 10)
  return Number.isSafeInteger(amount) && amount >= 0 ? amount : null
}

export function extractPageFacts(body: string, options: ExtractorOptions): PageExtractResult {
  const facts: PageFacts = new Map()

  if (!body.includes(options.sectionMarker)) {
    return { ok: false, reason: 'SECTION_MARKER_MISSING', facts }
  }

  const { min, max } = options.factYearBounds
  for (const match of body.matchAll(FEE_PATTERN)) {
    const year = Number.parseInt(match[1], 10)
    const amount = parseAmount(match[2])
    if (amount === null || year < min || year > max) {
      continue
    }
    // Re-insert so iteration order follows each year's last match.
    facts.delete(year)
    facts.set(year, amount)
  }

  if (facts.size === 0) {
    return { ok: false, reason: 'NO_FEE_PATTERN', facts }
  }
  return { ok: true, facts }
}

export class FeePatternExtractor implements PageFactExtractor {
  private readonly options: ExtractorOptions
  private readonly log: ILogger

  constructor(options: ExtractorOptions, logger: ILogger = loggers.extractor) {
    this.options = options
    this.log = logger
  }

  static fromConfig(config: HarvestConfig): FeePatternExtractor {
    return new FeePatternExtractor({
      sectionMarker: config.sectionMarker,
      factYearBounds: config.factYearBounds,
    })
  }

  extract(body: string): PageFacts {
    const result = extractPageFacts(body, this.options)
    if (!result.ok) {
      this.log.debug('Extraction miss', { reason: result.reason })
    }
    return result.facts
  }
}
