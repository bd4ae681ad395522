/**
 * Stud fee harvester: resolve stallion names to register ids, crawl their
 * per-year auction pages, and collect year-keyed stud fees.
 */

export * from './scraper/types.js'
export * from './errors.js'
export {
  DEFAULT_HARVEST_CONFIG,
  createHarvestConfig,
  loadHarvestConfig,
} from './config/settings.js'
export type { FetchConfig, HarvestConfig, HarvestConfigOverrides, WebSearchConfig } from './config/settings.js'
export { HttpFetcher } from './scraper/fetch/http-fetcher.js'
export type { HttpFetcherOptions } from './scraper/fetch/http-fetcher.js'
export { JitteredDelay, RecordingDelay, noDelay, sampleDelayMs } from './scraper/fetch/delay.js'
export { buildAuctionsUrl, parseStallionPath, toResolvedEntity } from './scraper/utils/url.js'
export {
  EntityResolver,
  createStrategy,
  normalizeSlug,
  searchQueries,
  slugCandidates,
  slugify,
} from './resolver/index.js'
export type { EntityResolverOptions, ResolutionStrategy, StrategyDependencies } from './resolver/index.js'
export { FEE_PATTERN, FeePatternExtractor, extractPageFacts } from './extractor/index.js'
export { FactAggregator, pageYears } from './aggregator/index.js'
export type { FactAggregatorOptions } from './aggregator/index.js'
export { runHarvest } from './pipeline/index.js'
export type { HarvestDependencies, HarvestSummary } from './pipeline/index.js'
export { loadInputCsv, parseInputCsv } from './input/csv.js'
export { validateInputRecords } from './input/schema.js'
export { CsvResultWriter, MemoryResultWriter, formatResultCsv } from './writer/index.js'
