import { configureLogger } from '@studfee/logger'
import type { ILogger } from '@studfee/logger'
import { FactAggregator } from '../../aggregator/index.js'
import { loggers } from '../../config/logger.js'
import { loadHarvestConfig } from '../../config/settings.js'
import type { HarvestConfigOverrides } from '../../config/settings.js'
import { isHarvestError } from '../../errors.js'
import { FeePatternExtractor } from '../../extractor/index.js'
import { loadInputCsv } from '../../input/csv.js'
import { runHarvest } from '../../pipeline/index.js'
import type { HarvestSummary } from '../../pipeline/index.js'
import { EntityResolver } from '../../resolver/index.js'
import { JitteredDelay } from '../../scraper/fetch/delay.js'
import { HttpFetcher } from '../../scraper/fetch/http-fetcher.js'
import { RESOLUTION_STRATEGY_IDS } from '../../scraper/types.js'
import type { FactYearMapping, ResolutionStrategyId } from '../../scraper/types.js'
import { CsvResultWriter } from '../../writer/index.js'
import { CliUsageError, asString } from '../parse-flags.js'
import type { Flags } from '../parse-flags.js'

export { CliUsageError }

/**
 * 0 success, 1 runtime failure, 2 usage or input error.
 */
export function exitCodeFor(error: unknown): number {
  if (error instanceof CliUsageError || isHarvestError(error)) {
    return 2
  }
  return 1
}

export interface HarvestCommandOptions {
  input: string
  output: string
  overrides: HarvestConfigOverrides
  verbosity: 'quiet' | 'normal' | 'debug'
}

function parseYear(flag: string, value: string | boolean | undefined): number | undefined {
  if (value === undefined) {
    return undefined
  }
  const text = asString(value)
  if (!/^\d{4}$/.test(text)) {
    throw new CliUsageError(`--${flag} expects a 4-digit year`)
  }
  return Number.parseInt(text, 10)
}

function isStrategyId(value: string): value is ResolutionStrategyId {
  return RESOLUTION_STRATEGY_IDS.some(id => id === value)
}

function parseStrategies(value: string | boolean | undefined): ResolutionStrategyId[] | undefined {
  if (value === undefined) {
    return undefined
  }
  const ids = asString(value)
    .split(',')
    .map(token => token.trim())
    .filter(token => token.length > 0)
  if (ids.length === 0) {
    throw new CliUsageError(`--strategies expects a comma list of: ${RESOLUTION_STRATEGY_IDS.join(', ')}`)
  }
  const unknown = ids.filter(id => !isStrategyId(id))
  if (unknown.length > 0) {
    throw new CliUsageError(`Unknown strategy: ${unknown.join(', ')}`)
  }
  return ids.filter(isStrategyId)
}

function parseMapping(value: string | boolean | undefined): FactYearMapping | undefined {
  if (value === undefined) {
    return undefined
  }
  const text = asString(value)
  if (text !== 'embedded' && text !== 'prior-page-year') {
    throw new CliUsageError('--fact-year-mapping expects embedded or prior-page-year')
  }
  return text
}

/**
 * @throws CliUsageError on missing or malformed flags
 */
export function parseHarvestOptions(flags: Flags): HarvestCommandOptions {
  const input = asString(flags.input)
  const output = asString(flags.output)
  if (!input || !output) {
    throw new CliUsageError('harvest requires --input <csv> and --output <csv>')
  }
  if (flags.quiet === true && flags.debug === true) {
    throw new CliUsageError('--quiet and --debug are mutually exclusive')
  }

  const overrides: HarvestConfigOverrides = {}
  const first = parseYear('first-year', flags['first-year'])
  const last = parseYear('last-year', flags['last-year'])
  if (first !== undefined || last !== undefined) {
    overrides.pageYears = { first, last }
  }
  const strategies = parseStrategies(flags.strategies)
  if (strategies) {
    overrides.strategies = strategies
  }
  const mapping = parseMapping(flags['fact-year-mapping'])
  if (mapping) {
    overrides.factYearMapping = mapping
  }

  return {
    input,
    output,
    overrides,
    verbosity: flags.quiet === true ? 'quiet' : flags.debug === true ? 'debug' : 'normal',
  }
}

export async function runHarvestCommand(
  options: HarvestCommandOptions,
  log: ILogger = loggers.cli
): Promise<HarvestSummary> {
  if (options.verbosity === 'quiet') {
    configureLogger({ level: 'warn' })
  } else if (options.verbosity === 'debug') {
    configureLogger({ level: 'debug' })
  }

  const config = loadHarvestConfig(process.env, options.overrides)
  const delay = new JitteredDelay()
  const fetcher = new HttpFetcher({ config: config.fetch, delay })
  const resolver = new EntityResolver({ fetcher, config, delay })
  const aggregator = new FactAggregator({
    fetcher,
    extractor: FeePatternExtractor.fromConfig(config),
    config,
    delay,
  })

  const records = await loadInputCsv(options.input)
  log.info('Loaded input', {
    input: options.input,
    records: records.length,
    pageYears: `${config.pageYears.first}-${config.pageYears.last}`,
    strategies: config.strategies.join(','),
  })

  return runHarvest(records, {
    resolver,
    aggregator,
    writer: new CsvResultWriter(options.output),
  })
}
