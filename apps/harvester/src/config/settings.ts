/**
 * Harvest configuration.
 *
 * One immutable value built at startup and passed into every component.
 * Nothing reads process.env after `loadHarvestConfig()` returns, so tests
 * build their own config with zero delays and short page-year ranges.
 */

import { z } from 'zod'
import { ConfigurationError, describeIssues, issuesFromZod } from '../errors.js'
import type {
  DelayRange,
  FactYearMapping,
  ResolutionStrategyId,
  YearRange,
} from '../scraper/types.js'

export interface FetchConfig {
  timeoutMs: number
  maxAttempts: number
  maxSizeBytes: number
  headers: Readonly<Record<string, string>>
  /** Jittered sleep between retry attempts */
  retryDelay: DelayRange
}

export interface WebSearchConfig {
  /** HTML search endpoint; the query is appended URL-encoded */
  endpoint: string
  /** Offsets around the record's contextYear, tried in order */
  yearOffsets: readonly number[]
}

export interface HarvestConfig {
  /** Stallion register root, e.g. https://www.bloodhorse.com/stallion-register */
  baseUrl: string
  /** Closed, ascending page-year crawl range */
  pageYears: YearRange
  /** Page-year used in the probe-redirect request */
  probeYear: number
  /** Literal a page must contain before fees are extracted */
  sectionMarker: string
  factYearMapping: FactYearMapping
  /** Fact years outside this closed range are ignored */
  factYearBounds: { min: number; max: number }
  /** Resolution strategies in priority order */
  strategies: readonly ResolutionStrategyId[]
  fetch: FetchConfig
  /** Jittered sleep between successive page fetches for one entity */
  pageDelay: DelayRange
  webSearch: WebSearchConfig
}

export interface HarvestConfigOverrides
  extends Partial<Omit<HarvestConfig, 'fetch' | 'webSearch' | 'pageYears'>> {
  pageYears?: Partial<YearRange>
  fetch?: Partial<FetchConfig>
  webSearch?: Partial<WebSearchConfig>
}

export const DEFAULT_FETCH_HEADERS: Readonly<Record<string, string>> = {
  'User-Agent':
    'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36',
  Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
  'Accept-Language': 'en-US,en;q=0.9',
}

export const DEFAULT_HARVEST_CONFIG: HarvestConfig = {
  baseUrl: 'https://www.bloodhorse.com/stallion-register',
  pageYears: { first: 2006, last: 2025 },
  probeYear: 2000,
  sectionMarker: 'Weanlings',
  factYearMapping: 'embedded',
  factYearBounds: { min: 1990, max: 2030 },
  strategies: ['probe-redirect', 'search-query'],
  fetch: {
    timeoutMs: 12_000,
    maxAttempts: 3,
    maxSizeBytes: 10 * 1024 * 1024,
    headers: DEFAULT_FETCH_HEADERS,
    retryDelay: { minMs: 1000, maxMs: 4000 },
  },
  pageDelay: { minMs: 1000, maxMs: 3000 },
  webSearch: {
    endpoint: 'https://html.duckduckgo.com/html/?q=',
    yearOffsets: [0, 1, -1],
  },
}

const strategyIdSchema = z.enum(['probe-redirect', 'search-query', 'web-search'])

const delayRangeSchema = z
  .object({
    minMs: z.number().int().nonnegative(),
    maxMs: z.number().int().nonnegative(),
  })
  .refine(range => range.minMs <= range.maxMs, { message: 'minMs must not exceed maxMs' })

const harvestConfigSchema = z.object({
  baseUrl: z.string().url(),
  pageYears: z
    .object({ first: z.number().int(), last: z.number().int() })
    .refine(range => range.first <= range.last, { message: 'first page-year must not exceed last' }),
  probeYear: z.number().int(),
  sectionMarker: z.string().min(1),
  factYearMapping: z.enum(['embedded', 'prior-page-year']),
  factYearBounds: z
    .object({ min: z.number().int(), max: z.number().int() })
    .refine(bounds => bounds.min <= bounds.max, { message: 'min must not exceed max' }),
  strategies: z
    .array(strategyIdSchema)
    .min(1)
    .refine(ids => new Set(ids).size === ids.length, { message: 'strategies must be unique' }),
  fetch: z.object({
    timeoutMs: z.number().int().positive(),
    maxAttempts: z.number().int().min(1),
    maxSizeBytes: z.number().int().positive(),
    headers: z.record(z.string()),
    retryDelay: delayRangeSchema,
  }),
  pageDelay: delayRangeSchema,
  webSearch: z.object({
    endpoint: z.string().url(),
    yearOffsets: z.array(z.number().int()).min(1),
  }),
})

function freezeConfig(config: HarvestConfig): HarvestConfig {
  return Object.freeze({
    ...config,
    pageYears: Object.freeze({ ...config.pageYears }),
    factYearBounds: Object.freeze({ ...config.factYearBounds }),
    strategies: Object.freeze([...config.strategies]),
    fetch: Object.freeze({
      ...config.fetch,
      headers: Object.freeze({ ...config.fetch.headers }),
      retryDelay: Object.freeze({ ...config.fetch.retryDelay }),
    }),
    pageDelay: Object.freeze({ ...config.pageDelay }),
    webSearch: Object.freeze({
      ...config.webSearch,
      yearOffsets: Object.freeze([...config.webSearch.yearOffsets]),
    }),
  })
}

/**
 * Layer overrides over `base` (the defaults unless given), validate, and freeze.
 * Keys explicitly set to undefined keep the base value.
 * @throws ConfigurationError when the merged value is invalid
 */
export function createHarvestConfig(
  overrides: HarvestConfigOverrides = {},
  base: HarvestConfig = DEFAULT_HARVEST_CONFIG
): HarvestConfig {
  const merged: HarvestConfig = {
    baseUrl: (overrides.baseUrl ?? base.baseUrl).replace(/\/+$/, ''),
    pageYears: {
      first: overrides.pageYears?.first ?? base.pageYears.first,
      last: overrides.pageYears?.last ?? base.pageYears.last,
    },
    probeYear: overrides.probeYear ?? base.probeYear,
    sectionMarker: overrides.sectionMarker ?? base.sectionMarker,
    factYearMapping: overrides.factYearMapping ?? base.factYearMapping,
    factYearBounds: overrides.factYearBounds ?? base.factYearBounds,
    strategies: overrides.strategies ?? base.strategies,
    fetch: {
      timeoutMs: overrides.fetch?.timeoutMs ?? base.fetch.timeoutMs,
      maxAttempts: overrides.fetch?.maxAttempts ?? base.fetch.maxAttempts,
      maxSizeBytes: overrides.fetch?.maxSizeBytes ?? base.fetch.maxSizeBytes,
      headers: { ...base.fetch.headers, ...overrides.fetch?.headers },
      retryDelay: overrides.fetch?.retryDelay ?? base.fetch.retryDelay,
    },
    pageDelay: overrides.pageDelay ?? base.pageDelay,
    webSearch: {
      endpoint: overrides.webSearch?.endpoint ?? base.webSearch.endpoint,
      yearOffsets: overrides.webSearch?.yearOffsets ?? base.webSearch.yearOffsets,
    },
  }

  const parsed = harvestConfigSchema.safeParse(merged)
  if (!parsed.success) {
    const issues = issuesFromZod(parsed.error)
    throw new ConfigurationError(`Invalid harvest configuration: ${describeIssues(issues)}`, issues)
  }

  return freezeConfig(merged)
}

const optionalInt = z.coerce.number().int().optional()

const envSchema = z.object({
  HARVEST_BASE_URL: z.string().url().optional(),
  HARVEST_FIRST_PAGE_YEAR: optionalInt,
  HARVEST_LAST_PAGE_YEAR: optionalInt,
  HARVEST_PROBE_YEAR: optionalInt,
  HARVEST_SECTION_MARKER: z.string().min(1).optional(),
  HARVEST_FACT_YEAR_MAPPING: z.enum(['embedded', 'prior-page-year']).optional(),
  HARVEST_STRATEGIES: z
    .string()
    .transform(value =>
      value
        .split(',')
        .map(token => token.trim())
        .filter(token => token.length > 0)
    )
    .pipe(z.array(strategyIdSchema))
    .optional(),
  FETCH_TIMEOUT_MS: optionalInt,
  FETCH_MAX_ATTEMPTS: optionalInt,
  FETCH_RETRY_DELAY_MIN_MS: optionalInt,
  FETCH_RETRY_DELAY_MAX_MS: optionalInt,
  PAGE_DELAY_MIN_MS: optionalInt,
  PAGE_DELAY_MAX_MS: optionalInt,
})

/**
 * Build the config from environment variables (unset keys keep defaults),
 * then layer `overrides` (e.g. CLI flags) on top.
 */
export function loadHarvestConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: HarvestConfigOverrides = {}
): HarvestConfig {
  // Empty strings count as unset.
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  )
  const parsed = envSchema.safeParse(present)
  if (!parsed.success) {
    const issues = issuesFromZod(parsed.error)
    throw new ConfigurationError(`Invalid environment: ${describeIssues(issues)}`, issues)
  }
  const vars = parsed.data
  const defaults = DEFAULT_HARVEST_CONFIG

  const fromEnv = createHarvestConfig({
    baseUrl: vars.HARVEST_BASE_URL,
    pageYears: {
      first: vars.HARVEST_FIRST_PAGE_YEAR,
      last: vars.HARVEST_LAST_PAGE_YEAR,
    },
    probeYear: vars.HARVEST_PROBE_YEAR,
    sectionMarker: vars.HARVEST_SECTION_MARKER,
    factYearMapping: vars.HARVEST_FACT_YEAR_MAPPING,
    strategies: vars.HARVEST_STRATEGIES,
    fetch: {
      timeoutMs: vars.FETCH_TIMEOUT_MS,
      maxAttempts: vars.FETCH_MAX_ATTEMPTS,
      retryDelay: {
        minMs: vars.FETCH_RETRY_DELAY_MIN_MS ?? defaults.fetch.retryDelay.minMs,
        maxMs: vars.FETCH_RETRY_DELAY_MAX_MS ?? defaults.fetch.retryDelay.maxMs,
      },
    },
    pageDelay: {
      minMs: vars.PAGE_DELAY_MIN_MS ?? defaults.pageDelay.minMs,
      maxMs: vars.PAGE_DELAY_MAX_MS ?? defaults.pageDelay.maxMs,
    },
  })

  return createHarvestConfig(overrides, fromEnv)
}
