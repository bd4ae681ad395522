/**
 * Harvester Core Types
 *
 * Shared contracts for the resolve → crawl → extract → merge pipeline:
 * entities, fetch results, page facts, fact tables and the collaborators
 * (Fetcher, DelayStrategy, PageFactExtractor) each stage is built against.
 */

// ═══════════════════════════════════════════════════════════════════════════════
// Entities
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * One input row. `name` is the raw entity name as supplied;
 * `contextYear` is informational (a search disambiguation hint).
 */
export interface EntityRecord {
  name: string
  contextYear?: number
}

/**
 * Canonical identifier on the stallion register.
 *
 * Invariants: `id` is exactly 6 ASCII digits, `slug` matches /^[a-z0-9-]+$/.
 * Construct through `toResolvedEntity()` which enforces both and freezes.
 */
export interface ResolvedEntity {
  readonly id: string
  readonly slug: string
}

export type ResolutionStrategyId = 'probe-redirect' | 'search-query' | 'web-search'

export const RESOLUTION_STRATEGY_IDS: readonly ResolutionStrategyId[] = [
  'probe-redirect',
  'search-query',
  'web-search',
]

/**
 * Resolution outcome - explicit success or NOT_FOUND, never a thrown error.
 */
export type ResolveResult =
  | { ok: true; entity: ResolvedEntity; strategy: ResolutionStrategyId }
  | { ok: false; reason: 'NOT_FOUND'; attempted: ResolutionStrategyId[] }

// ═══════════════════════════════════════════════════════════════════════════════
// Fetching
// ═══════════════════════════════════════════════════════════════════════════════

export interface FetchOptions {
  /** Per-attempt timeout in ms */
  timeoutMs?: number

  /** Maximum response size in bytes */
  maxSizeBytes?: number

  /** Custom headers (merged over the fixed header set) */
  headers?: Record<string, string>

  /**
   * 'manual' returns 3xx responses as a terminal `redirect` result
   * with the Location header instead of following them.
   */
  redirect?: 'follow' | 'manual'
}

export type FetchResultStatus = 'ok' | 'redirect' | 'error' | 'timeout' | 'too_large'

export interface FetchResult {
  status: FetchResultStatus
  statusCode?: number
  body?: string
  /** Location header of a `redirect` result */
  location?: string
  error?: string
  /** Attempts made, including the final one */
  attempts: number
  durationMs: number
}

/**
 * Networking primitive with the politeness policy baked in.
 * Implementations never throw for transport or status failures.
 */
export interface Fetcher {
  fetch(url: string, options?: FetchOptions): Promise<FetchResult>
}

/**
 * Document body of a successful fetch, or null (soft failure).
 */
export function bodyOf(result: FetchResult): string | null {
  return result.status === 'ok' && result.body !== undefined ? result.body : null
}

// ═══════════════════════════════════════════════════════════════════════════════
// Politeness
// ═══════════════════════════════════════════════════════════════════════════════

/** Closed interval in ms a jittered delay is sampled from. */
export interface DelayRange {
  minMs: number
  maxMs: number
}

export interface DelayStrategy {
  wait(range: DelayRange): Promise<void>
}

// ═══════════════════════════════════════════════════════════════════════════════
// Extraction
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * fact-year → amount for a single page, ordered by each year's last match
 * in the document.
 */
export type PageFacts = Map<number, number>

export type ExtractionMissReason = 'SECTION_MARKER_MISSING' | 'NO_FEE_PATTERN'

/**
 * Page extraction outcome. A miss is "no applicable data", not an error.
 */
export type PageExtractResult =
  | { ok: true; facts: PageFacts }
  | { ok: false; reason: ExtractionMissReason; facts: PageFacts }

export interface PageFactExtractor {
  extract(body: string): PageFacts
}

/**
 * How a page's facts are keyed.
 * - embedded: the year literal inside the page is authoritative
 * - prior-page-year: facts found on page-year Y belong to fact-year Y-1
 */
export type FactYearMapping = 'embedded' | 'prior-page-year'

// ═══════════════════════════════════════════════════════════════════════════════
// Aggregation & Output
// ═══════════════════════════════════════════════════════════════════════════════

export interface YearRange {
  first: number
  last: number
}

export interface Fact {
  factYear: number
  amount: number
}

/** Sorted ascending by factYear, unique by factYear. */
export type FactTable = readonly Fact[]

export interface HarvestMetrics {
  pagesAttempted: number
  pagesFailed: number
  /** Fetched pages that yielded no facts (marker or pattern absent) */
  pagesWithoutFacts: number
  pagesWithFacts: number
  /** Facts dropped because an earlier page-year already asserted the year */
  factsShadowed: number
}

export interface HarvestResult {
  entity: ResolvedEntity
  facts: FactTable
  metrics: HarvestMetrics
}

export interface FactRow {
  name: string
  factYear: number
  amount: number
}

/**
 * External result writer. Receives every row of a run exactly once.
 */
export interface ResultWriter {
  write(rows: readonly FactRow[]): Promise<void>
}
