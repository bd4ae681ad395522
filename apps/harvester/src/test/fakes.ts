import { createHarvestConfig } from '../config/settings.js'
import type { HarvestConfig, HarvestConfigOverrides } from '../config/settings.js'
import type { Fetcher, FetchOptions, FetchResult } from '../scraper/types.js'

export const TEST_BASE_URL = 'https://register.test'

/**
 * Short crawl range, no sleeping, local base URL.
 */
export function testConfig(overrides: HarvestConfigOverrides = {}): HarvestConfig {
  return createHarvestConfig({
    baseUrl: TEST_BASE_URL,
    pageYears: { first: 2015, last: 2017 },
    pageDelay: { minMs: 0, maxMs: 0 },
    ...overrides,
    fetch: { retryDelay: { minMs: 0, maxMs: 0 }, ...overrides.fetch },
  })
}

/**
 * Fetcher backed by a URL → result table. Unknown URLs answer 404.
 */
export class FakeFetcher implements Fetcher {
  readonly calls: Array<{ url: string; options?: FetchOptions }> = []
  private readonly routes = new Map<string, FetchResult>()

  page(url: string, body: string): this {
    this.routes.set(url, { status: 'ok', statusCode: 200, body, attempts: 1, durationMs: 0 })
    return this
  }

  redirect(url: string, location: string): this {
    this.routes.set(url, { status: 'redirect', statusCode: 302, location, attempts: 1, durationMs: 0 })
    return this
  }

  fail(url: string, status: FetchResult['status'] = 'timeout'): this {
    this.routes.set(url, { status, error: 'simulated failure', attempts: 3, durationMs: 0 })
    return this
  }

  get urls(): string[] {
    return this.calls.map(call => call.url)
  }

  async fetch(url: string, options?: FetchOptions): Promise<FetchResult> {
    this.calls.push({ url, options })
    return (
      this.routes.get(url) ?? {
        status: 'error',
        statusCode: 404,
        error: 'HTTP 404: Not Found',
        attempts: 3,
        durationMs: 0,
      }
    )
  }
}
