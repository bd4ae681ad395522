import { describe, it, expect } from 'vitest'
import { loggers } from '../../config/logger.js'
import { RecordingDelay, noDelay } from '../../scraper/fetch/delay.js'
import { buildProbeUrl, buildSearchUrl } from '../../scraper/utils/url.js'
import { FakeFetcher, TEST_BASE_URL, testConfig } from '../../test/fakes.js'
import { ProbeRedirectStrategy } from '../strategies/probe-redirect.js'
import { SearchQueryStrategy, findStallionLink } from '../strategies/search-query.js'
import {
  WebSearchStrategy,
  buildWebSearchQuery,
  findAuctionsLink,
  unwrapResultLink,
} from '../strategies/web-search.js'
import type { DelayStrategy } from '../../scraper/types.js'

function deps(fetcher: FakeFetcher, delay: DelayStrategy = noDelay) {
  return { fetcher, config: testConfig(), delay, logger: loggers.resolver }
}

describe('ProbeRedirectStrategy', () => {
  it('reads id and canonical slug from the redirect location', async () => {
    const fetcher = new FakeFetcher().redirect(
      buildProbeUrl(TEST_BASE_URL, 'yoshida-jpn', 2000),
      '/stallion-register/stallions/654321/yoshida/auctions/2000'
    )

    const entity = await new ProbeRedirectStrategy(deps(fetcher)).resolve({ name: 'Yoshida (JPN)' })

    expect(entity).toEqual({ id: '654321', slug: 'yoshida' })
    expect(fetcher.calls[0].options).toEqual({ redirect: 'manual' })
  })

  it('falls back to the plain base slug', async () => {
    const fetcher = new FakeFetcher().redirect(
      buildProbeUrl(TEST_BASE_URL, 'yoshida', 2000),
      'https://register.test/stallions/654321/yoshida/auctions/2000'
    )

    const entity = await new ProbeRedirectStrategy(deps(fetcher)).resolve({ name: 'Yoshida (JPN)' })

    expect(entity).toEqual({ id: '654321', slug: 'yoshida' })
    expect(fetcher.urls).toEqual([
      buildProbeUrl(TEST_BASE_URL, 'yoshida-jpn', 2000),
      buildProbeUrl(TEST_BASE_URL, 'yoshida', 2000),
    ])
  })

  it('misses when the probe does not redirect', async () => {
    const fetcher = new FakeFetcher().page(buildProbeUrl(TEST_BASE_URL, 'gio-ponti', 2000), '<html></html>')
    expect(await new ProbeRedirectStrategy(deps(fetcher)).resolve({ name: 'Gio Ponti' })).toBeNull()
  })

  it('misses when the location carries no stallion id', async () => {
    const fetcher = new FakeFetcher().redirect(buildProbeUrl(TEST_BASE_URL, 'gio-ponti', 2000), '/stallion-register')
    expect(await new ProbeRedirectStrategy(deps(fetcher)).resolve({ name: 'Gio Ponti' })).toBeNull()
  })
})

describe('SearchQueryStrategy', () => {
  const resultsPage = `
    <ul>
      <li><a href="/about">About</a></li>
      <li><a href="/stallions/111222/Gio_Ponti">bad slug</a></li>
      <li><a href="https://register.test/stallions/111222/gio-ponti">Gio Ponti</a></li>
    </ul>`

  it('finds the first valid stallion link', () => {
    expect(findStallionLink(resultsPage)).toEqual({ id: '111222', slug: 'gio-ponti' })
  })

  it('tries the slug query when the raw name finds nothing', async () => {
    const fetcher = new FakeFetcher()
      .page(buildSearchUrl(TEST_BASE_URL, 'Gio Ponti'), '<p>No results</p>')
      .page(buildSearchUrl(TEST_BASE_URL, 'gio-ponti'), resultsPage)

    const entity = await new SearchQueryStrategy(deps(fetcher)).resolve({ name: 'Gio Ponti' })

    expect(entity).toEqual({ id: '111222', slug: 'gio-ponti' })
    expect(fetcher.calls).toHaveLength(2)
  })

  it('misses when no query returns a link', async () => {
    const entity = await new SearchQueryStrategy(deps(new FakeFetcher())).resolve({ name: 'Gio Ponti' })
    expect(entity).toBeNull()
  })
})

describe('WebSearchStrategy', () => {
  const endpoint = testConfig().webSearch.endpoint
  const searchUrl = (name: string, year: number) =>
    `${endpoint}${encodeURIComponent(buildWebSearchQuery(name, year))}`
  const target = 'https://www.bloodhorse.com/stallion-register/stallions/654321/yoshida/auctions/2020'
  const resultsPage = `<a class="result__a" href="//duckduckgo.com/l/?uddg=${encodeURIComponent(target)}&rut=x">Yoshida</a>`

  it('builds the query from name and year', () => {
    expect(buildWebSearchQuery('Yoshida (JPN)', 2020)).toBe('Yoshida (JPN) 2020 worldwide sales results bloodhorse')
  })

  it('unwraps redirect links', () => {
    expect(unwrapResultLink(`//duckduckgo.com/l/?uddg=${encodeURIComponent(target)}`)).toBe(target)
    expect(unwrapResultLink(target)).toBe(target)
  })

  it('reads the entity from an auctions link', () => {
    expect(findAuctionsLink(resultsPage)).toEqual({ id: '654321', slug: 'yoshida' })
  })

  it('tries the following year when the sale year finds nothing', async () => {
    const delay = new RecordingDelay()
    const fetcher = new FakeFetcher()
      .page(searchUrl('Yoshida (JPN)', 2020), '<p>nothing</p>')
      .page(searchUrl('Yoshida (JPN)', 2021), resultsPage)

    const entity = await new WebSearchStrategy(deps(fetcher, delay)).resolve({
      name: 'Yoshida (JPN)',
      contextYear: 2020,
    })

    expect(entity).toEqual({ id: '654321', slug: 'yoshida' })
    expect(fetcher.urls).toEqual([searchUrl('Yoshida (JPN)', 2020), searchUrl('Yoshida (JPN)', 2021)])
    expect(delay.requested).toHaveLength(1)
  })

  it('is skipped without a context year', async () => {
    const fetcher = new FakeFetcher()
    expect(await new WebSearchStrategy(deps(fetcher)).resolve({ name: 'Yoshida (JPN)' })).toBeNull()
    expect(fetcher.calls).toHaveLength(0)
  })
})
