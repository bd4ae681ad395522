import { describe, it, expect, vi } from 'vitest'
import { FakeFetcher, testConfig } from '../../test/fakes.js'
import { EntityResolver } from '../index.js'
import type { ResolutionStrategy } from '../index.js'
import type { ResolutionStrategyId, ResolvedEntity } from '../../scraper/types.js'

function stubStrategy(id: ResolutionStrategyId, impl: () => Promise<ResolvedEntity | null>) {
  return { id, resolve: vi.fn(impl) } satisfies ResolutionStrategy
}

const entity: ResolvedEntity = { id: '123456', slug: 'test-horse' }

describe('EntityResolver', () => {
  it('returns the first strategy hit', async () => {
    const probe = stubStrategy('probe-redirect', async () => null)
    const search = stubStrategy('search-query', async () => entity)
    const web = stubStrategy('web-search', async () => entity)

    const resolver = new EntityResolver({
      fetcher: new FakeFetcher(),
      config: testConfig(),
      strategies: [probe, search, web],
    })

    expect(await resolver.resolve('Test Horse')).toEqual({ ok: true, entity, strategy: 'search-query' })
    expect(web.resolve).not.toHaveBeenCalled()
  })

  it('treats a throwing strategy as a miss', async () => {
    const resolver = new EntityResolver({
      fetcher: new FakeFetcher(),
      config: testConfig(),
      strategies: [
        stubStrategy('probe-redirect', async () => {
          throw new Error('boom')
        }),
        stubStrategy('search-query', async () => entity),
      ],
    })

    const result = await resolver.resolve({ name: 'Test Horse' })
    expect(result.ok).toBe(true)
  })

  it('returns NOT_FOUND with the strategies tried', async () => {
    const resolver = new EntityResolver({ fetcher: new FakeFetcher(), config: testConfig() })

    expect(resolver.strategyIds).toEqual(['probe-redirect', 'search-query'])
    expect(await resolver.resolve({ name: 'Unknown Horse' })).toEqual({
      ok: false,
      reason: 'NOT_FOUND',
      attempted: ['probe-redirect', 'search-query'],
    })
  })

  it('builds web search into the chain when configured', () => {
    const resolver = new EntityResolver({
      fetcher: new FakeFetcher(),
      config: testConfig({ strategies: ['web-search', 'probe-redirect'] }),
    })
    expect(resolver.strategyIds).toEqual(['web-search', 'probe-redirect'])
  })
})
