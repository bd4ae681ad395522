/**
 * Probe-redirect resolution.
 *
 * Requesting a stallion page with the sentinel id 0 and a guessed slug makes
 * the register answer with a redirect to the canonical page. The id and the
 * corrected slug are read from the Location header; the redirect itself is
 * never followed.
 */

import type { EntityRecord, ResolvedEntity } from '../../scraper/types.js'
import { buildProbeUrl, parseStallionPath } from '../../scraper/utils/url.js'
import { slugCandidates } from '../slug.js'
import type { ResolutionStrategy, StrategyDependencies } from '../types.js'

export class ProbeRedirectStrategy implements ResolutionStrategy {
  readonly id = 'probe-redirect' as const
  private readonly deps: StrategyDependencies

  constructor(deps: StrategyDependencies) {
    this.deps = deps
  }

  async resolve(record: EntityRecord): Promise<ResolvedEntity | null> {
    const { fetcher, config, logger } = this.deps

    for (const slug of slugCandidates(record.name)) {
      const url = buildProbeUrl(config.baseUrl, slug, config.probeYear)
      const result = await fetcher.fetch(url, { redirect: 'manual' })

      if (result.status !== 'redirect' || !result.location) {
        logger.debug('Probe did not redirect', { slug, status: result.status, statusCode: result.statusCode })
        continue
      }

      const entity = parseStallionPath(result.location)
      if (entity) {
        return entity
      }
      logger.debug('Probe redirect target not recognised', { slug, location: result.location })
    }

    return null
  }
}
