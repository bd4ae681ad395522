import type { ILogger } from '@studfee/logger'
import type { HarvestConfig } from '../config/settings.js'
import type {
  DelayStrategy,
  EntityRecord,
  Fetcher,
  ResolutionStrategyId,
  ResolvedEntity,
} from '../scraper/types.js'

/**
 * One way of mapping a name to a ResolvedEntity.
 * Returns null on a miss; the resolver moves on to the next strategy.
 */
export interface ResolutionStrategy {
  readonly id: ResolutionStrategyId
  resolve(record: EntityRecord): Promise<ResolvedEntity | null>
}

export interface StrategyDependencies {
  fetcher: Fetcher
  config: HarvestConfig
  delay: DelayStrategy
  logger: ILogger
}
