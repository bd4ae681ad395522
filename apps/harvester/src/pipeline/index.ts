/**
 * Harvest pipeline: validate → (resolve → crawl → merge) per entity → write.
 *
 * Entities run strictly one after another. Rows accumulate in input order
 * and the writer receives all of them once, after the last entity.
 */

import type { ILogger } from '@studfee/logger'
import { loggers } from '../config/logger.js'
import { validateInputRecords } from '../input/schema.js'
import type {
  EntityRecord,
  FactRow,
  HarvestResult,
  ResolvedEntity,
  ResolveResult,
  ResultWriter,
} from '../scraper/types.js'

export interface EntityResolverPort {
  resolve(record: EntityRecord): Promise<ResolveResult>
}

export interface FactHarvesterPort {
  harvest(entity: ResolvedEntity): Promise<HarvestResult>
}

export interface HarvestDependencies {
  resolver: EntityResolverPort
  aggregator: FactHarvesterPort
  writer: ResultWriter
  logger?: ILogger
}

export interface HarvestSummary {
  entities: number
  resolved: number
  notFound: number
  /** Resolved entities that produced no facts */
  emptyEntities: number
  rows: number
}

/**
 * @throws InvalidInputSchemaError before any request when a record is malformed
 */
export async function runHarvest(
  records: readonly unknown[],
  deps: HarvestDependencies
): Promise<HarvestSummary> {
  const log = deps.logger ?? loggers.pipeline
  const entities = validateInputRecords(records)

  const summary: HarvestSummary = {
    entities: entities.length,
    resolved: 0,
    notFound: 0,
    emptyEntities: 0,
    rows: 0,
  }
  const rows: FactRow[] = []

  log.info('Harvest started', { entities: entities.length })

  for (const [index, record] of entities.entries()) {
    const progress = `${index + 1}/${entities.length}`
    const resolution = await deps.resolver.resolve(record)

    if (!resolution.ok) {
      summary.notFound++
      log.warn('Entity not found, skipping', {
        name: record.name,
        progress,
        attempted: resolution.attempted,
      })
      continue
    }

    summary.resolved++
    const { facts } = await deps.aggregator.harvest(resolution.entity)
    if (facts.length === 0) {
      summary.emptyEntities++
    }

    for (const fact of facts) {
      rows.push({ name: record.name, factYear: fact.factYear, amount: fact.amount })
    }

    log.info('Entity harvested', {
      name: record.name,
      progress,
      strategy: resolution.strategy,
      id: resolution.entity.id,
      facts: facts.length,
    })
  }

  await deps.writer.write(rows)
  summary.rows = rows.length

  log.info('Harvest finished', { ...summary })
  return summary
}
