/**
 * Input record validation.
 *
 * The whole batch is checked before any network request. One bad record fails
 * the run with InvalidInputSchemaError; nothing is crawled and nothing written.
 */

import { z } from 'zod'
import { InvalidInputSchemaError, describeIssues, issuesFromZod } from '../errors.js'
import type { EntityRecord } from '../scraper/types.js'

const blankToUndefined = (value: unknown): unknown =>
  value === null || (typeof value === 'string' && value.trim() === '') ? undefined : value

export const entityRecordSchema = z.object({
  // Kept raw; strategies normalise it themselves.
  name: z.string().refine(value => value.trim().length > 0, { message: 'name must not be blank' }),
  contextYear: z.preprocess(blankToUndefined, z.coerce.number().int().min(1000).max(9999).optional()),
})

export const entityRecordsSchema = z.array(entityRecordSchema)

/**
 * @throws InvalidInputSchemaError listing every offending record and field
 */
export function validateInputRecords(records: readonly unknown[]): EntityRecord[] {
  const parsed = entityRecordsSchema.safeParse(records)
  if (!parsed.success) {
    const issues = issuesFromZod(parsed.error)
    throw new InvalidInputSchemaError(`Invalid input records: ${describeIssues(issues)}`, issues)
  }
  return parsed.data.map(record =>
    record.contextYear === undefined
      ? { name: record.name }
      : { name: record.name, contextYear: record.contextYear }
  )
}
