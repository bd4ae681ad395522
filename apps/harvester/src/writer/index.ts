/**
 * CSV result writer.
 *
 * One row per (entity, fact year):
 *
 *   Sire,stud_fee_year,stud_fee_usd
 *   Yoshida (JPN),2019,15000
 */

import { writeFile } from 'node:fs/promises'
import { stringify } from 'csv-stringify/sync'
import type { FactRow, ResultWriter } from '../scraper/types.js'

export const OUTPUT_COLUMNS = [
  { key: 'name', header: 'Sire' },
  { key: 'factYear', header: 'stud_fee_year' },
  { key: 'amount', header: 'stud_fee_usd' },
]

export function formatResultCsv(rows: readonly FactRow[]): string {
  return stringify([...rows], { header: true, columns: OUTPUT_COLUMNS })
}

export class CsvResultWriter implements ResultWriter {
  private readonly path: string

  constructor(path: string) {
    this.path = path
  }

  async write(rows: readonly FactRow[]): Promise<void> {
    await writeFile(this.path, formatResultCsv(rows), 'utf-8')
  }
}

/**
 * Keeps rows in memory. Used by tests and library callers.
 */
export class MemoryResultWriter implements ResultWriter {
  readonly batches: FactRow[][] = []

  get rows(): FactRow[] {
    return this.batches.flat()
  }

  async write(rows: readonly FactRow[]): Promise<void> {
    this.batches.push([...rows])
  }
}
