/**
 * CSV input loader.
 *
 * Expects exactly the columns `Sire` and `sale_year` (any order):
 *
 *   Sire,sale_year
 *   Yoshida (JPN),2020
 *
 * Rows are mapped to `{ name, contextYear }` and validated as one batch.
 */

import { readFile } from 'node:fs/promises'
import { parse as csvParse } from 'csv-parse/sync'
import { z } from 'zod'
import { InvalidInputSchemaError } from '../errors.js'
import type { EntityRecord } from '../scraper/types.js'
import { validateInputRecords } from './schema.js'

export const INPUT_COLUMNS = {
  name: 'Sire',
  contextYear: 'sale_year',
} as const

const rowsSchema = z.array(z.array(z.string()))

export function parseInputCsv(content: string): EntityRecord[] {
  let parsed: unknown
  try {
    parsed = csvParse(content, {
      bom: true,
      skip_empty_lines: true,
      relax_column_count: true,
    })
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    throw new InvalidInputSchemaError(`Unreadable input CSV: ${message}`)
  }

  const rows = rowsSchema.parse(parsed)
  const [header, ...body] = rows
  if (!header) {
    throw new InvalidInputSchemaError('Input CSV is empty')
  }

  const columns = header.map(column => column.trim())
  const expected: string[] = [INPUT_COLUMNS.name, INPUT_COLUMNS.contextYear]
  const matches =
    columns.length === expected.length && expected.every(column => columns.includes(column))
  if (!matches) {
    throw new InvalidInputSchemaError(
      `Input CSV must have exactly the columns ${expected.join(', ')}; found ${columns.join(', ') || 'none'}`,
      [{ path: 'header', message: `expected ${expected.join(',')}` }]
    )
  }

  const nameIndex = columns.indexOf(INPUT_COLUMNS.name)
  const yearIndex = columns.indexOf(INPUT_COLUMNS.contextYear)

  return validateInputRecords(
    body.map(row => ({
      name: row[nameIndex] ?? '',
      contextYear: row[yearIndex],
    }))
  )
}

export async function loadInputCsv(path: string): Promise<EntityRecord[]> {
  const content = await readFile(path, 'utf-8')
  return parseInputCsv(content)
}
