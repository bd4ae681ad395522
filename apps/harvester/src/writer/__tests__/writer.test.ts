import { mkdtemp, readFile, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { describe, it, expect, afterEach } from 'vitest'
import { CsvResultWriter, MemoryResultWriter, formatResultCsv } from '../index.js'

const rows = [
  { name: 'Yoshida (JPN)', factYear: 2019, amount: 15000 },
  { name: 'Smith, Jr', factYear: 2020, amount: 5000 },
]

describe('formatResultCsv', () => {
  it('writes the header and one line per row', () => {
    expect(formatResultCsv(rows).trimEnd().split('\n')).toEqual([
      'Sire,stud_fee_year,stud_fee_usd',
      'Yoshida (JPN),2019,15000',
      '"Smith, Jr",2020,5000',
    ])
  })
})

describe('CsvResultWriter', () => {
  let dir: string | undefined

  afterEach(async () => {
    if (dir) {
      await rm(dir, { recursive: true, force: true })
      dir = undefined
    }
  })

  it('writes the rows to the output path', async () => {
    dir = await mkdtemp(join(tmpdir(), 'studfee-'))
    const path = join(dir, 'fees.csv')

    await new CsvResultWriter(path).write(rows)

    expect(await readFile(path, 'utf-8')).toBe(formatResultCsv(rows))
  })
})

describe('MemoryResultWriter', () => {
  it('keeps each write as a batch', async () => {
    const writer = new MemoryResultWriter()
    await writer.write(rows)
    expect(writer.batches).toHaveLength(1)
    expect(writer.rows).toEqual(rows)
  })
})
