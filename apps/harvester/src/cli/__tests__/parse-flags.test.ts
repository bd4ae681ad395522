import { describe, expect, it } from 'vitest'
import { CliUsageError, HARVEST_FLAGS, parseFlags } from '../parse-flags.js'

describe('parseFlags', () => {
  it('reads value flags and switches', () => {
    const flags = parseFlags(
      ['--input', 'sires.csv', '--output', 'fees.csv', '--first-year', '2010', '--quiet'],
      HARVEST_FLAGS
    )
    expect(flags).toEqual({ input: 'sires.csv', output: 'fees.csv', 'first-year': '2010', quiet: true })
  })

  it('accepts --key=value', () => {
    const flags = parseFlags(['--strategies=search-query,web-search', '--fact-year-mapping=embedded'], HARVEST_FLAGS)
    expect(flags.strategies).toBe('search-query,web-search')
    expect(flags['fact-year-mapping']).toBe('embedded')
  })

  it('maps -h to help', () => {
    expect(parseFlags(['-h'], HARVEST_FLAGS)).toEqual({ help: true })
  })

  it('rejects unknown flags', () => {
    expect(() => parseFlags(['--input', 'a.csv', '--site-id', 'x'], HARVEST_FLAGS)).toThrow('Unknown flag: --site-id')
  })

  it('rejects stray positional tokens', () => {
    expect(() => parseFlags(['--input', 'my', 'sires.csv'], HARVEST_FLAGS)).toThrow('Unexpected argument: sires.csv')
  })

  it('rejects a value flag without a value', () => {
    expect(() => parseFlags(['--input', '--quiet'], HARVEST_FLAGS)).toThrow('--input expects a value')
    expect(() => parseFlags(['--output'], HARVEST_FLAGS)).toThrow('--output expects a value')
    expect(() => parseFlags(['--output='], HARVEST_FLAGS)).toThrow('--output expects a value')
  })

  it('rejects a value on a switch and repeated flags', () => {
    expect(() => parseFlags(['--debug=yes'], HARVEST_FLAGS)).toThrow('--debug does not take a value')
    expect(() => parseFlags(['--input', 'a.csv', '--input', 'b.csv'], HARVEST_FLAGS)).toThrow(CliUsageError)
  })
})
