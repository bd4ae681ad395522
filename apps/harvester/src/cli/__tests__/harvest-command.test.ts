import { describe, expect, it } from 'vitest'
import { ConfigurationError, InvalidInputSchemaError } from '../../errors.js'
import { CliUsageError, exitCodeFor, parseHarvestOptions } from '../commands/harvest.js'

describe('parseHarvestOptions', () => {
  it('turns flags into config overrides', () => {
    const options = parseHarvestOptions({
      input: 'sires.csv',
      output: 'fees.csv',
      'first-year': '2010',
      'last-year': '2012',
      strategies: 'search-query,web-search',
      'fact-year-mapping': 'prior-page-year',
      debug: true,
    })

    expect(options).toEqual({
      input: 'sires.csv',
      output: 'fees.csv',
      overrides: {
        pageYears: { first: 2010, last: 2012 },
        strategies: ['search-query', 'web-search'],
        factYearMapping: 'prior-page-year',
      },
      verbosity: 'debug',
    })
  })

  it('leaves unset flags out of the overrides', () => {
    expect(parseHarvestOptions({ input: 'a.csv', output: 'b.csv' })).toEqual({
      input: 'a.csv',
      output: 'b.csv',
      overrides: {},
      verbosity: 'normal',
    })
  })

  it('requires input and output', () => {
    expect(() => parseHarvestOptions({ input: 'a.csv' })).toThrow(CliUsageError)
  })

  it('rejects malformed values', () => {
    expect(() => parseHarvestOptions({ input: 'a', output: 'b', 'first-year': '20x' })).toThrow(
      '--first-year expects a 4-digit year'
    )
    expect(() => parseHarvestOptions({ input: 'a', output: 'b', strategies: 'probe-redirect,nope' })).toThrow(
      'Unknown strategy: nope'
    )
    expect(() => parseHarvestOptions({ input: 'a', output: 'b', quiet: true, debug: true })).toThrow(
      CliUsageError
    )
  })
})

describe('exitCodeFor', () => {
  it('maps usage and input problems to 2 and everything else to 1', () => {
    expect(exitCodeFor(new CliUsageError('usage'))).toBe(2)
    expect(exitCodeFor(new InvalidInputSchemaError('bad input'))).toBe(2)
    expect(exitCodeFor(new ConfigurationError('bad config'))).toBe(2)
    expect(exitCodeFor(new Error('network down'))).toBe(1)
  })
})
