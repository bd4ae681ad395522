#!/usr/bin/env tsx
import '../env.js'
import { loggers } from '../config/logger.js'
import { exitCodeFor, parseHarvestOptions, runHarvestCommand } from './commands/harvest.js'
import { HARVEST_FLAGS, parseFlags } from './parse-flags.js'

const log = loggers.cli

function printHelp(): void {
  console.log('Stud fee harvester')
  console.log('')
  console.log('Commands:')
  console.log('  harvest --input <csv> --output <csv>')
  console.log('          [--first-year 2006] [--last-year 2025]')
  console.log('          [--strategies probe-redirect,search-query,web-search]')
  console.log('          [--fact-year-mapping embedded|prior-page-year]')
  console.log('          [--quiet | --debug]')
  console.log('')
  console.log('Input columns: Sire,sale_year')
  console.log('Output columns: Sire,stud_fee_year,stud_fee_usd')
}

async function main(): Promise<number> {
  const [, , command, ...rest] = process.argv
  if (!command || command === '--help' || command === '-h') {
    printHelp()
    return 0
  }

  switch (command) {
    case 'harvest': {
      const flags = parseFlags(rest, HARVEST_FLAGS)
      if (flags.help === true) {
        printHelp()
        return 0
      }
      const summary = await runHarvestCommand(parseHarvestOptions(flags))
      log.info('Done', { ...summary })
      return 0
    }
    default:
      console.error(`Unknown command: ${command}`)
      printHelp()
      return 2
  }
}

main()
  .then(code => {
    process.exitCode = code
  })
  .catch((error: unknown) => {
    const code = exitCodeFor(error)
    if (code === 2) {
      log.error(error instanceof Error ? error.message : String(error))
    } else {
      log.fatal('Harvest failed', {}, error)
    }
    process.exitCode = code
  })
