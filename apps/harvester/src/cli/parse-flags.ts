/**
 * Flag parsing for the harvester CLI.
 *
 * Each command declares which flags take a value and which are switches.
 * Values come as `--key value` or `--key=value`; anything else (unknown
 * flags, stray positional tokens, a value flag with no value, a flag given
 * twice) is a usage error.
 */

export type Flags = Record<string, string | boolean>

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'CliUsageError'
  }
}

export interface FlagSpec {
  values: readonly string[]
  switches: readonly string[]
}

export const HARVEST_FLAGS: FlagSpec = {
  values: ['input', 'output', 'first-year', 'last-year', 'strategies', 'fact-year-mapping'],
  switches: ['quiet', 'debug', 'help'],
}

/**
 * @throws CliUsageError on anything the spec does not accept
 */
export function parseFlags(argv: readonly string[], spec: FlagSpec): Flags {
  const flags: Flags = {}

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i]
    if (token === '-h') {
      flags.help = true
      continue
    }
    if (!token.startsWith('--')) {
      throw new CliUsageError(`Unexpected argument: ${token}`)
    }

    const eq = token.indexOf('=')
    const key = eq === -1 ? token.slice(2) : token.slice(2, eq)
    if (key in flags) {
      throw new CliUsageError(`--${key} given more than once`)
    }

    if (spec.switches.includes(key)) {
      if (eq !== -1) {
        throw new CliUsageError(`--${key} does not take a value`)
      }
      flags[key] = true
      continue
    }

    if (!spec.values.includes(key)) {
      throw new CliUsageError(`Unknown flag: --${key}`)
    }

    let value: string | undefined
    if (eq !== -1) {
      value = token.slice(eq + 1)
    } else if (i + 1 < argv.length && !argv[i + 1].startsWith('--')) {
      value = argv[i + 1]
      i++
    }
    if (!value) {
      throw new CliUsageError(`--${key} expects a value`)
    }
    flags[key] = value
  }

  return flags
}

export function asString(value: string | boolean | undefined): string {
  return typeof value === 'string' ? value : ''
}
