/**
 * Environment loader - import before anything that reads configuration.
 *
 * Loads apps/harvester/.env.local in development. Production runs get their
 * variables from the platform and skip dotenv entirely.
 */
import { config } from 'dotenv'
import { dirname, resolve } from 'node:path'
import { fileURLToPath } from 'node:url'

if (process.env.NODE_ENV !== 'production') {
  const here = dirname(fileURLToPath(import.meta.url))
  config({ path: resolve(here, '..', '.env.local') })
}
