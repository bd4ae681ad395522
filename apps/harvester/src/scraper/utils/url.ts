/**
 * Stallion register URL templates and path parsing.
 *
 *   {base}/stallions/{id}/{slug}/auctions/{pageYear}   per page-year document
 *   {base}/stallions/0/{slug}/auctions/{probeYear}     probe-redirect request
 *   {base}/search?keyword={query}                      search request
 */

import type { ResolvedEntity } from '../types.js'

/** Identifier used in the probe request; the server redirects to the real one. */
export const PROBE_SENTINEL_ID = '0'

const ENTITY_ID_PATTERN = /^\d{6}$/
const SLUG_PATTERN = /^[a-z0-9-]+$/

/** `/stallions/{6 digits}/{slug}` anywhere in a path, URL or Location value */
const STALLION_PATH_PATTERN = /\/stallions\/(\d{6})\/([^/?#"'\s]+)/

export function buildAuctionsUrl(baseUrl: string, entity: ResolvedEntity, pageYear: number): string {
  return `${baseUrl}/stallions/${entity.id}/${entity.slug}/auctions/${pageYear}`
}

export function buildProbeUrl(baseUrl: string, slug: string, probeYear: number): string {
  return `${baseUrl}/stallions/${PROBE_SENTINEL_ID}/${slug}/auctions/${probeYear}`
}

export function buildSearchUrl(baseUrl: string, query: string): string {
  return `${baseUrl}/search?keyword=${encodeURIComponent(query)}`
}

/**
 * Build a ResolvedEntity, enforcing the id and slug invariants.
 * Returns null when either part does not qualify.
 */
export function toResolvedEntity(id: string, slug: string): ResolvedEntity | null {
  if (!ENTITY_ID_PATTERN.test(id) || !SLUG_PATTERN.test(slug)) {
    return null
  }
  return Object.freeze({ id, slug })
}

/**
 * Find the first `/stallions/{id}/{slug}` segment pair in a URL or path.
 * Only identifiers literally present in the input are ever returned.
 */
export function parseStallionPath(value: string): ResolvedEntity | null {
  const match = STALLION_PATH_PATTERN.exec(value)
  if (!match) {
    return null
  }
  return toResolvedEntity(match[1], match[2])
}
