/**
 * Slug normalisation for stallion names.
 *
 *   "Gio Ponti"      -> "gio-ponti"
 *   "Yoshida (JPN)"  -> "yoshida-jpn"   (base name + country suffix)
 *
 * All functions here are idempotent on their own output.
 */

/** "Name (XXX)" with a 2-4 character country/region code */
const SUFFIX_PATTERN = /^(.*?)\s*\((\w{2,4})\)\s*$/

export interface SuffixedName {
  base: string
  suffix: string | null
}

/**
 * Lowercase, drop characters outside [a-z0-9- ], collapse whitespace runs
 * to single hyphens. Accented letters are dropped, not folded.
 */
export function slugify(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^a-z0-9\- ]+/g, '')
    .trim()
    .replace(/\s+/g, '-')
}

export function splitSuffix(name: string): SuffixedName {
  const match = SUFFIX_PATTERN.exec(name.trim())
  if (!match) {
    return { base: name.trim(), suffix: null }
  }
  return { base: match[1].trim(), suffix: match[2] }
}

/**
 * Canonical slug guess: base name plus lowercased suffix when present.
 */
export function normalizeSlug(name: string): string {
  const { base, suffix } = splitSuffix(name)
  if (suffix === null) {
    return slugify(name)
  }
  return `${slugify(base)}-${slugify(suffix)}`
}

/**
 * Slugs to probe, in order: the suffixed form, then the plain base name.
 * Names without a suffix produce a single candidate.
 */
export function slugCandidates(name: string): string[] {
  const { base } = splitSuffix(name)
  return unique([normalizeSlug(name), slugify(base)])
}

/**
 * Search queries, in order: the exact input name, then its slug.
 */
export function searchQueries(name: string): string[] {
  return unique([name.trim(), normalizeSlug(name)])
}

function unique(values: string[]): string[] {
  return [...new Set(values.filter(value => value.length > 0))]
}
