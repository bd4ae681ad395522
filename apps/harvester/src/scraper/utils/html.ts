import * as cheerio from 'cheerio'

export function loadHtml(payload: string): cheerio.CheerioAPI {
  return cheerio.load(payload)
}

/**
 * Every anchor href in document order, trimmed, empty values dropped.
 */
export function linkTargets(payload: string): string[] {
  const $ = loadHtml(payload)
  const targets: string[] = []
  for (const element of $('a[href]').toArray()) {
    const href = $(element).attr('href')?.trim()
    if (href) {
      targets.push(href)
    }
  }
  return targets
}
