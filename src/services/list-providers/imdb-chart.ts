/**
 * IMDb Top 250 charts
 *
 * Scrapes the public chart pages. Both the current list layout and the older
 * table layout are understood, since the markup changes without notice.
 */

import type { ListSource } from '@root/types/list-source.types.js'
import type { MediaKind, MediaRecord } from '@root/types/media.types.js'
import { DEFAULT_HTTP_TIMEOUT_MS, HttpError } from '@utils/http-error.js'
import { createServiceLogger } from '@utils/logger.js'
import * as cheerio from 'cheerio'
import type { Logger } from 'pino'

export const IMDB_CHART_URLS: Record<MediaKind, string> = {
  movie: 'https://www.imdb.com/chart/top/',
  show: 'https://www.imdb.com/chart/toptv/',
}

export const IMDB_CHART_NAMES: Record<MediaKind, string> = {
  movie: 'IMDb Top 250 Movies',
  show: 'IMDb Top 250 TV',
}

const REQUEST_HEADERS = {
  'Accept-Language': 'en-US,en;q=0.9',
  'User-Agent':
    'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36',
}

// Poster links share the href but carry no text
const TITLE_LINK = "a[href*='/title/tt']"

function firstYear(text: string | undefined): string | undefined {
  if (!text) return undefined
  return /\b(\d{4})\b/.exec(text)?.[1]
}

function buildChartRecord(
  rawTitle: string,
  href: string,
  year: string | undefined,
  kind: MediaKind,
): MediaRecord | undefined {
  // Current layout prefixes the rank: "1. The Shawshank Redemption"
  const title = rawTitle.trim().replace(/^\d+\.\s+/, '')
  if (!title) return undefined

  const imdb = /\/title\/(tt\d+)/.exec(href)?.[1]
  return {
    title,
    ...(year ? { year } : {}),
    kind,
    identifiers: imdb ? { imdb } : {},
  }
}

/**
 * Extracts chart entries from an IMDb chart page.
 */
export function parseImdbChart(html: string, kind: MediaKind): MediaRecord[] {
  const $ = cheerio.load(html)
  const records: MediaRecord[] = []

  const listItems = $('ul[data-testid="chart-layout-main"] li')
  if (listItems.length > 0) {
    listItems.each((_, el) => {
      const li = $(el)
      const link = li
        .find(TITLE_LINK)
        .filter((_, a) => $(a).text().trim().length > 0)
        .first()
      if (link.length === 0) return

      const year =
        firstYear(li.find('[data-testid="chart-year"]').first().text()) ??
        firstYear(li.find('.cli-title-metadata-item').first().text()) ??
        /\((\d{4})\)/.exec(li.text())?.[1]

      const record = buildChartRecord(
        link.text(),
        link.attr('href') ?? '',
        year,
        kind,
      )
      if (record) records.push(record)
    })
    return records
  }

  $('tbody tr').each((_, el) => {
    const row = $(el)
    const link = row
      .find(TITLE_LINK)
      .filter((_, a) => $(a).text().trim().length > 0)
      .first()
    if (link.length === 0) return

    const record = buildChartRecord(
      link.text(),
      link.attr('href') ?? '',
      firstYear(row.find('.secondaryInfo').first().text()),
      kind,
    )
    if (record) records.push(record)
  })
  return records
}

export async function fetchImdbChart(
  kind: MediaKind,
  log: Logger,
): Promise<MediaRecord[]> {
  const url = IMDB_CHART_URLS[kind]
  const response = await fetch(url, {
    headers: REQUEST_HEADERS,
    signal: AbortSignal.timeout(DEFAULT_HTTP_TIMEOUT_MS),
  })

  if (!response.ok) {
    throw new HttpError(
      `IMDb chart request failed: ${response.status} ${response.statusText}`,
      response.status,
    )
  }

  const records = parseImdbChart(await response.text(), kind)
  if (records.length === 0) {
    log.warn(`No entries found on ${url}, the page layout may have changed`)
  }
  return records
}

export function createImdbChartSource(
  kind: MediaKind,
  baseLog: Logger,
): ListSource {
  const log = createServiceLogger(baseLog, 'IMDb')
  return {
    name: IMDB_CHART_NAMES[kind],
    fetch: () => fetchImdbChart(kind, log),
  }
}
