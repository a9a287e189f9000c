/**
 * Trakt user lists
 *
 * Pages through GET /users/{user}/lists/{slug}/items until the list runs out.
 */

import type { TraktListConfig } from '@root/types/config.types.js'
import type { ListSource } from '@root/types/list-source.types.js'
import type {
  MediaIdentifiers,
  MediaKind,
  MediaRecord,
} from '@root/types/media.types.js'
import type {
  TraktListItem,
  TraktListType,
  TraktMedia,
} from '@root/types/trakt.types.js'
import { DEFAULT_HTTP_TIMEOUT_MS, delay, HttpError } from '@utils/http-error.js'
import { createServiceLogger } from '@utils/logger.js'
import type { Logger } from 'pino'

export const TRAKT_API_URL = 'https://api.trakt.tv'
export const TRAKT_PAGE_LIMIT = 100

export interface TraktFetchOptions {
  /** Pause between page requests */
  pageDelayMs?: number
}

export function traktListUrl(list: TraktListConfig): string {
  const base = `${TRAKT_API_URL}/users/${encodeURIComponent(list.user)}/lists/${encodeURIComponent(list.slug)}/items`
  if (list.type === 'movies') return `${base}/movies`
  if (list.type === 'shows') return `${base}/shows`
  return base
}

function isTraktListItem(value: unknown): value is TraktListItem {
  return typeof value === 'object' && value !== null
}

function toIdentifiers(media: TraktMedia): MediaIdentifiers {
  const ids = media.ids ?? {}
  const identifiers: MediaIdentifiers = {}
  if (ids.imdb) identifiers.imdb = ids.imdb
  if (ids.tmdb) identifiers.tmdb = String(ids.tmdb)
  if (ids.tvdb) identifiers.tvdb = String(ids.tvdb)
  return identifiers
}

/**
 * Maps a list entry to a reference record. Typed lists fall back to the list
 * type when an entry lacks `type`; seasons, episodes and people are skipped.
 */
export function toTraktRecord(
  item: TraktListItem,
  listType: TraktListType,
): MediaRecord | undefined {
  let kind: MediaKind | undefined
  if (item.type === 'movie' || item.type === 'show') {
    kind = item.type
  } else if (item.type === undefined && listType !== 'mixed') {
    kind = listType === 'movies' ? 'movie' : 'show'
  }
  if (!kind) return undefined

  const media = kind === 'movie' ? item.movie : item.show
  if (!media?.title) return undefined

  return {
    title: media.title,
    ...(media.year ? { year: String(media.year) } : {}),
    kind,
    identifiers: toIdentifiers(media),
  }
}

export async function fetchTraktList(
  list: TraktListConfig,
  clientId: string,
  log: Logger,
  options: TraktFetchOptions = {},
): Promise<MediaRecord[]> {
  const pageDelayMs = options.pageDelayMs ?? 200
  const records: MediaRecord[] = []
  let page = 1

  while (true) {
    const url = new URL(traktListUrl(list))
    url.searchParams.set('page', String(page))
    url.searchParams.set('limit', String(TRAKT_PAGE_LIMIT))

    const response = await fetch(url.toString(), {
      headers: {
        'Content-Type': 'application/json',
        'trakt-api-version': '2',
        'trakt-api-key': clientId,
        'User-Agent': 'watchgap/0.1',
      },
      signal: AbortSignal.timeout(DEFAULT_HTTP_TIMEOUT_MS),
    })

    // Pages past the end of some lists answer 404
    if (response.status === 404) break
    if (!response.ok) {
      throw new HttpError(
        `Trakt API error for ${list.user}/${list.slug}: ${response.status} ${response.statusText}`,
        response.status,
      )
    }

    const batch: unknown = await response.json()
    if (!Array.isArray(batch) || batch.length === 0) break

    for (const item of batch.filter(isTraktListItem)) {
      const record = toTraktRecord(item, list.type)
      if (record) records.push(record)
    }

    if (batch.length < TRAKT_PAGE_LIMIT) break
    page++
    await delay(pageDelayMs)
  }

  log.debug(`Fetched ${records.length} entries from ${list.user}/${list.slug}`)
  return records
}

export function createTraktListSource(
  list: TraktListConfig,
  clientId: string,
  baseLog: Logger,
  options: TraktFetchOptions = {},
): ListSource {
  const log = createServiceLogger(baseLog, 'Trakt')
  return {
    name: `Trakt: ${list.user}/${list.slug}`,
    fetch: () => fetchTraktList(list, clientId, log, options),
  }
}
