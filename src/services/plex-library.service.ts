/**
 * Plex Library Service
 *
 * Enumerates the configured movie and show sections of a Plex Media Server
 * and turns every item into a library-side MediaRecord.
 */

import type { PlexConfig } from '@root/types/config.types.js'
import type {
  LibrarySnapshot,
  MediaKind,
  MediaRecord,
} from '@root/types/media.types.js'
import type {
  PlexLibraryItem,
  PlexLibrarySection,
  PlexSectionItemsResponse,
  PlexSectionsResponse,
} from '@root/types/plex-library.types.js'
import { extractIdentifiers } from '@utils/guid-handler.js'
import { DEFAULT_HTTP_TIMEOUT_MS, HttpError } from '@utils/http-error.js'
import { createServiceLogger, redactUrl } from '@utils/logger.js'
import type { Logger } from 'pino'

export const PLEX_PAGE_SIZE = 500

export class PlexSectionNotFoundError extends Error {
  constructor(
    public readonly section: string,
    public readonly kind: MediaKind,
  ) {
    super(`Plex ${kind} library section "${section}" not found`)
    this.name = 'PlexSectionNotFoundError'
    Object.setPrototypeOf(this, new.target.prototype)
  }
}

function isSectionsResponse(data: unknown): data is PlexSectionsResponse {
  return (
    typeof data === 'object' &&
    data !== null &&
    'MediaContainer' in data &&
    typeof data.MediaContainer === 'object' &&
    data.MediaContainer !== null
  )
}

function isSectionItemsResponse(
  data: unknown,
): data is PlexSectionItemsResponse {
  if (!isSectionsResponse(data)) return false
  const container: object = data.MediaContainer
  return (
    !('Metadata' in container) ||
    container.Metadata === undefined ||
    Array.isArray(container.Metadata)
  )
}

/**
 * Converts a Plex item into a library record. Years of 0 or missing become an
 * absent year; ids come from both the Guid array and the legacy agent guid.
 */
export function toLibraryRecord(
  item: PlexLibraryItem,
  kind: MediaKind,
): MediaRecord {
  const guids = [
    ...(item.Guid ?? []).map((g) => g.id),
    ...(item.guid ? [item.guid] : []),
  ]
  const year =
    typeof item.year === 'number' && item.year > 0
      ? String(item.year)
      : undefined

  return {
    title: item.title,
    ...(year ? { year } : {}),
    kind,
    identifiers: extractIdentifiers(guids),
    libraryKey: String(item.ratingKey),
  }
}

export class PlexLibraryService {
  private readonly log: Logger

  constructor(
    private readonly config: PlexConfig,
    baseLog: Logger,
  ) {
    this.log = createServiceLogger(baseLog, 'Plex')
  }

  private get baseUrl(): string {
    return this.config.url.replace(/\/+$/, '')
  }

  private async getFromPlex(
    endpoint: string,
    params: Record<string, string> = {},
  ): Promise<unknown> {
    const url = new URL(`${this.baseUrl}${endpoint}`)
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.append(key, value)
    }

    this.log.debug(`GET ${redactUrl(url.toString())}`)
    const response = await fetch(url.toString(), {
      headers: {
        Accept: 'application/json',
        'X-Plex-Token': this.config.token,
        'X-Plex-Client-Identifier': 'watchgap',
      },
      signal: AbortSignal.timeout(DEFAULT_HTTP_TIMEOUT_MS),
    })

    if (!response.ok) {
      throw new HttpError(
        `Plex API error on ${endpoint}: ${response.status} ${response.statusText}`,
        response.status,
      )
    }

    return response.json()
  }

  async fetchSections(): Promise<PlexLibrarySection[]> {
    const data = await this.getFromPlex('/library/sections')
    if (!isSectionsResponse(data)) {
      throw new Error('Invalid response format from Plex library sections')
    }
    return data.MediaContainer.Directory ?? []
  }

  /**
   * Fetches every item of one section, paging until `totalSize` is reached or
   * a short page comes back.
   */
  async fetchSectionItems(sectionKey: string): Promise<PlexLibraryItem[]> {
    const items: PlexLibraryItem[] = []
    let start = 0

    while (true) {
      const data = await this.getFromPlex(
        `/library/sections/${encodeURIComponent(sectionKey)}/all`,
        {
          includeGuids: '1',
          'X-Plex-Container-Start': String(start),
          'X-Plex-Container-Size': String(PLEX_PAGE_SIZE),
        },
      )
      if (!isSectionItemsResponse(data)) {
        throw new Error(
          `Invalid response format from Plex section ${sectionKey}`,
        )
      }

      const page = data.MediaContainer.Metadata ?? []
      items.push(...page)
      start += page.length

      const total = data.MediaContainer.totalSize
      const reachedTotal = total !== undefined && start >= total
      if (page.length < PLEX_PAGE_SIZE || reachedTotal) break
    }

    return items
  }

  private resolveSections(
    available: PlexLibrarySection[],
    names: string[],
    kind: MediaKind,
  ): PlexLibrarySection[] {
    return names.map((name) => {
      const section = available.find(
        (s) =>
          s.title.toLowerCase() === name.toLowerCase() && s.type === kind,
      )
      if (!section) {
        throw new PlexSectionNotFoundError(name, kind)
      }
      return section
    })
  }

  private async collect(
    sections: PlexLibrarySection[],
    kind: MediaKind,
  ): Promise<MediaRecord[]> {
    const records: MediaRecord[] = []
    for (const section of sections) {
      const items = await this.fetchSectionItems(section.key)
      this.log.info(`Loaded ${items.length} items from "${section.title}"`)
      records.push(...items.map((item) => toLibraryRecord(item, kind)))
    }
    return records
  }

  /**
   * Takes one snapshot of the configured movie and show sections.
   *
   * @throws PlexSectionNotFoundError when a configured section does not exist
   */
  async gatherLibrary(): Promise<LibrarySnapshot> {
    const available = await this.fetchSections()
    const movieSections = this.resolveSections(
      available,
      this.config.movieSections,
      'movie',
    )
    const showSections = this.resolveSections(
      available,
      this.config.showSections,
      'show',
    )

    const movies = await this.collect(movieSections, 'movie')
    const shows = await this.collect(showSections, 'show')

    this.log.info(
      `Library snapshot: ${movies.length} movies, ${shows.length} shows`,
    )
    return { movies, shows }
  }
}
