import type {
  AcquisitionRequester,
  AddOutcome,
  RadarrAddPayload,
  RadarrLookupResult,
} from '@root/types/arr.types.js'
import type { EnabledRadarrConfig } from '@root/types/config.types.js'
import type { MediaRecord } from '@root/types/media.types.js'
import { getFromArr, postToArr } from '@utils/arr-api.js'
import { delay } from '@utils/http-error.js'
import { createServiceLogger } from '@utils/logger.js'
import type { Logger } from 'pino'

export interface RadarrServiceOptions {
  /** Pause after each add request */
  requestDelayMs?: number
}

/**
 * Lookup term for a movie: IMDb id, then TMDB id, then "Title (Year)".
 */
export function movieLookupTerm(record: MediaRecord): string {
  const { imdb, tmdb } = record.identifiers
  if (imdb) return `imdb:${imdb}`
  if (tmdb) return `tmdb:${tmdb}`
  return record.year ? `${record.title} (${record.year})` : record.title
}

export class RadarrService implements AcquisitionRequester {
  readonly name = 'Radarr'
  private readonly log: Logger
  private readonly requestDelayMs: number

  constructor(
    private readonly config: EnabledRadarrConfig,
    baseLog: Logger,
    options: RadarrServiceOptions = {},
  ) {
    this.log = createServiceLogger(baseLog, 'Radarr')
    this.requestDelayMs = options.requestDelayMs ?? 200
  }

  async lookupMovie(term: string): Promise<RadarrLookupResult[]> {
    const results = await getFromArr<RadarrLookupResult[]>(
      this.config,
      'movie/lookup',
      { term },
    )
    return Array.isArray(results) ? results : []
  }

  private buildPayload(candidate: RadarrLookupResult): RadarrAddPayload {
    return {
      title: candidate.title,
      tmdbId: candidate.tmdbId,
      year: candidate.year,
      titleSlug: candidate.titleSlug,
      images: candidate.images ?? [],
      qualityProfileId: this.config.qualityProfileId,
      rootFolderPath: this.config.rootFolderPath,
      monitored: this.config.monitored,
      minimumAvailability: this.config.minimumAvailability,
      addOptions: {
        searchForMovie: this.config.searchForMovie,
      },
    }
  }

  /**
   * Looks the movie up (falling back to a bare title search) and adds the
   * first candidate.
   */
  async addMovie(record: MediaRecord): Promise<AddOutcome> {
    const term = movieLookupTerm(record)
    let candidates = await this.lookupMovie(term)
    if (candidates.length === 0 && term !== record.title) {
      candidates = await this.lookupMovie(record.title)
    }

    const candidate = candidates[0]
    if (!candidate) {
      this.log.warn(`No Radarr lookup result for ${record.title}`)
      return 'not-found'
    }

    const result = await postToArr(
      this.config,
      'movie',
      this.buildPayload(candidate),
    )
    if (result.ok) {
      this.log.info(
        `Sent ${candidate.title} to Radarr (Quality Profile: ${this.config.qualityProfileId}, Root Folder: ${this.config.rootFolderPath})`,
      )
      return 'added'
    }
    if (result.error.isAlreadyAdded) {
      this.log.info(`${candidate.title} is already in Radarr`)
      return 'exists'
    }

    this.log.warn(
      `Radarr rejected ${candidate.title} (${result.status}): ${result.error.message}`,
    )
    return 'failed'
  }

  async addMissing(records: readonly MediaRecord[]): Promise<MediaRecord[]> {
    const added: MediaRecord[] = []

    for (const record of records) {
      try {
        if ((await this.addMovie(record)) === 'added') {
          added.push(record)
        }
      } catch (error) {
        this.log.error({ error }, `Failed to add ${record.title} to Radarr`)
      }
      await delay(this.requestDelayMs)
    }

    this.log.info(`Added ${added.length} of ${records.length} movies`)
    return added
  }
}
