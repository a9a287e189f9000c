import type {
  AcquisitionRequester,
  AddOutcome,
  SonarrAddPayload,
  SonarrLookupResult,
} from '@root/types/arr.types.js'
import type { EnabledSonarrConfig } from '@root/types/config.types.js'
import type { MediaRecord } from '@root/types/media.types.js'
import { getFromArr, postToArr } from '@utils/arr-api.js'
import { delay } from '@utils/http-error.js'
import { createServiceLogger } from '@utils/logger.js'
import type { Logger } from 'pino'

export interface SonarrServiceOptions {
  /** Pause after each add request */
  requestDelayMs?: number
}

/**
 * Lookup term for a series: TVDB id first, since Sonarr is keyed on it,
 * then IMDb id, then the title.
 */
export function seriesLookupTerm(record: MediaRecord): string {
  const { tvdb, imdb } = record.identifiers
  if (tvdb) return `tvdb:${tvdb}`
  if (imdb) return `imdb:${imdb}`
  return record.title
}

export class SonarrService implements AcquisitionRequester {
  readonly name = 'Sonarr'
  private readonly log: Logger
  private readonly requestDelayMs: number

  constructor(
    private readonly config: EnabledSonarrConfig,
    baseLog: Logger,
    options: SonarrServiceOptions = {},
  ) {
    this.log = createServiceLogger(baseLog, 'Sonarr')
    this.requestDelayMs = options.requestDelayMs ?? 200
  }

  async lookupSeries(term: string): Promise<SonarrLookupResult[]> {
    const results = await getFromArr<SonarrLookupResult[]>(
      this.config,
      'series/lookup',
      { term },
    )
    return Array.isArray(results) ? results : []
  }

  private buildPayload(candidate: SonarrLookupResult): SonarrAddPayload {
    return {
      title: candidate.title,
      tvdbId: candidate.tvdbId,
      titleSlug: candidate.titleSlug,
      images: candidate.images ?? [],
      seasons: candidate.seasons ?? [],
      qualityProfileId: this.config.qualityProfileId,
      // Only Sonarr v3 reads this; v4 ignores it
      ...(this.config.languageProfileId !== undefined
        ? { languageProfileId: this.config.languageProfileId }
        : {}),
      rootFolderPath: this.config.rootFolderPath,
      monitored: this.config.monitored,
      seasonFolder: this.config.seasonFolder,
      seriesType: this.config.seriesType,
      addOptions: {
        searchForMissingEpisodes: this.config.searchForMissingEpisodes,
      },
    }
  }

  async addSeries(record: MediaRecord): Promise<AddOutcome> {
    const term = seriesLookupTerm(record)
    let candidates = await this.lookupSeries(term)
    if (candidates.length === 0 && term !== record.title) {
      candidates = await this.lookupSeries(record.title)
    }

    const candidate = candidates[0]
    if (!candidate) {
      this.log.warn(`No Sonarr lookup result for ${record.title}`)
      return 'not-found'
    }

    const result = await postToArr(
      this.config,
      'series',
      this.buildPayload(candidate),
    )
    if (result.ok) {
      this.log.info(
        `Sent ${candidate.title} to Sonarr (Quality Profile: ${this.config.qualityProfileId}, Root Folder: ${this.config.rootFolderPath})`,
      )
      return 'added'
    }
    if (result.error.isAlreadyAdded) {
      this.log.info(`${candidate.title} is already in Sonarr`)
      return 'exists'
    }

    this.log.warn(
      `Sonarr rejected ${candidate.title} (${result.status}): ${result.error.message}`,
    )
    return 'failed'
  }

  async addMissing(records: readonly MediaRecord[]): Promise<MediaRecord[]> {
    const added: MediaRecord[] = []

    for (const record of records) {
      try {
        if ((await this.addSeries(record)) === 'added') {
          added.push(record)
        }
      } catch (error) {
        this.log.error({ error }, `Failed to add ${record.title} to Sonarr`)
      }
      await delay(this.requestDelayMs)
    }

    this.log.info(`Added ${added.length} of ${records.length} series`)
    return added
  }
}
