import type { MediaRecord } from './media.types.js'

export interface ArrImage {
  coverType: string
  url?: string
  remoteUrl?: string
}

/** Result of GET /api/v3/movie/lookup */
export interface RadarrLookupResult {
  title: string
  year?: number
  tmdbId?: number
  imdbId?: string
  titleSlug?: string
  images?: ArrImage[]
}

export interface RadarrAddPayload {
  title: string
  tmdbId?: number
  year?: number
  titleSlug?: string
  images: ArrImage[]
  qualityProfileId: number
  rootFolderPath: string
  monitored: boolean
  minimumAvailability: 'announced' | 'inCinemas' | 'released'
  addOptions: {
    searchForMovie: boolean
  }
}

export interface SonarrSeason {
  seasonNumber: number
  monitored: boolean
}

/** Result of GET /api/v3/series/lookup */
export interface SonarrLookupResult {
  title: string
  year?: number
  tvdbId?: number
  imdbId?: string
  titleSlug?: string
  images?: ArrImage[]
  seasons?: SonarrSeason[]
}

export interface SonarrAddPayload {
  title: string
  tvdbId?: number
  titleSlug?: string
  images: ArrImage[]
  seasons: SonarrSeason[]
  qualityProfileId: number
  languageProfileId?: number
  rootFolderPath: string
  monitored: boolean
  seasonFolder: boolean
  seriesType: 'standard' | 'anime' | 'daily'
  addOptions: {
    searchForMissingEpisodes: boolean
  }
}

export type AddOutcome = 'added' | 'exists' | 'not-found' | 'failed'

/**
 * Downstream service that can be asked to acquire missing titles.
 */
export interface AcquisitionRequester {
  readonly name: string
  /** Requests each record and resolves with the ones that were added */
  addMissing(records: readonly MediaRecord[]): Promise<MediaRecord[]>
}

export interface ArrConnection {
  url: string
  apiKey: string
}
