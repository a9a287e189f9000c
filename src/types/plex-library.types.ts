/**
 * Plex library section listing (GET /library/sections)
 */
export interface PlexSectionsResponse {
  MediaContainer: {
    size?: number
    Directory?: PlexLibrarySection[]
  }
}

export interface PlexLibrarySection {
  key: string
  title: string
  type: string // "movie", "show", "artist", "photo"
}

/**
 * Page of a library section (GET /library/sections/{key}/all?includeGuids=1)
 */
export interface PlexSectionItemsResponse {
  MediaContainer: {
    size?: number
    totalSize?: number
    offset?: number
    Metadata?: PlexLibraryItem[]
  }
}

export interface PlexLibraryItem {
  ratingKey: string
  title: string
  type: string
  year?: number
  guid?: string // "plex://movie/5d776832a091de001f2e780f" or a legacy agent guid
  Guid?: Array<{ id: string }> // [{ id: "imdb://tt0133093" }, { id: "tmdb://603" }]
}
