export type TraktListType = 'movies' | 'shows' | 'mixed'

export interface TraktIds {
  trakt?: number | null
  slug?: string | null
  imdb?: string | null
  tmdb?: number | null
  tvdb?: number | null
}

export interface TraktMedia {
  title: string | null
  year: number | null
  ids?: TraktIds
}

/**
 * Entry of GET /users/{user}/lists/{slug}/items. Mixed lists carry a `type`
 * naming which of the nested objects is set.
 */
export interface TraktListItem {
  rank?: number
  id?: number
  listed_at?: string
  type?: 'movie' | 'show' | 'season' | 'episode' | 'person'
  movie?: TraktMedia
  show?: TraktMedia
}
