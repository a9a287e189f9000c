/**
 * Shared record shapes for library holdings, reference list entries and the
 * outcome of reconciling one against the other.
 */

export type MediaKind = 'movie' | 'show'

export const IDENTIFIER_NAMESPACES = ['imdb', 'tmdb', 'tvdb'] as const

export type IdentifierNamespace = (typeof IDENTIFIER_NAMESPACES)[number]

export type MediaIdentifiers = Partial<Record<IdentifierNamespace, string>>

/**
 * Universal record used for both library holdings and reference entries.
 *
 * `year` is either a four digit string or absent; an absent year is never
 * written as an empty string. `libraryKey` is only set on library records.
 */
export interface MediaRecord {
  readonly title: string
  readonly year?: string
  readonly kind: MediaKind
  readonly identifiers: MediaIdentifiers
  readonly libraryKey?: string
}

export type MatchStage = 'identifier' | 'title-year' | 'fuzzy-title'

export interface PresentMatch {
  status: 'present'
  /** The reference record that was looked up */
  record: MediaRecord
  /** The library record it resolved to */
  matched: MediaRecord
  libraryKey: string | undefined
  stage: MatchStage
  /** Similarity score, only set for fuzzy-title matches */
  score?: number
}

export interface MissingMatch {
  status: 'missing'
  record: MediaRecord
}

export type MatchResult = PresentMatch | MissingMatch

/**
 * Reference record annotated with the library item it was found as.
 */
export interface PresentRecord extends MediaRecord {
  readonly matchedLibraryKey: string | undefined
  readonly matchStage: MatchStage
}

export interface PartitionedMatch {
  presentMovies: PresentRecord[]
  missingMovies: MediaRecord[]
  presentShows: PresentRecord[]
  missingShows: MediaRecord[]
}

export interface LibrarySnapshot {
  movies: MediaRecord[]
  shows: MediaRecord[]
}
