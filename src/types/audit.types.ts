import type { PartitionedMatch } from './media.types.js'

export interface SourceSummary {
  name: string
  presentMovies: number
  missingMovies: number
  presentShows: number
  missingShows: number
  csvFiles: string[]
}

export interface AuditSummary {
  librarySize: { movies: number; shows: number }
  sources: SourceSummary[]
  failedSources: Array<{ name: string; error: string }>
  /** Missing titles after merging every source */
  missingMovies: number
  missingShows: number
  addedMovies: number
  addedShows: number
  reportPath?: string
}

export interface SourceResult {
  name: string
  result: PartitionedMatch
}
