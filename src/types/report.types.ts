import type { MediaRecord } from './media.types.js'

export interface ReportSection {
  title: string
  rows: readonly MediaRecord[]
}

export type CsvColumn =
  | 'title'
  | 'year'
  | 'imdb_id'
  | 'tmdb_id'
  | 'tvdb_id'
  | 'kind'

export const MISSING_CSV_COLUMNS: readonly CsvColumn[] = [
  'title',
  'year',
  'imdb_id',
  'tmdb_id',
  'tvdb_id',
  'kind',
]

export const RADARR_ADDED_COLUMNS: readonly CsvColumn[] = [
  'title',
  'year',
  'imdb_id',
  'tmdb_id',
]

export const SONARR_ADDED_COLUMNS: readonly CsvColumn[] = [
  'title',
  'year',
  'imdb_id',
  'tvdb_id',
]
