/**
 * Record Aggregator
 *
 * Splits a reference batch by kind, reconciles each half against the library
 * partition of the same kind only, and merges the missing titles of several
 * sources once a run is over.
 */

import type {
  MatchResult,
  MediaKind,
  MediaRecord,
  PartitionedMatch,
  PresentRecord,
} from '@root/types/media.types.js'
import { normalizeTitle } from '@utils/title-normalizer.js'
import { buildIdentityIndex } from './identity-index.js'
import { type MatchingOptions, matchRecord } from './reconciler.js'
import { parseMatchingOptions, validateRecords } from './record-validation.js'

export interface KindPartition {
  movies: MediaRecord[]
  shows: MediaRecord[]
}

export interface MergedMissing {
  movies: MediaRecord[]
  shows: MediaRecord[]
}

export function partitionByKind(records: readonly MediaRecord[]): KindPartition {
  const movies: MediaRecord[] = []
  const shows: MediaRecord[] = []
  for (const record of records) {
    if (record.kind === 'movie') {
      movies.push(record)
    } else {
      shows.push(record)
    }
  }
  return { movies, shows }
}

function toPresentRecord(result: MatchResult): PresentRecord | undefined {
  if (result.status !== 'present') return undefined
  return {
    ...result.record,
    matchedLibraryKey: result.libraryKey,
    matchStage: result.stage,
  }
}

function matchPartition(
  references: readonly MediaRecord[],
  library: readonly MediaRecord[],
  kind: MediaKind,
  options: MatchingOptions,
): { present: PresentRecord[]; missing: MediaRecord[] } {
  // A record filed under the wrong partition never takes part in matching
  const index = buildIdentityIndex(library.filter((r) => r.kind === kind))
  const present: PresentRecord[] = []
  const missing: MediaRecord[] = []

  for (const reference of references) {
    const result = matchRecord(reference, index, options)
    const presentRecord = toPresentRecord(result)
    if (presentRecord) {
      present.push(presentRecord)
    } else {
      missing.push(reference)
    }
  }

  return { present, missing }
}

/**
 * Reconciles one reference source against a library snapshot.
 *
 * @throws InvalidMediaRecordError when any record breaks the record contract
 * @throws ZodError when the matching options are out of range
 */
export function partitionAndMatch(
  referenceBatch: readonly MediaRecord[],
  libraryMovies: readonly MediaRecord[],
  libraryShows: readonly MediaRecord[],
  options: MatchingOptions,
): PartitionedMatch {
  const { fuzzyThreshold, preferIds } = parseMatchingOptions({
    fuzzyThreshold: options.fuzzyThreshold,
    preferIds: options.preferIds,
  })
  const validated: MatchingOptions = {
    fuzzyThreshold,
    preferIds,
    scorer: options.scorer,
  }

  validateRecords(referenceBatch, 'reference')
  validateRecords(libraryMovies, 'library movie')
  validateRecords(libraryShows, 'library show')

  const { movies, shows } = partitionByKind(referenceBatch)
  const movieResult = matchPartition(movies, libraryMovies, 'movie', validated)
  const showResult = matchPartition(shows, libraryShows, 'show', validated)

  return {
    presentMovies: movieResult.present,
    missingMovies: movieResult.missing,
    presentShows: showResult.present,
    missingShows: showResult.missing,
  }
}

/**
 * Identity used to collapse the same title reported by several sources:
 * the first identifier in acquisition priority, else title and year.
 */
export function missingRecordKey(record: MediaRecord): string {
  const priority =
    record.kind === 'movie'
      ? (['imdb', 'tmdb', 'tvdb'] as const)
      : (['tvdb', 'imdb', 'tmdb'] as const)
  for (const namespace of priority) {
    const id = record.identifiers[namespace]
    if (id) return `${record.kind}|${namespace}:${id}`
  }
  return `${record.kind}|${normalizeTitle(record.title)}|${record.year ?? ''}`
}

/**
 * Concatenates the missing records of several sources in order, keeping only
 * the first occurrence of each title.
 */
export function mergeMissing(
  results: readonly PartitionedMatch[],
): MergedMissing {
  const seen = new Set<string>()
  const merged: MergedMissing = { movies: [], shows: [] }

  const take = (record: MediaRecord, into: MediaRecord[]) => {
    const key = missingRecordKey(record)
    if (seen.has(key)) return
    seen.add(key)
    into.push(record)
  }

  for (const result of results) {
    for (const record of result.missingMovies) take(record, merged.movies)
    for (const record of result.missingShows) take(record, merged.shows)
  }

  return merged
}
