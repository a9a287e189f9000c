import type {
  MediaIdentifiers,
  MediaKind,
  MediaRecord,
} from '@root/types/media.types.js'

interface RecordOverrides {
  year?: string
  identifiers?: MediaIdentifiers
  libraryKey?: string
}

function record(
  kind: MediaKind,
  title: string,
  overrides: RecordOverrides,
): MediaRecord {
  return {
    title,
    kind,
    identifiers: overrides.identifiers ?? {},
    ...(overrides.year ? { year: overrides.year } : {}),
    ...(overrides.libraryKey ? { libraryKey: overrides.libraryKey } : {}),
  }
}

/**
 * Builds a movie record for tests.
 *
 * @example
 * movie('The Matrix', { year: '1999', identifiers: { imdb: 'tt0133093' } })
 */
export function movie(title: string, overrides: RecordOverrides = {}) {
  return record('movie', title, overrides)
}

export function show(title: string, overrides: RecordOverrides = {}) {
  return record('show', title, overrides)
}
