/**
 * Identity Index
 *
 * Lookup structures over one kind-partition of the library: an identifier
 * index keyed per namespace, an exact (normalized title, year) index and the
 * flat list of normalized titles used by the fuzzy stage. Rebuilt for every
 * reconciliation pass; never persisted.
 */

import type {
  IdentifierNamespace,
  MediaRecord,
} from '@root/types/media.types.js'
import { IDENTIFIER_NAMESPACES } from '@root/types/media.types.js'
import { normalizeTitle } from '@utils/title-normalizer.js'

export interface IdentityIndex {
  /** `namespace:id` → library record */
  readonly byIdentifier: ReadonlyMap<string, MediaRecord>
  /** `normalizedTitle␀year` → library record */
  readonly byTitleYear: ReadonlyMap<string, MediaRecord>
  /** Normalized titles, index-aligned with {@link IdentityIndex.records} */
  readonly normalizedTitles: readonly string[]
  readonly records: readonly MediaRecord[]
}

/**
 * Builds the identifier lookup key. Namespaces are part of the key so an
 * IMDb id can never collide with a TMDB id of the same value.
 */
export function identifierKey(
  namespace: IdentifierNamespace,
  id: string,
): string {
  return `${namespace}:${id}`
}

/**
 * Builds the exact title lookup key. An absent year is encoded as the empty
 * string, so it only ever equals another absent year.
 *
 * @param normalizedTitle - Title already passed through {@link normalizeTitle}
 */
export function titleYearKey(normalizedTitle: string, year?: string): string {
  return `${normalizedTitle}\u0000${year ?? ''}`
}

/**
 * Indexes a single kind-partition of library records in one linear pass.
 *
 * Duplicate identifier or title/year keys keep the record inserted last.
 */
export function buildIdentityIndex(
  records: readonly MediaRecord[],
): IdentityIndex {
  const byIdentifier = new Map<string, MediaRecord>()
  const byTitleYear = new Map<string, MediaRecord>()
  const normalizedTitles: string[] = []

  for (const record of records) {
    for (const namespace of IDENTIFIER_NAMESPACES) {
      const id = record.identifiers[namespace]
      if (id) {
        byIdentifier.set(identifierKey(namespace, id), record)
      }
    }

    const normalized = normalizeTitle(record.title)
    byTitleYear.set(titleYearKey(normalized, record.year), record)
    normalizedTitles.push(normalized)
  }

  return {
    byIdentifier,
    byTitleYear,
    normalizedTitles,
    records,
  }
}
