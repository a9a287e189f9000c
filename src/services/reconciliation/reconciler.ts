/**
 * Reconciler
 *
 * Decides whether a reference record already exists in one kind-partition of
 * the library. Stages run in order and the first hit wins:
 *
 * 1. identifier lookup (imdb, then tmdb, then tvdb), only when `preferIds`
 * 2. exact normalized title + year lookup; an absent year only equals an
 *    absent year
 * 3. fuzzy title search accepted at `score >= fuzzyThreshold`, then narrowed
 *    to the first same-titled library record whose year agrees (any year when
 *    the reference has none)
 *
 * Everything here is synchronous and side-effect free.
 */

import {
  IDENTIFIER_NAMESPACES,
  type MatchResult,
  type MediaRecord,
  type PresentMatch,
} from '@root/types/media.types.js'
import { normalizeTitle } from '@utils/title-normalizer.js'
import {
  buildIdentityIndex,
  type IdentityIndex,
  identifierKey,
  titleYearKey,
} from './identity-index.js'
import {
  findBestTitle,
  type TitleScorer,
  weightedRatio,
} from './title-similarity.js'

export interface MatchingOptions {
  /** Minimum accepted similarity, inclusive, 0-100 */
  fuzzyThreshold: number
  preferIds: boolean
  scorer?: TitleScorer
}

function present(
  reference: MediaRecord,
  matched: MediaRecord,
  stage: PresentMatch['stage'],
  score?: number,
): PresentMatch {
  return {
    status: 'present',
    record: reference,
    matched,
    libraryKey: matched.libraryKey,
    stage,
    ...(score !== undefined ? { score } : {}),
  }
}

export function matchByIdentifier(
  reference: MediaRecord,
  index: IdentityIndex,
): MediaRecord | undefined {
  for (const namespace of IDENTIFIER_NAMESPACES) {
    const id = reference.identifiers[namespace]
    if (!id) continue

    const hit = index.byIdentifier.get(identifierKey(namespace, id))
    if (hit) return hit
  }
  return undefined
}

export function matchByTitleYear(
  reference: MediaRecord,
  index: IdentityIndex,
  normalized = normalizeTitle(reference.title),
): MediaRecord | undefined {
  return index.byTitleYear.get(titleYearKey(normalized, reference.year))
}

export function matchByFuzzyTitle(
  reference: MediaRecord,
  index: IdentityIndex,
  fuzzyThreshold: number,
  scorer: TitleScorer = weightedRatio,
  normalized = normalizeTitle(reference.title),
): { record: MediaRecord; score: number } | undefined {
  const candidate = findBestTitle(normalized, index.normalizedTitles, scorer)
  if (!candidate || candidate.score < fuzzyThreshold) return undefined

  // Same-titled entries (remakes) are told apart by year
  for (let i = 0; i < index.records.length; i++) {
    if (index.normalizedTitles[i] !== candidate.title) continue

    const record = index.records[i]
    if (!reference.year || record.year === reference.year) {
      return { record, score: candidate.score }
    }
  }
  return undefined
}

/**
 * Classifies one reference record against a prebuilt index of library
 * records of the same kind.
 */
export function matchRecord(
  reference: MediaRecord,
  index: IdentityIndex,
  options: MatchingOptions,
): MatchResult {
  if (options.preferIds) {
    const byId = matchByIdentifier(reference, index)
    if (byId) return present(reference, byId, 'identifier')
  }

  const normalized = normalizeTitle(reference.title)
  const exact = matchByTitleYear(reference, index, normalized)
  if (exact) return present(reference, exact, 'title-year')

  const fuzzy = matchByFuzzyTitle(
    reference,
    index,
    options.fuzzyThreshold,
    options.scorer,
    normalized,
  )
  if (fuzzy) return present(reference, fuzzy.record, 'fuzzy-title', fuzzy.score)

  return { status: 'missing', record: reference }
}

/**
 * Reconciles a batch of references against library records. Both sides are
 * expected to hold a single kind; {@link partitionAndMatch} takes care of that.
 */
export function reconcile(
  references: readonly MediaRecord[],
  library: readonly MediaRecord[],
  options: MatchingOptions,
): MatchResult[] {
  const index = buildIdentityIndex(library)
  return references.map((reference) => matchRecord(reference, index, options))
}
