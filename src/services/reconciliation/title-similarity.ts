import * as fuzz from 'fuzzball'

/**
 * Symmetric similarity between two normalized titles on a 0-100 scale.
 */
export type TitleScorer = (query: string, candidate: string) => number

export interface TitleCandidate {
  title: string
  score: number
  /** Position of the title in the searched list */
  index: number
}

/**
 * Weighted ratio (best of plain, partial and token based ratios) between two
 * titles that have already been normalized, so fuzzball's own preprocessing
 * is disabled. Returns 0 when either side is empty.
 */
export const weightedRatio: TitleScorer = (query, candidate) => {
  if (!query || !candidate) return 0
  return fuzz.WRatio(query, candidate, { full_process: false })
}

/**
 * Returns the best scoring title for `query`, or `undefined` for an empty
 * query or corpus. On equal scores the earliest title wins.
 */
export function findBestTitle(
  query: string,
  titles: readonly string[],
  scorer: TitleScorer = weightedRatio,
): TitleCandidate | undefined {
  if (!query) return undefined

  let best: TitleCandidate | undefined
  for (let index = 0; index < titles.length; index++) {
    const title = titles[index]
    const score = scorer(query, title)
    if (!best || score > best.score) {
      best = { title, score, index }
    }
  }

  return best
}
