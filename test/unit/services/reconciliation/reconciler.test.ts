import { buildIdentityIndex } from '@services/reconciliation/identity-index.js'
import {
  matchByFuzzyTitle,
  matchByIdentifier,
  matchByTitleYear,
  matchRecord,
  reconcile,
} from '@services/reconciliation/reconciler.js'
import { describe, expect, it, vi } from 'vitest'
import { movie } from '../../../mocks/media-records.js'

const noScore = () => 0

describe('reconciler', () => {
  describe('matchByIdentifier', () => {
    it('should prefer imdb when ids resolve to different records', () => {
      const byImdb = movie('Alpha', {
        identifiers: { imdb: 'tt0000001' },
        libraryKey: 'imdb-hit',
      })
      const byTmdb = movie('Beta', {
        identifiers: { tmdb: '2' },
        libraryKey: 'tmdb-hit',
      })
      const index = buildIdentityIndex([byTmdb, byImdb])

      const hit = matchByIdentifier(
        movie('Gamma', { identifiers: { imdb: 'tt0000001', tmdb: '2' } }),
        index,
      )

      expect(hit).toBe(byImdb)
    })

    it('should fall through to the next namespace', () => {
      const alien = movie('Alien', { identifiers: { tvdb: '77' } })
      const index = buildIdentityIndex([alien])

      expect(
        matchByIdentifier(
          movie('Alien', { identifiers: { imdb: 'tt9999999', tvdb: '77' } }),
          index,
        ),
      ).toBe(alien)
    })

    it('should never compare ids across namespaces', () => {
      const index = buildIdentityIndex([
        movie('The Matrix', { identifiers: { tmdb: '603' } }),
      ])

      expect(
        matchByIdentifier(movie('X', { identifiers: { tvdb: '603' } }), index),
      ).toBeUndefined()
    })
  })

  describe('matchByTitleYear', () => {
    it('should pick the record with the same year', () => {
      const it1990 = movie('It', { year: '1990', libraryKey: '1990' })
      const it2017 = movie('It', { year: '2017', libraryKey: '2017' })
      const index = buildIdentityIndex([it1990, it2017])

      expect(matchByTitleYear(movie('IT', { year: '2017' }), index)).toBe(
        it2017,
      )
    })

    it('should match titles that only differ in punctuation', () => {
      const homecoming = movie('Spider-Man: Homecoming', { year: '2017' })
      const index = buildIdentityIndex([homecoming])

      expect(
        matchByTitleYear(
          movie('Spider Man Homecoming', { year: '2017' }),
          index,
        ),
      ).toBe(homecoming)
    })

    it('should require both years to be absent when the reference has none', () => {
      const withYear = buildIdentityIndex([movie('The Thing', { year: '1982' })])
      const withoutYear = buildIdentityIndex([movie('The Thing')])

      expect(matchByTitleYear(movie('The Thing'), withYear)).toBeUndefined()
      expect(
        matchByTitleYear(movie('The Thing', { year: '1982' }), withoutYear),
      ).toBeUndefined()
      expect(matchByTitleYear(movie('The Thing'), withoutYear)).toBeDefined()
    })
  })

  describe('matchByFuzzyTitle', () => {
    const scorer = (_query: string, title: string) =>
      title === 'alien' ? 85 : 0

    it('should accept a score equal to the threshold', () => {
      const alien = movie('Alien', { year: '1979' })
      const index = buildIdentityIndex([alien])

      expect(
        matchByFuzzyTitle(movie('Alien³', { year: '1979' }), index, 85, scorer),
      ).toEqual({ record: alien, score: 85 })
    })

    it('should reject a score one below the threshold', () => {
      const index = buildIdentityIndex([movie('Alien', { year: '1979' })])

      expect(
        matchByFuzzyTitle(movie('Alien³', { year: '1979' }), index, 86, scorer),
      ).toBeUndefined()
    })

    it('should use the year to choose between remakes', () => {
      const dune1984 = movie('Dune', { year: '1984', libraryKey: '1984' })
      const dune2021 = movie('Dune', { year: '2021', libraryKey: '2021' })
      const index = buildIdentityIndex([dune1984, dune2021])
      const duneScorer = (_query: string, title: string) =>
        title === 'dune' ? 95 : 0

      expect(
        matchByFuzzyTitle(
          movie('Dune Part One', { year: '2021' }),
          index,
          90,
          duneScorer,
        ),
      ).toEqual({ record: dune2021, score: 95 })
      expect(
        matchByFuzzyTitle(
          movie('Dune Part One', { year: '2000' }),
          index,
          90,
          duneScorer,
        ),
      ).toBeUndefined()
    })

    it('should take the first same-titled record when the reference has no year', () => {
      const dune1984 = movie('Dune', { year: '1984' })
      const index = buildIdentityIndex([dune1984, movie('Dune', { year: '2021' })])

      expect(
        matchByFuzzyTitle(movie('Dune Part One'), index, 90, () => 95)?.record,
      ).toBe(dune1984)
    })

    it('should not score an empty normalized title', () => {
      const spy = vi.fn(() => 100)
      const index = buildIdentityIndex([movie('Heat', { year: '1995' })])

      expect(matchByFuzzyTitle(movie('?!'), index, 0, spy)).toBeUndefined()
      expect(spy).not.toHaveBeenCalled()
    })
  })

  describe('matchRecord', () => {
    const matrix = movie('The Matrix', {
      year: '1999',
      identifiers: { imdb: 'tt0133093' },
      libraryKey: '/library/metadata/603',
    })
    const index = buildIdentityIndex([matrix])

    it('should match by identifier regardless of title spelling', () => {
      const reference = movie('Matrix, The', {
        year: '1999',
        identifiers: { imdb: 'tt0133093' },
      })

      expect(
        matchRecord(reference, index, { fuzzyThreshold: 90, preferIds: true }),
      ).toEqual({
        status: 'present',
        record: reference,
        matched: matrix,
        libraryKey: '/library/metadata/603',
        stage: 'identifier',
      })
    })

    it('should report a sequel as missing', () => {
      const reference = movie('The Matrix Reloaded', { year: '2003' })

      expect(
        matchRecord(reference, index, { fuzzyThreshold: 90, preferIds: true }),
      ).toEqual({ status: 'missing', record: reference })
    })

    it('should skip identifiers when preferIds is off', () => {
      const reference = movie('Something Else', {
        year: '2001',
        identifiers: { imdb: 'tt0133093' },
      })

      expect(
        matchRecord(reference, index, {
          fuzzyThreshold: 90,
          preferIds: false,
          scorer: noScore,
        }).status,
      ).toBe('missing')
    })

    it('should fall back to the title and year stage', () => {
      const reference = movie('the matrix', { year: '1999' })

      const result = matchRecord(reference, index, {
        fuzzyThreshold: 90,
        preferIds: true,
      })

      expect(result).toMatchObject({ status: 'present', stage: 'title-year' })
    })

    it('should treat a missing reference year as a wildcard in the fuzzy stage', () => {
      const reference = movie('The Matrix')

      expect(
        matchRecord(reference, index, { fuzzyThreshold: 90, preferIds: true }),
      ).toEqual({
        status: 'present',
        record: reference,
        matched: matrix,
        libraryKey: '/library/metadata/603',
        stage: 'fuzzy-title',
        score: 100,
      })
    })

    it('should score the normalized reference title against each library title', () => {
      const scorer = vi.fn(() => 0)

      matchRecord(movie('Spider-Man: Homecoming', { year: '2017' }), index, {
        fuzzyThreshold: 90,
        preferIds: true,
        scorer,
      })

      expect(scorer).toHaveBeenCalledTimes(1)
      expect(scorer).toHaveBeenCalledWith('spider man homecoming', 'the matrix')
    })

    it('should take the stage 2 key from the title passed in', () => {
      const homecoming = movie('Spider-Man: Homecoming', { year: '2017' })

      expect(
        matchByTitleYear(
          movie('Something Else', { year: '2017' }),
          buildIdentityIndex([homecoming]),
          'spider man homecoming',
        ),
      ).toBe(homecoming)
    })

    it('should not accept a library record without a year for a dated reference', () => {
      const undated = buildIdentityIndex([movie('The Matrix')])

      expect(
        matchRecord(movie('The Matrix', { year: '1999' }), undated, {
          fuzzyThreshold: 90,
          preferIds: true,
        }).status,
      ).toBe('missing')
    })
  })

  describe('reconcile', () => {
    it('should return one result per reference in order', () => {
      const library = [movie('Heat', { year: '1995', libraryKey: 'heat' })]
      const references = [
        movie('Alien', { year: '1979' }),
        movie('Heat', { year: '1995' }),
      ]

      const results = reconcile(references, library, {
        fuzzyThreshold: 90,
        preferIds: true,
        scorer: noScore,
      })

      expect(results.map((r) => r.status)).toEqual(['missing', 'present'])
    })

    it('should report everything missing against an empty library', () => {
      const results = reconcile([movie('Heat')], [], {
        fuzzyThreshold: 0,
        preferIds: true,
      })

      expect(results).toEqual([{ status: 'missing', record: movie('Heat') }])
    })
  })
})
