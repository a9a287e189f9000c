import { normalizeTitle } from '@utils/title-normalizer.js'
import { describe, expect, it } from 'vitest'

describe('title-normalizer', () => {
  describe('normalizeTitle', () => {
    it('should lowercase and trim', () => {
      expect(normalizeTitle('  The Matrix  ')).toBe('the matrix')
    })

    it('should replace separator punctuation with single spaces', () => {
      expect(normalizeTitle('Spider-Man: Homecoming')).toBe(
        'spider man homecoming',
      )
      expect(
        normalizeTitle('Mission: Impossible - Dead Reckoning Part One'),
      ).toBe('mission impossible dead reckoning part one')
    })

    it('should strip ampersands, slashes and parentheses', () => {
      expect(normalizeTitle('Fast & Furious')).toBe('fast furious')
      expect(normalizeTitle('AC/DC (Live)')).toBe('ac dc live')
    })

    it('should fold curly apostrophes and backticks to a straight one', () => {
      expect(normalizeTitle('Schindler’s List')).toBe("schindler's list")
      expect(normalizeTitle('Ocean`s Eleven')).toBe("ocean's eleven")
      expect(normalizeTitle("Schindler's List")).toBe("schindler's list")
    })

    it('should keep accents and leading articles', () => {
      expect(normalizeTitle('Léon')).toBe('léon')
      expect(normalizeTitle('Léon')).not.toBe(normalizeTitle('Leon'))
      expect(normalizeTitle('The Thing')).toBe('the thing')
    })

    it('should collapse whitespace of any kind', () => {
      expect(normalizeTitle('Blade\tRunner\n2049')).toBe('blade runner 2049')
    })

    it('should return an empty string for punctuation-only titles', () => {
      expect(normalizeTitle('?!...')).toBe('')
    })

    it('should be idempotent', () => {
      const once = normalizeTitle('WALL·E: Part (II) & More!')
      expect(normalizeTitle(once)).toBe(once)
    })
  })
})
