// Curly quotes, modifier letter apostrophe and backtick all fold to "'"
const APOSTROPHE_VARIANTS = /[‘’ʼ`]/g

const STRIPPED_PUNCTUATION = /[:!?.,&/()-]+/g

/**
 * Canonicalizes a free-text title into a comparison key.
 *
 * Lowercases, folds apostrophe glyphs, replaces runs of `: ! ? . , & / ( ) -`
 * with a single space, collapses whitespace and trims. Accents and leading
 * articles are left untouched, so "Léon" and "Leon" stay distinct.
 *
 * @example
 * normalizeTitle('Spider-Man: Homecoming') // 'spider man homecoming'
 */
export function normalizeTitle(title: string): string {
  return title
    .toLowerCase()
    .replace(APOSTROPHE_VARIANTS, "'")
    .replace(STRIPPED_PUNCTUATION, ' ')
    .replace(/\s+/g, ' ')
    .trim()
}
