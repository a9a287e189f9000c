import type {
  IdentifierNamespace,
  MediaIdentifiers,
} from '@root/types/media.types.js'

/**
 * Converts a GUID string to lowercase and replaces "provider://id" with
 * "provider:id" for consistent formatting.
 *
 * @param guid - The GUID string to normalize
 * @returns The normalized GUID string
 */
export function normalizeGuid(guid: string): string {
  return guid.replace('://', ':').toLowerCase()
}

/**
 * Parses GUID input into a deduplicated array of normalized GUID strings.
 *
 * Accepts an array of strings, a comma-separated string, a single string, or
 * undefined. Returns an empty array if the input is undefined or empty.
 */
export function parseGuids(guids: string[] | string | undefined): string[] {
  if (!guids) return []

  const raw = Array.isArray(guids) ? guids : guids.split(',')
  return [
    ...new Set(
      raw.map((g) => normalizeGuid(g.trim())).filter((g) => g.length > 0),
    ),
  ]
}

// Legacy Plex agents report ids as com.plexapp.agents.<agent>://<id>?lang=en
const LEGACY_AGENTS: Record<string, IdentifierNamespace> = {
  imdb: 'imdb',
  themoviedb: 'tmdb',
  thetvdb: 'tvdb',
}

const MODERN_PROVIDERS: Record<string, IdentifierNamespace> = {
  imdb: 'imdb',
  tmdb: 'tmdb',
  tvdb: 'tvdb',
}

/**
 * Maps one normalized GUID to its identifier namespace and id.
 *
 * @example
 * parseIdentifierGuid('imdb:tt0133093') // { namespace: 'imdb', id: 'tt0133093' }
 * parseIdentifierGuid('com.plexapp.agents.themoviedb:603?lang=en') // { namespace: 'tmdb', id: '603' }
 * parseIdentifierGuid('plex:movie/5d7768') // undefined
 */
export function parseIdentifierGuid(
  guid: string,
): { namespace: IdentifierNamespace; id: string } | undefined {
  const [withoutQuery] = normalizeGuid(guid).split('?')
  const separator = withoutQuery.indexOf(':')
  if (separator <= 0) return undefined

  const provider = withoutQuery.slice(0, separator)
  const id = withoutQuery.slice(separator + 1).replace(/^\/+|\/+$/g, '')
  if (!id) return undefined

  const legacyAgent = provider.startsWith('com.plexapp.agents.')
    ? provider.slice('com.plexapp.agents.'.length)
    : undefined
  const namespace = legacyAgent
    ? LEGACY_AGENTS[legacyAgent]
    : MODERN_PROVIDERS[provider]
  if (!namespace) return undefined

  if (namespace === 'imdb') {
    return /^tt\d+$/.test(id) ? { namespace, id } : undefined
  }
  return /^\d+$/.test(id) ? { namespace, id } : undefined
}

/**
 * Collects imdb/tmdb/tvdb ids from a set of GUIDs. When a namespace occurs
 * more than once the first GUID wins.
 */
export function extractIdentifiers(
  guids: string[] | string | undefined,
): MediaIdentifiers {
  const identifiers: MediaIdentifiers = {}
  for (const guid of parseGuids(guids)) {
    const parsed = parseIdentifierGuid(guid)
    if (parsed && identifiers[parsed.namespace] === undefined) {
      identifiers[parsed.namespace] = parsed.id
    }
  }
  return identifiers
}
