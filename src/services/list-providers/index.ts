import type { AppConfig } from '@root/types/config.types.js'
import type { ListSource } from '@root/types/list-source.types.js'
import type { Logger } from 'pino'
import { createImdbChartSource } from './imdb-chart.js'
import { createTraktListSource, type TraktFetchOptions } from './trakt-list.js'

export {
  createImdbChartSource,
  fetchImdbChart,
  IMDB_CHART_NAMES,
  IMDB_CHART_URLS,
  parseImdbChart,
} from './imdb-chart.js'
export {
  createTraktListSource,
  fetchTraktList,
  TRAKT_API_URL,
  TRAKT_PAGE_LIMIT,
  type TraktFetchOptions,
  toTraktRecord,
  traktListUrl,
} from './trakt-list.js'

/**
 * Builds the enabled reference sources in a stable order: IMDb movies,
 * IMDb TV, then every configured Trakt list.
 */
export function buildListSources(
  sources: AppConfig['sources'],
  log: Logger,
  traktOptions: TraktFetchOptions = {},
): ListSource[] {
  const result: ListSource[] = []

  if (sources.imdbTop250Movies) {
    result.push(createImdbChartSource('movie', log))
  }
  if (sources.imdbTop250Tv) {
    result.push(createImdbChartSource('show', log))
  }

  const trakt = sources.trakt
  if (trakt?.clientId && trakt.userLists.length > 0) {
    for (const list of trakt.userLists) {
      result.push(
        createTraktListSource(list, trakt.clientId, log, traktOptions),
      )
    }
  } else if (trakt && trakt.userLists.length > 0) {
    log.warn('Trakt lists are configured but sources.trakt.clientId is empty')
  }

  return result
}
