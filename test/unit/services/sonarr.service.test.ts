import type { SonarrLookupResult } from '@root/types/arr.types.js'
import type { EnabledSonarrConfig } from '@root/types/config.types.js'
import {
  SonarrService,
  seriesLookupTerm,
} from '@services/sonarr.service.js'
import { HttpResponse, http } from 'msw'
import { describe, expect, it } from 'vitest'
import { SONARR_TEST_URL } from '../../mocks/external-api-handlers.js'
import { createMockLogger } from '../../mocks/logger.js'
import { show } from '../../mocks/media-records.js'
import { server } from '../../setup/msw-setup.js'

interface ArrReply {
  status: number
  body?: Record<string, unknown> | Array<Record<string, unknown>>
  statusText?: string
}

const config: EnabledSonarrConfig = {
  enabled: true,
  url: `${SONARR_TEST_URL}/`,
  apiKey: 'test-key',
  qualityProfileId: 6,
  rootFolderPath: '/data/tv',
  monitored: true,
  searchForMissingEpisodes: true,
  seriesType: 'standard',
  seasonFolder: true,
}

const fargoLookup: SonarrLookupResult = {
  title: 'Fargo',
  year: 2014,
  tvdbId: 269613,
  titleSlug: 'fargo',
  seasons: [
    { seasonNumber: 0, monitored: false },
    { seasonNumber: 1, monitored: true },
  ],
}

const fargo = show('Fargo', {
  year: '2014',
  identifiers: { imdb: 'tt2802850', tvdb: '269613' },
})

function useSonarr(
  lookup: (term: string) => SonarrLookupResult[],
  reply: ArrReply = { status: 201, body: { id: 1 } },
) {
  const stub = { terms: [] as string[], bodies: [] as unknown[] }
  server.use(
    http.get(`${SONARR_TEST_URL}/api/v3/series/lookup`, ({ request }) => {
      const term = new URL(request.url).searchParams.get('term') ?? ''
      stub.terms.push(term)
      return HttpResponse.json(lookup(term))
    }),
    http.post(`${SONARR_TEST_URL}/api/v3/series`, async ({ request }) => {
      stub.bodies.push(await request.json())
      if (reply.body === undefined) {
        return new HttpResponse(null, {
          status: reply.status,
          statusText: reply.statusText,
        })
      }
      return HttpResponse.json(reply.body, { status: reply.status })
    }),
  )
  return stub
}

describe('sonarr.service', () => {
  describe('seriesLookupTerm', () => {
    it('should prefer tvdb, then imdb, then the title', () => {
      expect(seriesLookupTerm(fargo)).toBe('tvdb:269613')
      expect(
        seriesLookupTerm(show('Fargo', { identifiers: { imdb: 'tt2802850' } })),
      ).toBe('imdb:tt2802850')
      expect(seriesLookupTerm(show('Fargo', { year: '2014' }))).toBe('Fargo')
    })
  })

  describe('addSeries', () => {
    it('should post the lookup result with the configured options', async () => {
      const stub = useSonarr(() => [fargoLookup])
      const service = new SonarrService(config, createMockLogger(), {
        requestDelayMs: 0,
      })

      await expect(service.addSeries(fargo)).resolves.toBe('added')

      expect(stub.terms).toEqual(['tvdb:269613'])
      expect(stub.bodies).toEqual([
        {
          title: 'Fargo',
          tvdbId: 269613,
          titleSlug: 'fargo',
          images: [],
          seasons: [
            { seasonNumber: 0, monitored: false },
            { seasonNumber: 1, monitored: true },
          ],
          qualityProfileId: 6,
          rootFolderPath: '/data/tv',
          monitored: true,
          seasonFolder: true,
          seriesType: 'standard',
          addOptions: { searchForMissingEpisodes: true },
        },
      ])
    })

    it('should send the language profile when configured', async () => {
      const stub = useSonarr(() => [fargoLookup])
      const service = new SonarrService(
        { ...config, languageProfileId: 1 },
        createMockLogger(),
        { requestDelayMs: 0 },
      )

      await service.addSeries(fargo)

      expect(stub.bodies[0]).toMatchObject({ languageProfileId: 1 })
    })

    it('should treat an existing series as a no-op', async () => {
      useSonarr(
        () => [fargoLookup],
        {
          status: 400,
          body: [
            {
              propertyName: 'TvdbId',
              errorMessage: 'This series has already been added',
              errorCode: 'SeriesExistsValidator',
            },
          ],
        },
      )
      const service = new SonarrService(config, createMockLogger(), {
        requestDelayMs: 0,
      })

      await expect(service.addSeries(fargo)).resolves.toBe('exists')
    })

    it('should fall back to the statusText when the error body is empty', async () => {
      useSonarr(() => [fargoLookup], {
        status: 503,
        statusText: 'Service Unavailable',
      })
      const log = createMockLogger()
      const service = new SonarrService(config, log, { requestDelayMs: 0 })

      await expect(service.addSeries(fargo)).resolves.toBe('failed')
      expect(log.warn).toHaveBeenCalledWith(
        'Sonarr rejected Fargo (503): Service Unavailable',
      )
    })
  })

  describe('addMissing', () => {
    it('should skip series without lookup results', async () => {
      useSonarr((term) => (term === 'tvdb:269613' ? [fargoLookup] : []))
      const log = createMockLogger()
      const service = new SonarrService(config, log, { requestDelayMs: 0 })
      const unknown = show('Unknown Show')

      const added = await service.addMissing([fargo, unknown])

      expect(added).toEqual([fargo])
      expect(log.warn).toHaveBeenCalledWith(
        'No Sonarr lookup result for Unknown Show',
      )
      expect(log.info).toHaveBeenCalledWith('Added 1 of 2 series')
    })
  })
})
