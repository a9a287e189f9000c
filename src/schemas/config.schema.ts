import { z } from 'zod'

const logLevelSchema = z.enum([
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
])

export const plexConfigSchema = z.object({
  url: z.string().url(),
  token: z.string().min(1, 'Plex token is required'),
  movieSections: z.array(z.string().min(1)).default(['Movies']),
  showSections: z.array(z.string().min(1)).default(['TV Shows']),
})

export const matchingConfigSchema = z
  .object({
    fuzzyThreshold: z.number().int().min(0).max(100).default(90),
    preferIds: z.boolean().default(true),
  })
  .default({})

export const traktListSchema = z.object({
  user: z.string().min(1),
  slug: z.string().min(1),
  type: z.enum(['movies', 'shows', 'mixed']).default('mixed'),
})

export const sourcesConfigSchema = z
  .object({
    imdbTop250Movies: z.boolean().default(false),
    imdbTop250Tv: z.boolean().default(false),
    trakt: z
      .object({
        clientId: z.string().default(''),
        userLists: z.array(traktListSchema).default([]),
      })
      .optional(),
  })
  .default({})

const arrConnectionSchema = z.object({
  url: z.string().url(),
  apiKey: z.string().min(1, 'API key is required'),
  qualityProfileId: z.number().int().positive(),
  rootFolderPath: z.string().min(1),
  monitored: z.boolean().default(true),
})

export const radarrConfigSchema = z
  .discriminatedUnion('enabled', [
    z.object({ enabled: z.literal(false) }),
    arrConnectionSchema.extend({
      enabled: z.literal(true),
      searchForMovie: z.boolean().default(true),
      minimumAvailability: z
        .enum(['announced', 'inCinemas', 'released'])
        .default('released'),
    }),
  ])
  .default({ enabled: false })

export const sonarrConfigSchema = z
  .discriminatedUnion('enabled', [
    z.object({ enabled: z.literal(false) }),
    arrConnectionSchema.extend({
      enabled: z.literal(true),
      languageProfileId: z.number().int().positive().optional(),
      searchForMissingEpisodes: z.boolean().default(true),
      seriesType: z.enum(['standard', 'anime', 'daily']).default('standard'),
      seasonFolder: z.boolean().default(true),
    }),
  ])
  .default({ enabled: false })

export const outputConfigSchema = z
  .object({
    dir: z.string().min(1).default('./out'),
    writeCsv: z.boolean().default(true),
    writeMarkdown: z.boolean().default(true),
  })
  .default({})

export const loggingConfigSchema = z
  .object({
    level: logLevelSchema.default('info'),
    dir: z.string().min(1).optional(),
  })
  .default({})

export const appConfigSchema = z.object({
  plex: plexConfigSchema,
  matching: matchingConfigSchema,
  sources: sourcesConfigSchema,
  radarr: radarrConfigSchema,
  sonarr: sonarrConfigSchema,
  output: outputConfigSchema,
  logging: loggingConfigSchema,
})
