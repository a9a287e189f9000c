import type {
  appConfigSchema,
  plexConfigSchema,
  radarrConfigSchema,
  sonarrConfigSchema,
  traktListSchema,
} from '@schemas/config.schema.js'
import type { z } from 'zod'

export type AppConfig = z.infer<typeof appConfigSchema>
export type PlexConfig = z.infer<typeof plexConfigSchema>
export type TraktListConfig = z.infer<typeof traktListSchema>

/** Radarr settings once acquisition is switched on */
export type EnabledRadarrConfig = Extract<
  z.infer<typeof radarrConfigSchema>,
  { enabled: true }
>

/** Sonarr settings once acquisition is switched on */
export type EnabledSonarrConfig = Extract<
  z.infer<typeof sonarrConfigSchema>,
  { enabled: true }
>
