import type { AppConfig } from '@root/types/config.types.js'
import { AuditService } from '@services/audit.service.js'
import { buildListSources } from '@services/list-providers/index.js'
import { PlexLibraryService } from '@services/plex-library.service.js'
import { RadarrService } from '@services/radarr.service.js'
import { ReportService } from '@services/report.service.js'
import { SonarrService } from '@services/sonarr.service.js'
import type { Logger } from 'pino'

/**
 * Wires the configured adapters around the reconciliation core.
 */
export function createAuditService(
  config: AppConfig,
  log: Logger,
): AuditService {
  return new AuditService({
    library: new PlexLibraryService(config.plex, log),
    sources: buildListSources(config.sources, log),
    reporter: new ReportService(config.output.dir, log),
    matching: {
      fuzzyThreshold: config.matching.fuzzyThreshold,
      preferIds: config.matching.preferIds,
    },
    output: {
      writeCsv: config.output.writeCsv,
      writeMarkdown: config.output.writeMarkdown,
    },
    radarr: config.radarr.enabled
      ? new RadarrService(config.radarr, log)
      : undefined,
    sonarr: config.sonarr.enabled
      ? new SonarrService(config.sonarr, log)
      : undefined,
    log,
  })
}
