/**
 * Audit Service
 *
 * One run of the pipeline: snapshot the library once, reconcile every
 * reference source against that snapshot, write reports and optionally hand
 * the merged missing titles to the acquisition services.
 */

import type { AcquisitionRequester } from '@root/types/arr.types.js'
import type {
  AuditSummary,
  SourceResult,
  SourceSummary,
} from '@root/types/audit.types.js'
import type { ListSource } from '@root/types/list-source.types.js'
import type {
  LibrarySnapshot,
  PartitionedMatch,
} from '@root/types/media.types.js'
import type { ReportSection } from '@root/types/report.types.js'
import {
  MISSING_CSV_COLUMNS,
  RADARR_ADDED_COLUMNS,
  SONARR_ADDED_COLUMNS,
} from '@root/types/report.types.js'
import {
  type MatchingOptions,
  mergeMissing,
  partitionAndMatch,
} from '@services/reconciliation/index.js'
import type { ReportService } from '@services/report.service.js'
import { slugify } from '@services/report.service.js'
import { createServiceLogger } from '@utils/logger.js'
import type { Logger } from 'pino'

export interface LibraryProvider {
  gatherLibrary(): Promise<LibrarySnapshot>
}

export interface AuditDeps {
  library: LibraryProvider
  sources: readonly ListSource[]
  reporter: ReportService
  matching: MatchingOptions
  output: { writeCsv: boolean; writeMarkdown: boolean }
  radarr?: AcquisitionRequester
  sonarr?: AcquisitionRequester
  log: Logger
}

export interface AuditRunOptions {
  /** Skip acquisition requests even when Radarr/Sonarr are configured */
  dryRun?: boolean
}

export class AuditService {
  private readonly log: Logger

  constructor(private readonly deps: AuditDeps) {
    this.log = createServiceLogger(deps.log, 'Audit')
  }

  private async writeSourceCsvs(
    name: string,
    result: SourceResult['result'],
  ): Promise<string[]> {
    if (!this.deps.output.writeCsv) return []

    const slug = slugify(name)
    const written = await Promise.all([
      this.deps.reporter.writeCsv(
        `missing_${slug}_movies.csv`,
        result.missingMovies,
        MISSING_CSV_COLUMNS,
      ),
      this.deps.reporter.writeCsv(
        `missing_${slug}_shows.csv`,
        result.missingShows,
        MISSING_CSV_COLUMNS,
      ),
    ])
    return written.filter((p): p is string => p !== undefined)
  }

  async run(options: AuditRunOptions = {}): Promise<AuditSummary> {
    const { library, sources, reporter, matching, radarr, sonarr } = this.deps

    this.log.info('Pulling library snapshot')
    const snapshot = await library.gatherLibrary()

    const results: SourceResult[] = []
    const summaries: SourceSummary[] = []
    const failedSources: AuditSummary['failedSources'] = []
    const sections: ReportSection[] = []

    for (const source of sources) {
      this.log.info(`Fetching ${source.name}`)
      let result: PartitionedMatch
      try {
        const items = await source.fetch()
        result = partitionAndMatch(
          items,
          snapshot.movies,
          snapshot.shows,
          matching,
        )
      } catch (error) {
        this.log.error({ error }, `Failed to process ${source.name}, skipping`)
        failedSources.push({
          name: source.name,
          error: error instanceof Error ? error.message : String(error),
        })
        continue
      }
      results.push({ name: source.name, result })

      this.log.info(
        `${source.name}: Movies present ${result.presentMovies.length}, missing ${result.missingMovies.length}; Shows present ${result.presentShows.length}, missing ${result.missingShows.length}`,
      )

      const csvFiles = await this.writeSourceCsvs(source.name, result)
      summaries.push({
        name: source.name,
        presentMovies: result.presentMovies.length,
        missingMovies: result.missingMovies.length,
        presentShows: result.presentShows.length,
        missingShows: result.missingShows.length,
        csvFiles,
      })

      sections.push(
        {
          title: `${source.name} - Missing Movies (${result.missingMovies.length})`,
          rows: result.missingMovies,
        },
        {
          title: `${source.name} - Missing TV (${result.missingShows.length})`,
          rows: result.missingShows,
        },
      )
    }

    const merged = mergeMissing(results.map((r) => r.result))

    const reportPath = this.deps.output.writeMarkdown
      ? await reporter.writeMarkdownReport(sections)
      : undefined

    let addedMovies = 0
    let addedShows = 0
    if (options.dryRun) {
      if (radarr || sonarr) {
        this.log.info('Dry run, skipping acquisition requests')
      }
    } else {
      if (radarr) {
        this.log.info(`Adding ${merged.movies.length} movies to ${radarr.name}`)
        const added = await radarr.addMissing(merged.movies)
        addedMovies = added.length
        if (this.deps.output.writeCsv) {
          await reporter.writeCsv(
            'radarr_added.csv',
            added,
            RADARR_ADDED_COLUMNS,
          )
        }
      }
      if (sonarr) {
        this.log.info(`Adding ${merged.shows.length} series to ${sonarr.name}`)
        const added = await sonarr.addMissing(merged.shows)
        addedShows = added.length
        if (this.deps.output.writeCsv) {
          await reporter.writeCsv(
            'sonarr_added.csv',
            added,
            SONARR_ADDED_COLUMNS,
          )
        }
      }
    }

    return {
      librarySize: {
        movies: snapshot.movies.length,
        shows: snapshot.shows.length,
      },
      sources: summaries,
      failedSources,
      missingMovies: merged.movies.length,
      missingShows: merged.shows.length,
      addedMovies,
      addedShows,
      ...(reportPath ? { reportPath } : {}),
    }
  }
}
