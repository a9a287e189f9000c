/**
 * Report Service
 *
 * Writes the durable output of a run: CSV files per source and kind, CSVs of
 * what was sent to Radarr/Sonarr, and one markdown report.
 */

import fs from 'node:fs/promises'
import path from 'node:path'
import type { MediaRecord } from '@root/types/media.types.js'
import type { CsvColumn, ReportSection } from '@root/types/report.types.js'
import { createServiceLogger } from '@utils/logger.js'
import { stringify } from 'csv-stringify/sync'
import { format } from 'date-fns'
import type { Logger } from 'pino'

export function slugify(name: string): string {
  return name
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '')
}

function columnValue(record: MediaRecord, column: CsvColumn): string {
  switch (column) {
    case 'title':
      return record.title
    case 'year':
      return record.year ?? ''
    case 'imdb_id':
      return record.identifiers.imdb ?? ''
    case 'tmdb_id':
      return record.identifiers.tmdb ?? ''
    case 'tvdb_id':
      return record.identifiers.tvdb ?? ''
    case 'kind':
      return record.kind
  }
}

export function renderCsv(
  rows: readonly MediaRecord[],
  columns: readonly CsvColumn[],
): string {
  return stringify(
    rows.map((row) => columns.map((column) => columnValue(row, column))),
    { header: true, columns: [...columns] },
  )
}

function escapeCell(value: string): string {
  return value.replace(/\|/g, '\\|')
}

function identifierLinks(record: MediaRecord): [string, string, string] {
  const { imdb, tmdb, tvdb } = record.identifiers
  const tmdbPath = record.kind === 'movie' ? 'movie' : 'tv'
  return [
    imdb ? `[${imdb}](https://www.imdb.com/title/${imdb}/)` : '',
    tmdb ? `[${tmdb}](https://www.themoviedb.org/${tmdbPath}/${tmdb})` : '',
    tvdb ? `[${tvdb}](https://thetvdb.com/?id=${tvdb})` : '',
  ]
}

export function renderMarkdownReport(
  sections: readonly ReportSection[],
  generatedAt: Date,
): string {
  const lines: string[] = [
    '# Top Lists Audit',
    '',
    `_Generated: ${format(generatedAt, 'yyyy-MM-dd HH:mm:ss')}_`,
    '',
  ]

  for (const section of sections) {
    lines.push(`## ${section.title}`, '')
    if (section.rows.length === 0) {
      lines.push('All caught up! ✅', '')
      continue
    }

    lines.push('| Title | Year | IMDb | TMDb | TVDB |', '|---|---:|---|---|---|')
    for (const row of section.rows) {
      const [imdb, tmdb, tvdb] = identifierLinks(row)
      lines.push(
        `| ${escapeCell(row.title)} | ${row.year ?? ''} | ${imdb} | ${tmdb} | ${tvdb} |`,
      )
    }
    lines.push('')
  }

  return lines.join('\n')
}

export class ReportService {
  private readonly log: Logger

  constructor(
    private readonly outputDir: string,
    baseLog: Logger,
  ) {
    this.log = createServiceLogger(baseLog, 'Report')
  }

  async ensureOutputDir(): Promise<void> {
    await fs.mkdir(this.outputDir, { recursive: true })
  }

  /**
   * Writes `rows` to `fileName` inside the output directory. Nothing is
   * written for an empty collection.
   *
   * @returns The written path, or undefined when skipped
   */
  async writeCsv(
    fileName: string,
    rows: readonly MediaRecord[],
    columns: readonly CsvColumn[],
  ): Promise<string | undefined> {
    if (rows.length === 0) return undefined

    await this.ensureOutputDir()
    const filePath = path.join(this.outputDir, fileName)
    await fs.writeFile(filePath, renderCsv(rows, columns), 'utf-8')
    this.log.debug(`Wrote ${rows.length} rows to ${filePath}`)
    return filePath
  }

  async writeMarkdownReport(
    sections: readonly ReportSection[],
    generatedAt: Date = new Date(),
  ): Promise<string> {
    await this.ensureOutputDir()
    const filePath = path.join(this.outputDir, 'report.md')
    await fs.writeFile(
      filePath,
      renderMarkdownReport(sections, generatedAt),
      'utf-8',
    )
    this.log.info(`Report written to ${filePath}`)
    return filePath
  }
}
