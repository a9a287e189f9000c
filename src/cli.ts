#!/usr/bin/env node
import { createAuditService } from '@root/app.js'
import type { AppConfig } from '@root/types/config.types.js'
import { ConfigError, loadConfig } from '@utils/config-loader.js'
import { createLogger, validLogLevels } from '@utils/logger.js'
import { Command, InvalidArgumentError } from 'commander'
import type { LevelWithSilent } from 'pino'

interface CliOptions {
  config: string
  dryRun?: boolean
  logLevel?: LevelWithSilent
}

function parseLogLevel(value: string): LevelWithSilent {
  const level = validLogLevels.find((l) => l === value)
  if (!level) {
    throw new InvalidArgumentError(
      `Expected one of ${validLogLevels.join(', ')}`,
    )
  }
  return level
}

async function run(options: CliOptions): Promise<number> {
  let config: AppConfig
  try {
    config = loadConfig(options.config)
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(error.message)
      return 1
    }
    throw error
  }

  const log = createLogger({
    level: options.logLevel ?? config.logging.level,
    console: true,
    logDir: config.logging.dir,
  })

  try {
    const summary = await createAuditService(config, log).run({
      dryRun: options.dryRun,
    })
    for (const failed of summary.failedSources) {
      log.warn(`Source "${failed.name}" was skipped: ${failed.error}`)
    }
    log.info(
      `Done. ${summary.missingMovies} movies and ${summary.missingShows} shows missing. See ${config.output.dir} for results.`,
    )
    return 0
  } catch (error) {
    log.fatal({ error }, 'Audit run failed')
    return 1
  }
}

const program = new Command()

program
  .name('watchgap')
  .description(
    'Audit a Plex library against IMDb charts and Trakt lists, optionally adding missing titles to Radarr/Sonarr',
  )
  .version('0.1.0')
  .option('-c, --config <path>', 'Path to YAML config', 'config.media.yaml')
  .option('--dry-run', 'Report only, never send titles to Radarr/Sonarr')
  .option(
    '--log-level <level>',
    'Override the configured log level',
    parseLogLevel,
  )
  .action(async (options: CliOptions) => {
    process.exitCode = await run(options)
  })

await program.parseAsync(process.argv)
