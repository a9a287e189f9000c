import fs from 'node:fs'
import path from 'node:path'
import type { AppConfig } from '@root/types/config.types.js'
import { appConfigSchema } from '@schemas/config.schema.js'
import { config as loadDotenv } from 'dotenv'
import { parse } from 'yaml'

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(issues.length > 0 ? `${message}:\n  - ${issues.join('\n  - ')}` : message)
    this.name = 'ConfigError'
    Object.setPrototypeOf(this, new.target.prototype)
  }
}

/**
 * Replaces `${NAME}` references with the matching environment variable, or an
 * empty string when it is unset.
 */
export function expandEnv(
  value: string,
  env: NodeJS.ProcessEnv = process.env,
): string {
  return value.replace(/\$\{([^}]+)\}/g, (_, name: string) => env[name] ?? '')
}

/**
 * Applies {@link expandEnv} to every string inside a parsed YAML document.
 */
export function deepExpand(
  value: unknown,
  env: NodeJS.ProcessEnv = process.env,
): unknown {
  if (Array.isArray(value)) return value.map((v) => deepExpand(v, env))
  if (value && typeof value === 'object') {
    const out: Record<string, unknown> = {}
    for (const [key, entry] of Object.entries(value)) {
      out[key] = deepExpand(entry, env)
    }
    return out
  }
  if (typeof value === 'string') return expandEnv(value, env)
  return value
}

/**
 * Validates an already parsed config document and fills in defaults.
 *
 * @throws ConfigError listing every failing key
 */
export function parseConfig(raw: unknown, source = 'config'): AppConfig {
  const result = appConfigSchema.safeParse(raw ?? {})
  if (!result.success) {
    throw new ConfigError(
      `Invalid configuration in ${source}`,
      result.error.issues.map(
        (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`,
      ),
    )
  }
  return result.data
}

/**
 * Loads the YAML config file. A `.env` file next to the working directory is
 * loaded first so `${VAR}` references can point at it.
 */
export function loadConfig(configPath: string): AppConfig {
  loadDotenv({ path: path.resolve(process.cwd(), '.env') })

  const resolved = path.resolve(configPath)
  if (!fs.existsSync(resolved)) {
    throw new ConfigError(`Config file not found: ${resolved}`)
  }

  let document: unknown
  try {
    document = parse(fs.readFileSync(resolved, 'utf-8'))
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    throw new ConfigError(`Failed to parse ${resolved}: ${reason}`)
  }

  return parseConfig(deepExpand(document), resolved)
}
