import fs from 'node:fs'
import { resolve } from 'node:path'
import type { LevelWithSilent, Logger, LoggerOptions } from 'pino'
import pino from 'pino'
import * as rfs from 'rotating-file-stream'

export const validLogLevels: LevelWithSilent[] = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
]

export interface LoggerSetup {
  level: LevelWithSilent
  /** Show pretty output on the terminal */
  console: boolean
  /** Directory for rotated log files; no file logging when omitted */
  logDir?: string
}

interface StreamLoggerOptions {
  options: LoggerOptions
  stream?: pino.DestinationStream
}

const SENSITIVE_QUERY_PARAMS = ['apiKey', 'password', 'token', 'X-Plex-Token']

const SERIALIZED_KEYS = ['message', 'stack', 'name', 'status', 'type', 'cause']

const PRETTY_OPTIONS = {
  translateTime: 'HH:MM:ss Z',
  ignore: 'pid,hostname',
  colorize: true,
}

/**
 * Creates a custom error serializer that handles standard errors, HTTP errors
 * carrying a status and arbitrary thrown values.
 */
export function createErrorSerializer() {
  const serialize = (err: unknown): unknown => {
    if (err == null) {
      return err
    }

    if (typeof err !== 'object') {
      const primitiveType =
        typeof err === 'string'
          ? 'StringError'
          : typeof err === 'number'
            ? 'NumberError'
            : typeof err === 'boolean'
              ? 'BooleanError'
              : 'UnknownError'
      return { message: String(err), type: primitiveType }
    }

    const serialized: Record<string, unknown> = {}

    if ('message' in err && err.message) serialized.message = err.message
    if ('name' in err && err.name) serialized.name = err.name
    if ('status' in err && err.status !== undefined)
      serialized.status = err.status

    if (err instanceof TypeError) {
      serialized.type = 'TypeError'
    } else if (err instanceof RangeError) {
      serialized.type = 'RangeError'
    } else if (err instanceof Error) {
      serialized.type = 'Error'
    } else if ('name' in err && typeof err.name === 'string' && err.name) {
      serialized.type = err.name
    } else {
      serialized.type = 'UnknownError'
    }

    // Client errors (4xx) are logged without a stack
    const status =
      'status' in err && typeof err.status === 'number' ? err.status : undefined
    const shouldIncludeStack = !status || status >= 500
    if ('stack' in err && err.stack && shouldIncludeStack) {
      serialized.stack = err.stack
    }

    if ('cause' in err && err.cause) {
      serialized.cause = serialize(err.cause)
    }

    for (const [key, value] of Object.entries(err)) {
      if (!SERIALIZED_KEYS.includes(key)) {
        serialized[key] = value
      }
    }

    return serialized
  }
  return serialize
}

/**
 * Replaces the values of credential query parameters (`apiKey`, `password`,
 * `token`, `X-Plex-Token`) with `[REDACTED]` so URLs can be logged.
 */
export function redactUrl(url: string): string {
  return SENSITIVE_QUERY_PARAMS.reduce(
    (acc, param) =>
      acc.replace(
        new RegExp(`([?&])${param}=([^&]+)`, 'gi'),
        `$1${param}=[REDACTED]`,
      ),
    url,
  )
}

/**
 * Generates a log filename using the given date and optional index.
 *
 * Without a date the current file is `watchgap-current.log`, rotated files are
 * `watchgap-YYYY-MM-DD[-index].log`.
 */
export function filename(time: number | Date, index?: number): string {
  if (!time) return 'watchgap-current.log'
  const date = typeof time === 'number' ? new Date(time) : time
  const year = date.getFullYear()
  const month = String(date.getMonth() + 1).padStart(2, '0')
  const day = String(date.getDate()).padStart(2, '0')
  const indexStr = index ? `-${index}` : ''
  return `watchgap-${year}-${month}-${day}${indexStr}.log`
}

function getFileStream(
  logDir: string,
): rfs.RotatingFileStream | NodeJS.WriteStream {
  const logDirectory = resolve(logDir)
  try {
    if (!fs.existsSync(logDirectory)) {
      fs.mkdirSync(logDirectory, { recursive: true })
    }
    return rfs.createStream(filename, {
      size: '10M',
      interval: '1d',
      path: logDirectory,
      compress: 'gzip',
      maxFiles: 7,
    })
  } catch (err) {
    console.error('Failed to setup log directory:', err)
    return process.stdout
  }
}

/**
 * Builds pino options and the destination stream for the requested setup:
 * pretty terminal output, rotating files, or both through a multistream.
 */
export function createLoggerConfig(setup: LoggerSetup): StreamLoggerOptions {
  const base: LoggerOptions = {
    level: setup.level,
    serializers: {
      err: createErrorSerializer(),
      error: createErrorSerializer(),
    },
  }

  const fileStream = setup.logDir ? getFileStream(setup.logDir) : undefined

  if (!fileStream || fileStream === process.stdout) {
    if (!setup.console) {
      return { options: base, stream: fileStream }
    }
    return {
      options: {
        ...base,
        transport: { target: 'pino-pretty', options: PRETTY_OPTIONS },
      },
    }
  }

  if (!setup.console) {
    return { options: base, stream: fileStream }
  }

  const prettyStream = pino.transport({
    target: 'pino-pretty',
    options: PRETTY_OPTIONS,
  })
  const streamLevel = setup.level === 'silent' ? 'fatal' : setup.level

  return {
    options: base,
    stream: pino.multistream([
      { stream: prettyStream, level: streamLevel },
      { stream: fileStream, level: streamLevel },
    ]),
  }
}

export function createLogger(setup: LoggerSetup): Logger {
  const { options, stream } = createLoggerConfig(setup)
  return stream ? pino(options, stream) : pino(options)
}

/**
 * Creates a child logger whose messages are prefixed with `[SERVICE] `.
 */
export function createServiceLogger(parent: Logger, service: string): Logger {
  return parent.child({}, { msgPrefix: `[${service.toUpperCase()}] ` })
}
