import type { Logger } from 'pino'
import { vi } from 'vitest'

/**
 * Create a mock pino logger for testing
 * All logging methods (trace, debug, info, warn, error, fatal) are mocked with vi.fn()
 *
 * @returns A mock Logger instance with all methods stubbed
 *
 * @example
 * const logger = createMockLogger()
 * someFunction(logger)
 * expect(logger.error).toHaveBeenCalledWith(...)
 */
export function createMockLogger(): Logger {
  const mockLogger = {
    trace: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    child: vi.fn(),
    silent: vi.fn(),
    level: 'info',
  } as unknown as Logger

  // Child loggers share the parent's spies so service prefixes stay assertable
  mockLogger.child = vi.fn(() => mockLogger) as unknown as Logger['child']

  return mockLogger
}
