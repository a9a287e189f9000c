import { setupServer } from 'msw/node'
import { afterAll, afterEach, beforeAll } from 'vitest'
import { externalApiHandlers } from '../mocks/external-api-handlers.js'

/**
 * MSW (Mock Service Worker) setup for Vitest
 *
 * Importing this file from a test starts an in-process interceptor for
 * every fetch the adapters make. Individual test files add their own
 * request handlers with server.use().
 *
 * @see https://mswjs.io/docs/integrations/node
 */
export const server = setupServer(...externalApiHandlers)

beforeAll(() => {
  server.listen({ onUnhandledRequest: 'error' })
})

/**
 * Reset handlers after each test to ensure test isolation
 */
afterEach(() => {
  server.resetHandlers()
})

afterAll(() => {
  server.close()
})
