import type { ArrConnection } from '@root/types/arr.types.js'
import { type ArrErrorResult, parseArrErrorResponse } from './arr-error.js'
import { DEFAULT_HTTP_TIMEOUT_MS, HttpError } from './http-error.js'

export type ArrPostResult =
  | { ok: true; status: number }
  | { ok: false; status: number; error: ArrErrorResult }

function apiUrl(connection: ArrConnection, endpoint: string): URL {
  return new URL(`${connection.url.replace(/\/+$/, '')}/api/v3/${endpoint}`)
}

/**
 * GET against the v3 API of Radarr or Sonarr.
 *
 * @throws HttpError for any non-2xx response
 */
export async function getFromArr<T>(
  connection: ArrConnection,
  endpoint: string,
  params: Record<string, string> = {},
): Promise<T> {
  const url = apiUrl(connection, endpoint)
  for (const [key, value] of Object.entries(params)) {
    url.searchParams.append(key, value)
  }

  const response = await fetch(url.toString(), {
    method: 'GET',
    headers: {
      'X-Api-Key': connection.apiKey,
      Accept: 'application/json',
    },
    signal: AbortSignal.timeout(DEFAULT_HTTP_TIMEOUT_MS),
  })

  if (!response.ok) {
    throw new HttpError(
      `API error on ${endpoint}: ${response.status} ${response.statusText}`,
      response.status,
    )
  }

  return response.json() as Promise<T>
}

/**
 * POST against the v3 API. Validation failures are returned, not thrown, so
 * callers can tell an "already added" rejection from a real failure.
 */
export async function postToArr(
  connection: ArrConnection,
  endpoint: string,
  payload: unknown,
): Promise<ArrPostResult> {
  const response = await fetch(apiUrl(connection, endpoint).toString(), {
    method: 'POST',
    headers: {
      'X-Api-Key': connection.apiKey,
      'Content-Type': 'application/json',
      Accept: 'application/json',
    },
    body: JSON.stringify(payload),
    signal: AbortSignal.timeout(DEFAULT_HTTP_TIMEOUT_MS),
  })

  if (response.status === 200 || response.status === 201) {
    return { ok: true, status: response.status }
  }

  let errorData: unknown
  try {
    errorData = await response.json()
  } catch {
    errorData = undefined
  }

  const parsed = parseArrErrorResponse(errorData)
  return {
    ok: false,
    status: response.status,
    error: {
      ...parsed,
      message: parsed.message || response.statusText,
    },
  }
}
