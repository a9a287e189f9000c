/**
 * Error raised by the HTTP adapters for non-success responses.
 */
export class HttpError extends Error {
  constructor(
    message: string,
    public status: number,
  ) {
    super(message)
    this.name = 'HttpError'

    // Fix prototype chain – important after TS → JS down-emit
    Object.setPrototypeOf(this, new.target.prototype)

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, HttpError)
    }
  }
}

export const DEFAULT_HTTP_TIMEOUT_MS = 20000

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}
