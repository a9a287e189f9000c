/**
 * Validation error item from *arr APIs (Radarr/Sonarr)
 * Uses camelCase - serialized by System.Text.Json
 */
interface ArrValidationError {
  propertyName?: string
  errorMessage?: string
  attemptedValue?: unknown
  severity?: string
  errorCode?: string
}

export interface ArrErrorResult {
  message: string
  /** The title is already in Radarr/Sonarr, so adding it again is a no-op */
  isAlreadyAdded: boolean
}

function isValidationError(value: unknown): value is ArrValidationError {
  return typeof value === 'object' && value !== null
}

function isAlreadyAddedError(error: ArrValidationError): boolean {
  return (
    (error.errorCode?.endsWith('ExistsValidator') ?? false) ||
    /already been added|already exists/i.test(error.errorMessage ?? '')
  )
}

/**
 * Parse error response from Radarr/Sonarr APIs.
 * Handles both formats:
 * - Array: [{ propertyName, errorMessage, ... }] (validation errors)
 * - Object: { message: string } (general errors)
 */
export function parseArrErrorResponse(errorData: unknown): ArrErrorResult {
  if (Array.isArray(errorData)) {
    const errors = errorData.filter(isValidationError)
    const messages = errors
      .map((e) => e.errorMessage)
      .filter(Boolean)
      .join('; ')
    return {
      message: messages || 'Validation error',
      isAlreadyAdded: errors.some(isAlreadyAddedError),
    }
  }

  if (errorData && typeof errorData === 'object' && 'message' in errorData) {
    const message = String(errorData.message)
    return {
      message,
      isAlreadyAdded: isAlreadyAddedError({ errorMessage: message }),
    }
  }

  return { message: '', isAlreadyAdded: false }
}
