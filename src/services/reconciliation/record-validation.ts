import type { MediaRecord } from '@root/types/media.types.js'
import {
  type MatchingOptionsInput,
  matchingOptionsSchema,
  mediaRecordSchema,
} from '@schemas/media-record.schema.js'
import type { ZodIssue } from 'zod'

export class InvalidMediaRecordError extends Error {
  constructor(
    public readonly collection: string,
    public readonly position: number,
    public readonly issues: ZodIssue[],
  ) {
    const detail = issues
      .map((issue) => `${issue.path.join('.') || 'record'}: ${issue.message}`)
      .join('; ')
    super(`Invalid ${collection} record at index ${position}: ${detail}`)
    this.name = 'InvalidMediaRecordError'
    Object.setPrototypeOf(this, new.target.prototype)
  }
}

/**
 * Rejects the first record that does not satisfy {@link mediaRecordSchema}.
 * Adapters are responsible for defaulting fields before records get here.
 *
 * @param collection - Name used in the error message, e.g. "library movie"
 */
export function validateRecords(
  records: readonly MediaRecord[],
  collection: string,
): void {
  records.forEach((record, position) => {
    const result = mediaRecordSchema.safeParse(record)
    if (!result.success) {
      throw new InvalidMediaRecordError(
        collection,
        position,
        result.error.issues,
      )
    }
  })
}

/**
 * Validates matching options, throwing a ZodError when the threshold is not
 * an integer in [0, 100].
 */
export function parseMatchingOptions(input: unknown): MatchingOptionsInput {
  return matchingOptionsSchema.parse(input)
}
