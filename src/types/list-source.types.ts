import type { MediaRecord } from './media.types.js'

/**
 * A named reference list (chart, curated list) that yields reference records.
 * Network and parsing failures are raised from `fetch`.
 */
export interface ListSource {
  readonly name: string
  fetch(): Promise<MediaRecord[]>
}
