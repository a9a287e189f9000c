import { z } from 'zod'

const identifierValue = z.string().min(1).optional()

export const mediaKindSchema = z.enum(['movie', 'show'])

export const mediaIdentifiersSchema = z.object({
  imdb: identifierValue,
  tmdb: identifierValue,
  tvdb: identifierValue,
})

export const mediaRecordSchema = z.object({
  title: z.string().min(1, 'Title is required'),
  year: z
    .string()
    .regex(/^\d{4}$/, 'Year must be a four digit string')
    .optional(),
  kind: mediaKindSchema,
  identifiers: mediaIdentifiersSchema,
  libraryKey: z.string().optional(),
})

export const matchingOptionsSchema = z.object({
  fuzzyThreshold: z
    .number()
    .int('Fuzzy threshold must be an integer')
    .min(0)
    .max(100),
  preferIds: z.boolean(),
})

export type MatchingOptionsInput = z.infer<typeof matchingOptionsSchema>
