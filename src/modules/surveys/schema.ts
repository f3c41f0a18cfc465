import { z } from 'zod';

export const localeSchema = z.enum(['mn', 'en']);

// Parsed as entries: z.record skips an own "__proto__" key, which must reach the validator as an extra question.
const responsesSchema = z
  .custom<Record<string, unknown>>(
    (value) => typeof value === 'object' && value !== null && !Array.isArray(value),
    'Expected an object of answers'
  )
  .transform((value) => Object.entries(value))
  .pipe(z.array(z.tuple([z.string(), z.number()])))
  .transform((entries) => Object.fromEntries(entries));

export const submissionSchema = z.object({
  userId: z.union([z.string().trim().min(1), z.number().int().nonnegative()]).transform(String),
  responses: responsesSchema,
});

export const localeQuerySchema = z.object({
  lang: localeSchema.optional(),
});

export const resultsQuerySchema = localeQuerySchema.extend({
  userId: z.string().trim().min(1),
  latestOnly: z
    .enum(['true', 'false'])
    .default('true')
    .transform((value) => value === 'true'),
});
