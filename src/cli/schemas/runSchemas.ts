import { z } from 'zod';

const corpusOptions = {
  k: z.coerce.number().int().positive().default(5),
  db: z.string().min(1).optional(),
  corpus: z.string().min(1).optional(),
  labels: z.string().min(1).optional(),
};

export const RunQuerySchema = z.object({
  query: z.string().trim().min(1, 'Query is required'),
  ...corpusOptions,
});

export const EvaluateSchema = z.object(corpusOptions);
