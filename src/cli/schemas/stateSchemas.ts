import { z } from 'zod';

export const StateShowSchema = z.object({
  db: z.string().min(1).optional(),
});

export const StateResetSchema = z.object({
  db: z.string().min(1).optional(),
  lr: z.coerce.number().finite().positive().optional(),
});
