import { z } from 'zod';

export const catalogFindQuerySchema = z.object({
  q: z.string().trim().min(1),
});

export const catalogSuggestQuerySchema = z.object({
  q: z.string().trim().min(1),
  limit: z.coerce.number().int().min(1).max(20).default(5),
});
