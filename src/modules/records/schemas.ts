import { z } from 'zod';
import { medicationMetadataSchema } from '../matching/schemas.js';

export const recordParamsSchema = z.object({
  id: z.string().min(1),
});

export const createRecordSchema = z.object({
  id: z.string().min(1).optional(),
  name: z.string().trim().min(1),
  metadata: medicationMetadataSchema.nullish(),
});

export const updateMetadataSchema = medicationMetadataSchema.nullable();

export type RecordParams = z.infer<typeof recordParamsSchema>;
export type CreateRecordBody = z.infer<typeof createRecordSchema>;
export type UpdateMetadataBody = z.infer<typeof updateMetadataSchema>;
