import { z } from 'zod';
import { PILL_COLORS, PILL_SHAPES } from './types.js';

export const pillColorSchema = z.enum(PILL_COLORS);
export const pillShapeSchema = z.enum(PILL_SHAPES);

export const medicationMetadataSchema = z.object({
  genericName: z.string().optional(),
  brandNames: z.array(z.string()).optional(),
  activeIngredient: z.string().optional(),
  dosageAmount: z.string().optional(),
  pillColor: pillColorSchema.optional(),
  pillShape: pillShapeSchema.optional(),
  externalCode: z.string().optional(),
  notes: z.string().optional(),
});

export const medicationRecordSchema = z.object({
  id: z.string().min(1),
  name: z.string().trim().min(1),
  metadata: medicationMetadataSchema.nullish(),
});

export const candidateSetSchema = z.array(medicationRecordSchema).superRefine((records, ctx) => {
  const seen = new Set<string>();
  records.forEach((record, index) => {
    if (seen.has(record.id)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Duplicate record id: ${record.id}`,
        path: [index, 'id'],
      });
    }
    seen.add(record.id);
  });
});

export const boundingRegionSchema = z.object({
  x: z.number(),
  y: z.number(),
  width: z.number().nonnegative(),
  height: z.number().nonnegative(),
});

export const recognizedTextSchema = z.object({
  text: z.string(),
  confidence: z.number().min(0).max(1).optional(),
  region: boundingRegionSchema.optional(),
});

export const medicationAnalysisSchema = z.object({
  name: z.string().optional(),
  genericName: z.string().optional(),
  brandNames: z.array(z.string()).max(10).optional(),
  dosageAmount: z.string().optional(),
  activeIngredient: z.string().optional(),
});

export const querySignalsSchema = z.object({
  recognizedText: z.array(recognizedTextSchema).optional(),
  labels: z.array(z.string()).optional(),
  color: pillColorSchema.optional(),
  shape: pillShapeSchema.optional(),
  externalCode: z.string().optional(),
  aiTerms: z.array(z.string()).optional(),
  aiAnalysis: medicationAnalysisSchema.optional(),
});

export const identifyOptionsSchema = z.object({
  minRelevance: z.number().min(0).max(1),
  maxResults: z.number().int().min(1),
  maxEditDistance: z.number().int().min(0),
  textMode: z.enum(['raw', 'structured']),
}).partial();

export const queryTermsSchema = z.array(z.string());

export type MedicationRecordInput = z.infer<typeof medicationRecordSchema>;
export type MedicationMetadataInput = z.infer<typeof medicationMetadataSchema>;
export type QuerySignalsInput = z.infer<typeof querySignalsSchema>;
export type IdentifyOptionsInput = z.infer<typeof identifyOptionsSchema>;
