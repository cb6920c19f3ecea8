import { z } from 'zod';
import {
  identifyOptionsSchema,
  medicationRecordSchema,
  querySignalsSchema,
} from '../matching/schemas.js';
import type { MatchSource } from '../matching/identify.js';
import type { MatchTier } from '../matching/scoring.js';

export const identifyBodySchema = z.object({
  signals: querySignalsSchema,
  candidates: z.array(medicationRecordSchema).optional(),
  options: identifyOptionsSchema.optional(),
});

export const scoreBodySchema = z.object({
  queryTerms: z.array(z.string()),
  record: medicationRecordSchema,
  options: identifyOptionsSchema.pick({ maxEditDistance: true }).optional(),
});

export type IdentifyBody = z.infer<typeof identifyBodySchema>;
export type ScoreBody = z.infer<typeof scoreBodySchema>;

export interface IdentifyResultItem {
  id: string;
  name: string;
  score: number;
  matched_by: MatchSource;
  deep_link: string;
}

export interface IdentifyResponse {
  results: IdentifyResultItem[];
  query_terms: string[];
}

export interface ScoreResponse {
  score: number;
  terms: Array<{ term: string; tier: MatchTier }>;
}
