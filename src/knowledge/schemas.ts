/**
 * Zod schemas for knowledge base documents.
 *
 * These only check shape. Cross-field rules (stage schemes, closed-world
 * treatment references, range ordering) live in pipeline/validation.ts so that
 * every violation can be reported in one pass.
 */

import { z } from 'zod';
import { CANCER_TYPES } from '../domain/stages.js';
import type { CancerType } from '../domain/types.js';

const CancerTypeSchema = z.string().refine(
  (value): value is CancerType => CANCER_TYPES.some((t) => t === value),
  { message: `cancer_type must be one of: ${CANCER_TYPES.join(', ')}` }
);

const MoneyRangeSchema = z.object({
  min: z.number(),
  max: z.number(),
});

export const CostEstimateSchema = z.object({
  inr: MoneyRangeSchema,
  usd: MoneyRangeSchema,
  basis: z.enum(['course', 'per_year']),
});

export const SurvivalStatsSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('rate'),
    horizon_years: z.number().int().positive(),
    low_pct: z.number(),
    high_pct: z.number(),
  }),
  z.object({
    kind: z.literal('median'),
    low_months: z.number(),
    high_months: z.number(),
  }),
]);

const TreatmentNameSchema = z.string().trim().min(1);

export const GuidelineEntrySchema = z.object({
  cancer_type: CancerTypeSchema,
  stage: z.string().min(1),
  standard_treatment: z.string(),
  standard_treatment_plain: z.string(),
  recommended_treatments: z.array(TreatmentNameSchema).min(1),
  other_treatments: z.array(TreatmentNameSchema).default([]),
  required_biomarkers: z.array(z.string().min(1)),
  survival_stats: SurvivalStatsSchema,
  risk_profile: z.record(z.string(), z.array(z.string())).default({}),
  cost_estimate: z.record(z.string(), CostEstimateSchema).default({}),
  alternative_treatments: z.record(z.string(), z.array(z.string())).default({}),
  adjuvant_therapy: z.record(z.string().trim().min(1), z.string().trim().min(1)).default({}),
  chemotherapy_regimens: z.array(z.string().trim().min(1)).default([]),
  recovery_time: z.string().nullable().default(null),
  evidence_level: z.string().nullable().default(null),
  contraindications: z.array(z.string()).default([]),
  notes: z.string().nullable().default(null),
});

export type GuidelineEntryDocument = z.infer<typeof GuidelineEntrySchema>;

export const GuidelineSourceSchema = z.object({
  cancer_type: CancerTypeSchema,
  name: z.string().min(1),
  url: z.string().url(),
});

export const GuidelineReferenceSchema = z.object({
  id: z.string().trim().min(1),
  name: z.string().min(1),
  url: z.string().url(),
});

export const KnowledgeBaseDocumentSchema = z.object({
  sources: z.array(GuidelineSourceSchema),
  references: z.array(GuidelineReferenceSchema).default([]),
  entries: z.array(GuidelineEntrySchema),
});

export type KnowledgeBaseDocument = z.infer<typeof KnowledgeBaseDocumentSchema>;

const SynonymTargetSchema = z.string().trim().min(1);

/** An alias maps to one canonical name, or to candidates tried in order */
export const SynonymDocumentSchema = z.object({
  synonyms: z.record(
    z.string().trim().min(1),
    z.union([SynonymTargetSchema, z.array(SynonymTargetSchema).min(1)])
  ),
});
