/**
 * Report synthesizer: assemble matcher and resolver output into one frozen
 * ConsultationResult in which every field is set.
 */

import { CANCER_TYPE_LABELS, STAGE_DESCRIPTIONS, STAGE_LABELS } from '../domain/stages.js';
import { ownEntry } from '../knowledge/universe.js';
import type {
  AlignmentVerdict,
  ConsultationResult,
  GuidelineEntry,
  GuidelineReference,
  GuidelineSource,
  ResolvedGuidance,
} from '../domain/types.js';
import { deepFreeze } from '../utils/freeze.js';
import { isCombinationTreatment } from './normalize.js';

const EVIDENCE_EXPLANATIONS: Readonly<Record<string, string>> = {
  'Category 1':
    'Highest confidence - Based on extensive research and expert agreement. This is the standard treatment that doctors worldwide recommend.',
  'Category 2A':
    'High confidence - Strong evidence supports this approach. Most doctors would recommend this.',
  'Category 2B':
    'Moderate confidence - Some evidence supports this, but there may be other good options too.',
  'Category 3':
    'Lower confidence - Limited research available. Doctors may disagree on this approach.',
};

const DEFAULT_EVIDENCE_EXPLANATION =
  'This treatment is supported by medical research and clinical experience.';

export interface SynthesisInput {
  consultation_id: string;
  knowledge_base_version: string;
  entry: GuidelineEntry;
  source: GuidelineSource;
  references: readonly GuidelineReference[];
  verdict: AlignmentVerdict;
  guidance: ResolvedGuidance;
  proposed_treatment: string;
  reported_symptoms: readonly string[];
}

/**
 * "Guideline disagrees" and "no data to judge" are both NotAligned and must
 * read differently.
 */
export function summarizeAlignment(
  entry: GuidelineEntry,
  verdict: AlignmentVerdict,
  proposed_treatment: string
): string {
  const where = `${CANCER_TYPE_LABELS[entry.cancer_type]}, ${STAGE_LABELS[entry.stage]}`;
  const recommended = entry.recommended_treatments;
  const matched = verdict.matched_treatment ?? proposed_treatment;

  switch (verdict.alignment) {
    case 'Aligned':
      return `${matched} matches the first-line guideline recommendation for ${where}.`;
    case 'PartiallyAligned':
      return (
        `${matched} is guideline-acceptable for ${where} but not first-line ` +
        `(rank ${verdict.rank ?? '?'} of ${recommended.length}); the preferred option is ${recommended[0]}.`
      );
    case 'NotAligned':
      return verdict.recognized
        ? `Guideline disagrees: ${matched} is not recommended for ${where}. Recommended options: ${recommended.join(', ')}.`
        : `No data to judge: "${proposed_treatment}" is not recognized for ${where}. Recommended options: ${recommended.join(', ')}.`;
  }
}

export function synthesize(input: SynthesisInput): ConsultationResult {
  const { entry, verdict, guidance } = input;

  const cost =
    verdict.matched_treatment === null
      ? undefined
      : ownEntry(entry.cost_estimate, verdict.matched_treatment);

  const result: ConsultationResult = {
    consultation_id: input.consultation_id,
    knowledge_base_version: input.knowledge_base_version,
    cancer_type: entry.cancer_type,
    cancer_type_label: CANCER_TYPE_LABELS[entry.cancer_type],
    stage: entry.stage,
    stage_label: STAGE_LABELS[entry.stage],
    stage_description: STAGE_DESCRIPTIONS[entry.stage],
    proposed_treatment: input.proposed_treatment,
    normalized_treatment: verdict.normalized_treatment,
    matched_treatment: verdict.matched_treatment,
    synonym_applied: verdict.synonym_applied,
    alignment: verdict.alignment,
    treatment_recognized: verdict.recognized,
    guideline_rank: verdict.rank,
    alignment_summary: summarizeAlignment(entry, verdict, input.proposed_treatment),
    combination_flagged: isCombinationTreatment(verdict.normalized_treatment),
    matched_guideline_treatments: [...entry.recommended_treatments],
    required_tests: [...guidance.required_tests],
    risks: [...guidance.risks],
    alternatives: [...guidance.alternatives],
    cost_estimate: cost
      ? {
          inr: { ...cost.inr },
          usd: { ...cost.usd },
          basis: cost.basis,
        }
      : null,
    survival_stats: { ...entry.survival_stats },
    adjuvant_therapy: { ...entry.adjuvant_therapy },
    chemotherapy_regimens: [...entry.chemotherapy_regimens],
    standard_treatment: entry.standard_treatment,
    standard_treatment_plain: entry.standard_treatment_plain,
    recovery_time: entry.recovery_time,
    evidence_level: entry.evidence_level,
    evidence_explanation:
      (entry.evidence_level !== null
        ? ownEntry(EVIDENCE_EXPLANATIONS, entry.evidence_level)
        : undefined) ?? DEFAULT_EVIDENCE_EXPLANATION,
    contraindications: [...entry.contraindications],
    notes: entry.notes,
    guideline_source: { name: input.source.name, url: input.source.url },
    official_guidelines: input.references.map((r) => ({ id: r.id, name: r.name, url: r.url })),
    reported_symptoms: [...input.reported_symptoms],
  };

  return deepFreeze(result);
}
