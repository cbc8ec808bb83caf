/**
 * Shared test fixtures: paths to the bundled data files and builders for
 * small in-memory knowledge base documents.
 */

import { fileURLToPath } from 'url';
import type { GuidelineEntryDocument, KnowledgeBaseDocument } from '../schemas.js';

export const GUIDELINES_PATH = fileURLToPath(new URL('../../../data/guidelines.json', import.meta.url));
export const SYNONYMS_PATH = fileURLToPath(new URL('../../../data/synonyms.json', import.meta.url));

export function createEntryDocument(
  overrides: Partial<GuidelineEntryDocument> = {}
): GuidelineEntryDocument {
  return {
    cancer_type: 'Breast',
    stage: 'II',
    standard_treatment: 'Chemotherapy → Surgery',
    standard_treatment_plain: 'Chemotherapy first, then surgery.',
    recommended_treatments: ['Chemotherapy', 'Surgery', 'Radiation Therapy'],
    other_treatments: ['Immunotherapy'],
    required_biomarkers: ['HER2'],
    survival_stats: { kind: 'rate', horizon_years: 5, low_pct: 80, high_pct: 90 },
    risk_profile: {
      Chemotherapy: ['Fatigue'],
      Surgery: ['Infection'],
      Immunotherapy: ['Rash'],
    },
    cost_estimate: {
      Chemotherapy: {
        inr: { min: 100, max: 200 },
        usd: { min: 1, max: 2 },
        basis: 'course',
      },
    },
    alternative_treatments: {
      Chemotherapy: ['Surgery'],
      Immunotherapy: ['Chemotherapy'],
    },
    adjuvant_therapy: {},
    chemotherapy_regimens: [],
    recovery_time: '6 months',
    evidence_level: 'Category 1',
    contraindications: [],
    notes: null,
    ...overrides,
  };
}

export function createDocument(
  entries: GuidelineEntryDocument[] = [createEntryDocument()]
): KnowledgeBaseDocument {
  return {
    sources: [
      { cancer_type: 'Breast', name: 'Test Breast Guideline', url: 'https://example.org/breast' },
      { cancer_type: 'Lung/NSCLC', name: 'Test Lung Guideline', url: 'https://example.org/lung' },
      { cancer_type: 'Colorectal', name: 'Test Colorectal Guideline', url: 'https://example.org/colorectal' },
      { cancer_type: 'Prostate', name: 'Test Prostate Guideline', url: 'https://example.org/prostate' },
    ],
    references: [{ id: 'test-body', name: 'Test Guideline Body', url: 'https://example.org/reference' }],
    entries,
  };
}
