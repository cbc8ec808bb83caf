/**
 * End-to-end consultation tests against the bundled knowledge base
 */

import { describe, it, expect, beforeAll } from 'vitest';
import { consult, runConsultation } from '../run.js';
import { InvalidInputError, UnknownCombinationError } from '../../domain/errors.js';
import type { KnowledgeBase } from '../../knowledge/knowledgeBase.js';
import { buildKnowledgeBase, loadKnowledgeBase } from '../../knowledge/loader.js';
import { loadSynonymTable, type SynonymTable } from '../../knowledge/synonyms.js';
import {
  GUIDELINES_PATH,
  SYNONYMS_PATH,
  createDocument,
} from '../../knowledge/__tests__/fixtures.js';

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected function to throw');
}

let kb: KnowledgeBase;
let synonyms: SynonymTable;

beforeAll(async () => {
  kb = await loadKnowledgeBase(GUIDELINES_PATH);
  synonyms = await loadSynonymTable(SYNONYMS_PATH);
});

describe('runConsultation', () => {
  it('aligns the first-line treatment for breast cancer stage II', () => {
    const result = runConsultation(kb, {
      cancerType: 'Breast',
      stage: 'II',
      proposedTreatment: 'Chemotherapy',
    });

    expect(result.alignment).toBe('Aligned');
    expect(result.guideline_rank).toBe(1);
    expect(result.required_tests).toEqual(['ER/PR', 'HER2', 'Ki-67', 'Oncotype DX']);
    expect(result.cost_estimate).toEqual({
      inr: { min: 400000, max: 750000 },
      usd: { min: 5000, max: 9000 },
      basis: 'course',
    });
    expect(result.alternatives).toEqual(['Surgery', 'Radiation Therapy', 'Targeted Therapy']);
    expect(result.guideline_source).toEqual({
      name: 'NCCN Guidelines v5.2025',
      url: 'https://www.nccn.org/guidelines/category_1',
    });
  });

  it('marks an unlisted drug as unrecognized with no risks or cost', () => {
    const result = runConsultation(kb, {
      cancerType: 'Lung/NSCLC',
      stage: 'IV',
      proposedTreatment: 'UnlistedDrugX',
    });

    expect(result.alignment).toBe('NotAligned');
    expect(result.treatment_recognized).toBe(false);
    expect(result.matched_treatment).toBeNull();
    expect(result.risks).toEqual([]);
    expect(result.alternatives).toEqual([]);
    expect(result.cost_estimate).toBeNull();
    expect(result.required_tests).toEqual(['EGFR', 'ALK', 'ROS1', 'BRAF', 'PD-L1', 'KRAS G12C']);
    expect(result.survival_stats).toEqual({ kind: 'median', low_months: 12, high_months: 24 });
  });

  it('reports a known but unrecommended treatment with its risks and alternatives', () => {
    const result = runConsultation(kb, {
      cancerType: 'Prostate',
      stage: 'LowRisk',
      proposedTreatment: 'Cryotherapy',
    });

    expect(result.alignment).toBe('NotAligned');
    expect(result.treatment_recognized).toBe(true);
    expect(result.alternatives).toEqual(['Active Surveillance', 'Surgery', 'Radiation Therapy']);
    expect(result.risks).toEqual([
      'Pain and discomfort',
      'Blistering',
      'Infection',
      'Scarring',
      'Nerve damage',
      'Organ perforation',
    ]);
    expect(result.cost_estimate).toEqual({
      inr: { min: 50000, max: 300000 },
      usd: { min: 625, max: 3750 },
      basis: 'course',
    });
  });

  it('rejects a stage outside the cancer type scheme before matching', () => {
    const error = captureError(() =>
      runConsultation(kb, { cancerType: 'Colorectal', stage: 'VII', proposedTreatment: 'Surgery' })
    );

    expect(error).toBeInstanceOf(UnknownCombinationError);
    expect(error).toMatchObject({
      code: 'UNKNOWN_COMBINATION',
      cancerType: 'Colorectal',
      stage: 'VII',
      reason: 'stage_outside_scheme',
    });
  });

  it('returns PartiallyAligned for a later-ranked recommendation', () => {
    const result = runConsultation(kb, {
      cancerType: 'Lung/NSCLC',
      stage: 'IV',
      proposedTreatment: 'chemotherapy',
    });

    expect(result.alignment).toBe('PartiallyAligned');
    expect(result.guideline_rank).toBe(3);
    expect(result.matched_treatment).toBe('Chemotherapy');
  });

  it('is deterministic for identical requests', () => {
    const request = {
      cancerType: 'Breast',
      stage: 'II',
      proposedTreatment: 'Surgery',
      symptoms: ['lump'],
    };
    const first = runConsultation(kb, request);
    const second = runConsultation(kb, request);

    expect(second).toEqual(first);
    expect(second.consultation_id).toBe(first.consultation_id);
    expect(first.consultation_id).toMatch(/^cons_[0-9a-f]{16}$/);
  });

  it('derives different ids for different symptoms', () => {
    const base = { cancerType: 'Breast', stage: 'II', proposedTreatment: 'Surgery' };
    const a = runConsultation(kb, { ...base, symptoms: ['lump'] });
    const b = runConsultation(kb, { ...base, symptoms: ['pain'] });

    expect(a.consultation_id).not.toBe(b.consultation_id);
  });

  it('accepts stage and cancer type aliases', () => {
    const result = runConsultation(kb, {
      cancerType: 'nsclc',
      stage: 'Stage 4',
      proposedTreatment: 'Osimertinib',
    });
    expect(result.cancer_type).toBe('Lung/NSCLC');
    expect(result.stage).toBe('IV');
    expect(result.alignment).toBe('Aligned');

    const prostate = runConsultation(kb, {
      cancerType: 'Prostate',
      stage: 'low risk',
      proposedTreatment: 'Active Surveillance',
    });
    expect(prostate.stage).toBe('LowRisk');
    expect(prostate.alignment).toBe('Aligned');
  });

  it('cleans reported symptoms', () => {
    const result = runConsultation(kb, {
      cancerType: 'Breast',
      stage: 'II',
      proposedTreatment: 'Surgery',
      symptoms: ['  chest   pain ', '', 'cough'],
    });
    expect(result.reported_symptoms).toEqual(['chest pain', 'cough']);
  });

  it('resolves brand names through the synonym table', () => {
    const request = { cancerType: 'Lung/NSCLC', stage: 'IV', proposedTreatment: 'Tagrisso' };

    const result = runConsultation(kb, request, { synonyms });
    expect(result.alignment).toBe('Aligned');
    expect(result.matched_treatment).toBe('Osimertinib');
    expect(result.synonym_applied).toBe(true);

    expect(runConsultation(kb, request).treatment_recognized).toBe(false);
  });

  it.each([
    ['LowRisk', 'Surgery', 'PartiallyAligned', 2],
    ['IntermediateRisk', 'Radical Prostatectomy', 'Aligned', 1],
    ['HighRisk', 'Radical Prostatectomy', 'PartiallyAligned', 3],
  ])('resolves "prostatectomy" at Prostate %s to %s', (stage, matched, alignment, rank) => {
    const result = runConsultation(
      kb,
      { cancerType: 'Prostate', stage, proposedTreatment: 'prostatectomy' },
      { synonyms }
    );
    expect(result.matched_treatment).toBe(matched);
    expect(result.alignment).toBe(alignment);
    expect(result.guideline_rank).toBe(rank);
    expect(result.synonym_applied).toBe(true);
  });

  it.each([
    [{ cancerType: 'Liver', stage: 'II', proposedTreatment: 'Surgery' }, 'cancerType'],
    [{ cancerType: '', stage: 'II', proposedTreatment: 'Surgery' }, 'cancerType'],
    [{ cancerType: 'Breast', stage: '   ', proposedTreatment: 'Surgery' }, 'stage'],
    [{ cancerType: 'Breast', stage: 'II', proposedTreatment: '  ' }, 'proposedTreatment'],
  ])('raises InvalidInputError for %j', (request, field) => {
    const error = captureError(() => runConsultation(kb, request));
    expect(error).toBeInstanceOf(InvalidInputError);
    expect(error).toMatchObject({ code: 'INVALID_INPUT', field });
  });
});

describe('consult', () => {
  it('wraps a completed consultation', () => {
    const outcome = consult(kb, { cancerType: 'Breast', stage: 'II', proposedTreatment: 'Chemotherapy' });
    expect(outcome.status).toBe('completed');
  });

  it('reports a stage outside the scheme as an UnknownCombination outcome', () => {
    expect(consult(kb, { cancerType: 'Colorectal', stage: 'VII', proposedTreatment: 'Surgery' })).toEqual({
      status: 'unknown_combination',
      alignment: 'UnknownCombination',
      cancer_type: 'Colorectal',
      stage: 'VII',
      reason: 'stage_outside_scheme',
      message: 'Stage "VII" is not part of the staging scheme for Colorectal',
    });
  });

  it('reports a valid stage without a curated entry', () => {
    const partial = buildKnowledgeBase(createDocument(), 'fixture');
    expect(consult(partial, { cancerType: 'Breast', stage: 'I', proposedTreatment: 'Surgery' })).toEqual({
      status: 'unknown_combination',
      alignment: 'UnknownCombination',
      cancer_type: 'Breast',
      stage: 'I',
      reason: 'no_curated_entry',
      message: 'No guideline entry is currently available for Breast stage I',
    });
  });

  it('still throws InvalidInputError', () => {
    expect(() => consult(kb, { cancerType: 'Liver', stage: 'I', proposedTreatment: 'Surgery' })).toThrow(
      InvalidInputError
    );
  });
});
