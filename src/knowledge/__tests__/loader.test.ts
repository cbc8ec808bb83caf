/**
 * Unit tests for knowledge base loading
 *
 * Tests verify:
 * - The bundled knowledge base loads
 * - Integrity violations are all reported together
 * - Snapshots are frozen and versioned by content
 * - A failed reload leaves the served snapshot in place
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { buildKnowledgeBase, loadKnowledgeBase, reloadKnowledgeBase } from '../loader.js';
import { KnowledgeBaseHolder } from '../knowledgeBase.js';
import { MalformedKnowledgeBaseError, UnknownCombinationError } from '../../domain/errors.js';
import { fileExists } from '../../utils/io.js';
import { GUIDELINES_PATH, createDocument, createEntryDocument } from './fixtures.js';

function violationsOf(raw: unknown): readonly string[] {
  try {
    buildKnowledgeBase(raw, 'fixture');
  } catch (error) {
    if (error instanceof MalformedKnowledgeBaseError) return error.violations;
    throw error;
  }
  throw new Error('Expected knowledge base to be rejected');
}

let work_dir: string;

beforeAll(async () => {
  work_dir = await mkdtemp(join(tmpdir(), 'guideline-kb-'));
});

afterAll(async () => {
  await rm(work_dir, { recursive: true, force: true });
});

describe('loadKnowledgeBase', () => {
  it('loads the bundled guideline document', async () => {
    const kb = await loadKnowledgeBase(GUIDELINES_PATH);

    expect(kb.size).toBe(17);
    expect(kb.entries().filter((e) => e.cancer_type === 'Prostate')).toHaveLength(4);
    expect(kb.cancerTypes()).toEqual(['Breast', 'Lung/NSCLC', 'Colorectal', 'Prostate']);
    expect(kb.stagesFor('Breast')).toEqual(['0', 'I', 'II', 'III', 'IV']);
    expect(kb.stagesFor('Prostate')).toEqual(['LowRisk', 'IntermediateRisk', 'HighRisk', 'Metastatic']);
    expect(kb.lookup('Breast', '0').contraindications).toEqual(['Pregnancy (for radiation)']);
  });

  it('carries adjuvant therapy, chemotherapy regimens and guideline references', async () => {
    const kb = await loadKnowledgeBase(GUIDELINES_PATH);

    expect(kb.lookup('Breast', 'I').adjuvant_therapy).toEqual({
      'HR+/HER2-': 'Hormonal therapy 5-10 years',
      'HER2+': 'Trastuzumab + Chemotherapy',
      'Triple negative': 'Chemotherapy',
    });
    expect(kb.lookup('Breast', 'II').chemotherapy_regimens).toEqual(['AC-T', 'TC', 'TCH (if HER2+)']);
    expect(kb.lookup('Prostate', 'LowRisk').adjuvant_therapy).toEqual({});
    expect(kb.lookup('Prostate', 'LowRisk').chemotherapy_regimens).toEqual([]);
    expect(kb.references.map((r) => r.id)).toEqual(['nccn', 'asco', 'esmo', 'cancer_care_ontario']);
  });
});

describe('loadKnowledgeBase from a missing file', () => {
  it.each(['missing.db', 'missing.sqlite', 'missing.json'])(
    'reports %s as not found without creating it',
    async (file_name) => {
      const missing_path = join(work_dir, file_name);

      await expect(loadKnowledgeBase(missing_path)).rejects.toThrow(
        `Knowledge base not found: ${missing_path}`
      );
      expect(await fileExists(missing_path)).toBe(false);
    }
  );
});

describe('buildKnowledgeBase', () => {
  it('canonicalises stage tokens on load', () => {
    const kb = buildKnowledgeBase(createDocument([createEntryDocument({ stage: 'stage 2' })]), 'fixture');
    expect(kb.lookup('Breast', 'II').stage).toBe('II');
  });

  it('throws UnknownCombinationError for a missing pair', () => {
    const kb = buildKnowledgeBase(createDocument(), 'fixture');
    expect(kb.has('Breast', 'I')).toBe(false);
    expect(() => kb.lookup('Breast', 'I')).toThrow(UnknownCombinationError);
  });

  it('freezes entries', () => {
    const entry = buildKnowledgeBase(createDocument(), 'fixture').lookup('Breast', 'II');
    expect(Object.isFrozen(entry)).toBe(true);
    expect(Object.isFrozen(entry.recommended_treatments)).toBe(true);
    expect(Object.isFrozen(entry.risk_profile)).toBe(true);
  });

  it('versions snapshots by content', () => {
    const a = buildKnowledgeBase(createDocument(), 'a');
    const b = buildKnowledgeBase(createDocument(), 'b');
    const c = buildKnowledgeBase(createDocument([createEntryDocument({ notes: 'changed' })]), 'c');

    expect(a.version).toBe(b.version);
    expect(a.version).not.toBe(c.version);
    expect(a.version).toMatch(/^[0-9a-f]{12}$/);
  });

  it('reports every integrity violation in one error', () => {
    const entry = createEntryDocument({
      risk_profile: { 'Proton Therapy': ['Fatigue'] },
      cost_estimate: {
        Chemotherapy: { inr: { min: 300, max: 100 }, usd: { min: 1, max: 2 }, basis: 'course' },
      },
      alternative_treatments: { Surgery: ['Surgery'] },
    });

    expect(violationsOf(createDocument([entry]))).toEqual([
      'Breast II: risk_profile references unknown treatment "Proton Therapy"',
      'Breast II: cost_estimate["Chemotherapy"].inr minimum 300 exceeds maximum 100',
      'Breast II: "Surgery" lists itself as an alternative',
    ]);
  });

  it('rejects alternatives outside the treatment universe', () => {
    const entry = createEntryDocument({ alternative_treatments: { Chemotherapy: ['Proton Therapy'] } });
    expect(violationsOf(createDocument([entry]))).toEqual([
      'Breast II: alternative "Proton Therapy" for "Chemotherapy" is not a known treatment',
    ]);
  });

  it('rejects treatment names that collide after normalization', () => {
    const entry = createEntryDocument({ other_treatments: ['Immunotherapy', 'chemotherapy'] });
    expect(violationsOf(createDocument([entry]))).toEqual([
      'Breast II: treatment "chemotherapy" duplicates "Chemotherapy"',
    ]);
  });

  it('rejects survival rates above 100%', () => {
    const entry = createEntryDocument({
      survival_stats: { kind: 'rate', horizon_years: 5, low_pct: 90, high_pct: 110 },
    });
    expect(violationsOf(createDocument([entry]))).toEqual([
      'Breast II: survival_stats cannot exceed 100: 110',
    ]);
  });

  it('rejects stages outside the scheme', () => {
    expect(violationsOf(createDocument([createEntryDocument({ stage: 'VII' })]))).toEqual([
      'Breast VII: stage "VII" is not in the Breast staging scheme',
    ]);
  });

  it('rejects duplicate (cancer type, stage) pairs', () => {
    const document = createDocument([createEntryDocument(), createEntryDocument({ stage: 'stage 2' })]);
    expect(violationsOf(document)).toEqual(['duplicate entry for Breast II']);
  });

  it('rejects entries without a guideline source', () => {
    const document = {
      ...createDocument(),
      sources: createDocument().sources.filter((s) => s.cancer_type !== 'Breast'),
    };
    expect(violationsOf(document)).toEqual(['Breast II: no guideline source for Breast']);
  });

  it('rejects duplicate guideline reference ids', () => {
    const document = createDocument();
    const reference = { id: 'nccn', name: 'NCCN', url: 'https://example.org/nccn' };
    expect(violationsOf({ ...document, references: [reference, reference] })).toEqual([
      'duplicate guideline reference "nccn"',
    ]);
  });

  it('defaults missing references, adjuvant therapy and regimens to empty', () => {
    const { adjuvant_therapy: _adjuvant, chemotherapy_regimens: _regimens, ...entry } = createEntryDocument();
    const kb = buildKnowledgeBase({ sources: createDocument().sources, entries: [entry] }, 'fixture');

    expect(kb.references).toEqual([]);
    expect(kb.lookup('Breast', 'II').adjuvant_therapy).toEqual({});
    expect(kb.lookup('Breast', 'II').chemotherapy_regimens).toEqual([]);
  });

  it('rejects an empty knowledge base', () => {
    expect(violationsOf({ sources: [], entries: [] })).toEqual(['knowledge base has no entries']);
  });

  it('reports shape errors with their path', () => {
    const document = { ...createDocument(), entries: [{ ...createEntryDocument(), cancer_type: 'Liver' }] };
    expect(violationsOf(document)).toEqual([
      'entries.0.cancer_type: cancer_type must be one of: Breast, Lung/NSCLC, Colorectal, Prostate',
    ]);
  });
});

describe('reloadKnowledgeBase', () => {
  it('swaps in a valid snapshot', async () => {
    const holder = new KnowledgeBaseHolder(buildKnowledgeBase(createDocument(), 'fixture'));
    const next = await reloadKnowledgeBase(holder, GUIDELINES_PATH);

    expect(holder.current()).toBe(next);
    expect(next.size).toBe(17);
  });

  it('keeps the current snapshot when the new one is malformed', async () => {
    const initial = buildKnowledgeBase(createDocument(), 'fixture');
    const holder = new KnowledgeBaseHolder(initial);
    const bad_path = join(work_dir, 'bad.json');
    await writeFile(bad_path, JSON.stringify({ sources: [], entries: [] }), 'utf-8');

    await expect(reloadKnowledgeBase(holder, bad_path)).rejects.toBeInstanceOf(
      MalformedKnowledgeBaseError
    );
    expect(holder.current()).toBe(initial);
  });
});
