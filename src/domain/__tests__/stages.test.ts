import { describe, it, expect } from 'vitest';
import { canonicalStage, parseCancerType } from '../stages.js';
import { generateConsultationId, sanitizeKey } from '../ids.js';

describe('parseCancerType', () => {
  it.each([
    ['Breast', 'Breast'],
    ['breast_cancer', 'Breast'],
    ['NSCLC', 'Lung/NSCLC'],
    ['Lung/NSCLC', 'Lung/NSCLC'],
    [' colon  cancer ', 'Colorectal'],
    ['PROSTATE', 'Prostate'],
  ])('maps "%s" to %s', (input, expected) => {
    expect(parseCancerType(input)).toBe(expected);
  });

  it('returns null for unsupported types and inherited keys', () => {
    expect(parseCancerType('Liver')).toBeNull();
    expect(parseCancerType('constructor')).toBeNull();
  });
});

describe('canonicalStage', () => {
  it('accepts roman numerals, digits and a stage prefix for TNM schemes', () => {
    expect(canonicalStage('Breast', 'II')).toBe('II');
    expect(canonicalStage('Breast', 'Stage IV')).toBe('IV');
    expect(canonicalStage('Colorectal', '3')).toBe('III');
    expect(canonicalStage('Lung/NSCLC', 'stage-0')).toBe('0');
  });

  it('accepts risk tiers for prostate', () => {
    expect(canonicalStage('Prostate', 'LowRisk')).toBe('LowRisk');
    expect(canonicalStage('Prostate', 'Low Risk')).toBe('LowRisk');
    expect(canonicalStage('Prostate', 'intermediate-risk')).toBe('IntermediateRisk');
    expect(canonicalStage('Prostate', 'high')).toBe('HighRisk');
  });

  it('rejects tokens from another scheme', () => {
    expect(canonicalStage('Colorectal', 'VII')).toBeNull();
    expect(canonicalStage('Prostate', 'II')).toBeNull();
    expect(canonicalStage('Breast', 'LowRisk')).toBeNull();
  });
});

describe('ids', () => {
  it('sanitizes keys', () => {
    expect(sanitizeKey('Lung/NSCLC')).toBe('lung_nsclc');
  });

  it('derives consultation ids from the request content', () => {
    const id = generateConsultationId('Breast', 'II', 'surgery', [], 'abc');
    expect(id).toBe(generateConsultationId('Breast', 'II', 'surgery', [], 'abc'));
    expect(id).not.toBe(generateConsultationId('Breast', 'II', 'surgery', [], 'def'));
    expect(id).toMatch(/^cons_[0-9a-f]{16}$/);
  });
});
