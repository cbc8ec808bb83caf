/**
 * Cancer types and their staging schemes.
 *
 * Breast, lung and colorectal entries are staged 0-IV; prostate entries use
 * risk tiers plus a metastatic label, so a stage token is only meaningful
 * together with its cancer type.
 */

import type { CancerType, ProstateStage, Stage, TnmStage } from './types.js';

export const CANCER_TYPES: readonly CancerType[] = ['Breast', 'Lung/NSCLC', 'Colorectal', 'Prostate'];

const TNM_STAGES: readonly TnmStage[] = ['0', 'I', 'II', 'III', 'IV'];
const PROSTATE_STAGES: readonly ProstateStage[] = ['LowRisk', 'IntermediateRisk', 'HighRisk', 'Metastatic'];

export const STAGE_SCHEMES: Readonly<Record<CancerType, readonly Stage[]>> = {
  Breast: TNM_STAGES,
  'Lung/NSCLC': TNM_STAGES,
  Colorectal: TNM_STAGES,
  Prostate: PROSTATE_STAGES,
};

export const CANCER_TYPE_LABELS: Readonly<Record<CancerType, string>> = {
  Breast: 'Breast Cancer',
  'Lung/NSCLC': 'Non-Small Cell Lung Cancer (NSCLC)',
  Colorectal: 'Colorectal Cancer',
  Prostate: 'Prostate Cancer',
};

export const STAGE_LABELS: Readonly<Record<Stage, string>> = {
  '0': 'Stage 0',
  I: 'Stage I',
  II: 'Stage II',
  III: 'Stage III',
  IV: 'Stage IV',
  LowRisk: 'Low Risk',
  IntermediateRisk: 'Intermediate Risk',
  HighRisk: 'High Risk',
  Metastatic: 'Metastatic',
};

export const STAGE_DESCRIPTIONS: Readonly<Record<Stage, string>> = {
  '0': 'Carcinoma in situ',
  I: 'Small, localized tumor',
  II: 'Larger tumor or limited lymph node spread',
  III: 'Regional lymph node involvement',
  IV: 'Metastatic disease',
  LowRisk: 'Slow-growing cancer confined to the prostate',
  IntermediateRisk: 'Cancer confined to the prostate with moderate growth potential',
  HighRisk: 'Aggressive features, possibly extending beyond the prostate',
  Metastatic: 'Spread beyond the prostate to distant sites',
};

const CANCER_TYPE_ALIASES: Readonly<Record<string, CancerType>> = {
  breast: 'Breast',
  'breast cancer': 'Breast',
  lung: 'Lung/NSCLC',
  'lung/nsclc': 'Lung/NSCLC',
  nsclc: 'Lung/NSCLC',
  'lung cancer': 'Lung/NSCLC',
  'non-small cell lung cancer': 'Lung/NSCLC',
  colorectal: 'Colorectal',
  'colorectal cancer': 'Colorectal',
  colon: 'Colorectal',
  'colon cancer': 'Colorectal',
  rectal: 'Colorectal',
  prostate: 'Prostate',
  'prostate cancer': 'Prostate',
};

// Keys are lowercased with "stage", spaces, dashes and underscores removed
const TNM_STAGE_ALIASES: Readonly<Record<string, TnmStage>> = {
  '0': '0',
  i: 'I',
  '1': 'I',
  ii: 'II',
  '2': 'II',
  iii: 'III',
  '3': 'III',
  iv: 'IV',
  '4': 'IV',
};

const PROSTATE_STAGE_ALIASES: Readonly<Record<string, ProstateStage>> = {
  lowrisk: 'LowRisk',
  low: 'LowRisk',
  intermediaterisk: 'IntermediateRisk',
  intermediate: 'IntermediateRisk',
  highrisk: 'HighRisk',
  high: 'HighRisk',
  metastatic: 'Metastatic',
};

function ownValue<T>(record: Readonly<Record<string, T>>, key: string): T | undefined {
  return Object.hasOwn(record, key) ? record[key] : undefined;
}

export function parseCancerType(value: string): CancerType | null {
  const key = value.trim().toLowerCase().replace(/[_\s]+/g, ' ');
  return ownValue(CANCER_TYPE_ALIASES, key) ?? null;
}

/**
 * Canonicalise a stage token within a cancer type's scheme.
 * Returns null when the token is not part of that scheme.
 */
export function canonicalStage(cancer_type: CancerType, value: string): Stage | null {
  const key = value
    .trim()
    .toLowerCase()
    .replace(/^stage[\s_-]*/, '')
    .replace(/[\s_-]+/g, '');

  if (cancer_type === 'Prostate') {
    return ownValue(PROSTATE_STAGE_ALIASES, key) ?? null;
  }
  return ownValue(TNM_STAGE_ALIASES, key) ?? null;
}
