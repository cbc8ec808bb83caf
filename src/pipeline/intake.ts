/**
 * Intake parser: pull cancer type and stage out of a free-text description
 * such as "Stage II breast cancer, HER2 positive".
 */

import type { CancerType, Stage, TnmStage } from '../domain/types.js';

export interface ParsedIntake {
  cancerType: CancerType | null;
  stage: Stage | null;
}

// First match wins, in this order
const CANCER_PATTERNS: ReadonlyArray<[RegExp, CancerType]> = [
  [/\bbreasts?\b/, 'Breast'],
  [/\b(lungs?|nsclc|sclc)\b/, 'Lung/NSCLC'],
  [/\b(colon|rectal|rectum|colorectal)\b/, 'Colorectal'],
  [/\bprostate\b/, 'Prostate'],
];

// Higher stages are tested first so "stage iii" is never read as "stage i".
// A substage letter (IIIA, 2b) folds into its stage.
const TNM_PATTERNS: ReadonlyArray<[RegExp, TnmStage]> = [
  [/\bstage\s*(iv|4)[abc]?\b|\bmetastatic\b/, 'IV'],
  [/\bstage\s*(iii|3)[abc]?\b/, 'III'],
  [/\bstage\s*(ii|2)[abc]?\b/, 'II'],
  [/\bstage\s*(i|1)[abc]?\b/, 'I'],
  [/\bstage\s*0\b|\bin situ\b|\bdcis\b/, '0'],
];

const RISK_PATTERNS: ReadonlyArray<[RegExp, Stage]> = [
  [/\blow[\s-]*risk\b/, 'LowRisk'],
  [/\bintermediate\b/, 'IntermediateRisk'],
  [/\bhigh[\s-]*risk\b/, 'HighRisk'],
];

function firstMatch<T>(text: string, patterns: ReadonlyArray<[RegExp, T]>): T | null {
  for (const [pattern, value] of patterns) {
    if (pattern.test(text)) return value;
  }
  return null;
}

export function parseIntake(text: string): ParsedIntake {
  const lowered = text.toLowerCase();

  const cancerType = firstMatch(lowered, CANCER_PATTERNS);
  const tnm = firstMatch(lowered, TNM_PATTERNS);
  const risk = firstMatch(lowered, RISK_PATTERNS);

  let stage: Stage | null;
  if (cancerType === 'Prostate') {
    // Prostate entries are staged by risk tier; a bare TNM stage below IV names none
    stage = tnm === 'IV' ? 'Metastatic' : risk;
  } else {
    stage = tnm ?? risk;
  }

  return { cancerType, stage };
}
