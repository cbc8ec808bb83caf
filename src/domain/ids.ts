/**
 * Utilities for stable, deterministic keys and identifiers
 */

import { shortHash } from '../utils/hash.js';
import type { CancerType, Stage } from './types.js';

export function entryKey(cancer_type: CancerType, stage: Stage): string {
  return `${sanitizeKey(cancer_type)}:${sanitizeKey(stage)}`;
}

export function sanitizeKey(key: string): string {
  return key
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '');
}

export function generateConsultationId(
  cancer_type: CancerType,
  stage: Stage,
  normalized_treatment: string,
  reported_symptoms: readonly string[],
  knowledge_base_version: string
): string {
  const combined = JSON.stringify({
    cancer_type,
    stage,
    normalized_treatment,
    reported_symptoms,
    knowledge_base_version,
  });
  return `cons_${shortHash(combined, 16)}`;
}
