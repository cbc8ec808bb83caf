/**
 * Treatment-name normalization and optional synonym resolution
 */

import type { SynonymTable } from '../knowledge/synonyms.js';

/**
 * Case-fold, trim and collapse internal whitespace. Two spellings that differ
 * only in case or spacing always normalize to the same string.
 */
export function normalizeTreatmentName(name: string): string {
  return name.trim().replace(/\s+/g, ' ').toLowerCase();
}

export interface ResolvedTreatmentName {
  normalized: string;
  canonical: string | null;
  synonym_applied: boolean;
}

/**
 * Find the entry's own spelling of a treatment. Exact normalized match wins;
 * the synonym table is consulted only when there is none, and the first of
 * the alias's candidates the entry knows is taken.
 */
export function resolveTreatmentName(
  proposed: string,
  known_treatments: readonly string[],
  synonyms?: SynonymTable | null
): ResolvedTreatmentName {
  const normalized = normalizeTreatmentName(proposed);
  const by_normalized = new Map(known_treatments.map((t) => [normalizeTreatmentName(t), t]));

  const exact = by_normalized.get(normalized);
  if (exact !== undefined) {
    return { normalized, canonical: exact, synonym_applied: false };
  }

  for (const candidate of synonyms?.get(normalized) ?? []) {
    const via_synonym = by_normalized.get(candidate);
    if (via_synonym !== undefined) {
      return { normalized, canonical: via_synonym, synonym_applied: true };
    }
  }

  return { normalized, canonical: null, synonym_applied: false };
}

const COMBINATION_PATTERN = /\+|→|->|\bthen\b|\bplus\b|\bfollowed by\b/;

/**
 * Combination regimens are matched as a single string; this only flags them.
 */
export function isCombinationTreatment(normalized: string): boolean {
  return COMBINATION_PATTERN.test(normalized);
}
