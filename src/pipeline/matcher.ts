/**
 * Matcher: judge a proposed treatment against one guideline entry
 */

import { treatmentUniverse } from '../knowledge/universe.js';
import type { SynonymTable } from '../knowledge/synonyms.js';
import type { AlignmentVerdict, GuidelineEntry } from '../domain/types.js';
import { resolveTreatmentName } from './normalize.js';

/**
 * Every treatment name the entry can say something about. The loader already
 * guarantees risk, cost and alternative keys are part of the universe; they are
 * included here so recognition never depends on that check having run.
 */
function recognizedTreatments(entry: GuidelineEntry): string[] {
  return [
    ...new Set([
      ...treatmentUniverse(entry),
      ...Object.keys(entry.risk_profile),
      ...Object.keys(entry.cost_estimate),
      ...Object.keys(entry.alternative_treatments),
    ]),
  ];
}

/**
 * Rank in recommended_treatments decides the verdict: first place is Aligned,
 * any other place PartiallyAligned. A treatment the entry knows but does not
 * recommend is NotAligned; one it has no data on is NotAligned and unrecognized.
 */
export function evaluate(
  entry: GuidelineEntry,
  proposed_treatment: string,
  synonyms?: SynonymTable | null
): AlignmentVerdict {
  const resolved = resolveTreatmentName(proposed_treatment, recognizedTreatments(entry), synonyms);
  const base = {
    normalized_treatment: resolved.normalized,
    matched_treatment: resolved.canonical,
    synonym_applied: resolved.synonym_applied,
  };

  if (resolved.canonical === null) {
    return { ...base, alignment: 'NotAligned', recognized: false, rank: null };
  }

  const rank_index = entry.recommended_treatments.indexOf(resolved.canonical);
  if (rank_index === 0) {
    return { ...base, alignment: 'Aligned', recognized: true, rank: 1 };
  }
  if (rank_index > 0) {
    return { ...base, alignment: 'PartiallyAligned', recognized: true, rank: rank_index + 1 };
  }

  return { ...base, alignment: 'NotAligned', recognized: true, rank: null };
}

