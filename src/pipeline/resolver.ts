/**
 * Risk & alternative resolver
 */

import { ownEntry } from '../knowledge/universe.js';
import type { AlignmentVerdict, GuidelineEntry, ResolvedGuidance } from '../domain/types.js';

/**
 * Risks and alternatives come from the entry only, keyed by the matched
 * treatment; an unmatched treatment gets none. Biomarker requirements belong
 * to the stage, so they are returned for every verdict.
 */
export function resolve(entry: GuidelineEntry, verdict: AlignmentVerdict): ResolvedGuidance {
  const treatment = verdict.matched_treatment;

  const risks = treatment === null ? [] : (ownEntry(entry.risk_profile, treatment) ?? []);
  const alternatives =
    treatment === null ? [] : (ownEntry(entry.alternative_treatments, treatment) ?? []);

  return {
    risks,
    alternatives,
    required_tests: entry.required_biomarkers,
  };
}
