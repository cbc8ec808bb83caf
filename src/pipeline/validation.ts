/**
 * Validation helpers for knowledge base integrity and consultation requests
 */

import { canonicalStage, parseCancerType } from '../domain/stages.js';
import { InvalidInputError, MalformedKnowledgeBaseError } from '../domain/errors.js';
import { entryKey } from '../domain/ids.js';
import { treatmentUniverse } from '../knowledge/universe.js';
import type {
  GuidelineEntryDocument,
  KnowledgeBaseDocument,
} from '../knowledge/schemas.js';
import type { CancerType, ConsultationRequest } from '../domain/types.js';
import { normalizeTreatmentName } from './normalize.js';
import { createLogger } from '../utils/log.js';

const logger = createLogger('validation');

export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

function emptyResult(): ValidationResult {
  return { valid: true, errors: [], warnings: [] };
}

function fail(result: ValidationResult, message: string): void {
  result.valid = false;
  result.errors.push(message);
}

/**
 * Validate that a numeric range is ordered and non-negative
 */
export function validateRange(
  min: number,
  max: number,
  name: string,
  upper_bound?: number
): ValidationResult {
  const result = emptyResult();

  if (!Number.isFinite(min) || !Number.isFinite(max)) {
    fail(result, `${name} must be finite numbers, got: ${min}-${max}`);
    return result;
  }
  if (min < 0) {
    fail(result, `${name} cannot be negative: ${min}`);
  }
  if (min > max) {
    fail(result, `${name} minimum ${min} exceeds maximum ${max}`);
  }
  if (upper_bound !== undefined && max > upper_bound) {
    fail(result, `${name} cannot exceed ${upper_bound}: ${max}`);
  }

  return result;
}

/**
 * Validate one entry against its stage scheme and the closed-world rule: every
 * treatment referenced by risk_profile, cost_estimate or alternative_treatments
 * must be in the entry's treatment universe.
 */
export function validateEntryIntegrity(entry: GuidelineEntryDocument): ValidationResult {
  const result = emptyResult();
  const label = `${entry.cancer_type} ${entry.stage}`;

  if (canonicalStage(entry.cancer_type, entry.stage) === null) {
    fail(result, `${label}: stage "${entry.stage}" is not in the ${entry.cancer_type} staging scheme`);
  }

  const universe = treatmentUniverse(entry);
  const known = new Set(universe);

  const seen_normalized = new Map<string, string>();
  for (const treatment of [...entry.recommended_treatments, ...entry.other_treatments]) {
    const normalized = normalizeTreatmentName(treatment);
    const previous = seen_normalized.get(normalized);
    if (previous !== undefined) {
      fail(result, `${label}: treatment "${treatment}" duplicates "${previous}"`);
    } else {
      seen_normalized.set(normalized, treatment);
    }
  }

  for (const treatment of Object.keys(entry.risk_profile)) {
    if (!known.has(treatment)) {
      fail(result, `${label}: risk_profile references unknown treatment "${treatment}"`);
    }
  }

  for (const [treatment, cost] of Object.entries(entry.cost_estimate)) {
    if (!known.has(treatment)) {
      fail(result, `${label}: cost_estimate references unknown treatment "${treatment}"`);
    }
    for (const currency of ['inr', 'usd'] as const) {
      const range = validateRange(
        cost[currency].min,
        cost[currency].max,
        `${label}: cost_estimate["${treatment}"].${currency}`
      );
      result.errors.push(...range.errors);
      result.valid = result.valid && range.valid;
    }
  }

  for (const [treatment, alternatives] of Object.entries(entry.alternative_treatments)) {
    if (!known.has(treatment)) {
      fail(result, `${label}: alternative_treatments references unknown treatment "${treatment}"`);
    }
    for (const alternative of alternatives) {
      if (!known.has(alternative)) {
        fail(
          result,
          `${label}: alternative "${alternative}" for "${treatment}" is not a known treatment`
        );
      }
      if (alternative === treatment) {
        fail(result, `${label}: "${treatment}" lists itself as an alternative`);
      }
    }
  }

  const survival = entry.survival_stats;
  const survival_range =
    survival.kind === 'rate'
      ? validateRange(survival.low_pct, survival.high_pct, `${label}: survival_stats`, 100)
      : validateRange(survival.low_months, survival.high_months, `${label}: survival_stats`);
  result.errors.push(...survival_range.errors);
  result.valid = result.valid && survival_range.valid;

  if (new Set(entry.required_biomarkers).size !== entry.required_biomarkers.length) {
    result.warnings.push(`${label}: required_biomarkers contains duplicates`);
  }

  return result;
}

/**
 * Validate a whole document: per-entry integrity, unique (cancer type, stage)
 * pairs, unique reference ids, and a guideline source for every cancer type
 * that has entries.
 */
export function validateKnowledgeBaseDocument(document: KnowledgeBaseDocument): ValidationResult {
  const results: ValidationResult[] = [];
  const pairs = new Set<string>();
  const sourced = new Set<CancerType>();

  for (const source of document.sources) {
    const check = emptyResult();
    if (sourced.has(source.cancer_type)) {
      fail(check, `duplicate guideline source for ${source.cancer_type}`);
    }
    sourced.add(source.cancer_type);
    results.push(check);
  }

  const reference_ids = new Set<string>();
  for (const reference of document.references) {
    const check = emptyResult();
    if (reference_ids.has(reference.id)) {
      fail(check, `duplicate guideline reference "${reference.id}"`);
    }
    reference_ids.add(reference.id);
    results.push(check);
  }

  for (const entry of document.entries) {
    const check = validateEntryIntegrity(entry);
    const stage = canonicalStage(entry.cancer_type, entry.stage);
    if (stage !== null) {
      const key = entryKey(entry.cancer_type, stage);
      if (pairs.has(key)) {
        fail(check, `duplicate entry for ${entry.cancer_type} ${stage}`);
      }
      pairs.add(key);
    }
    if (!sourced.has(entry.cancer_type)) {
      fail(check, `${entry.cancer_type} ${entry.stage}: no guideline source for ${entry.cancer_type}`);
    }
    results.push(check);
  }

  if (document.entries.length === 0) {
    const check = emptyResult();
    fail(check, 'knowledge base has no entries');
    results.push(check);
  }

  return aggregateValidationResults(results);
}

/**
 * Aggregate validation results
 */
export function aggregateValidationResults(results: ValidationResult[]): ValidationResult {
  return {
    valid: results.every((r) => r.valid),
    errors: results.flatMap((r) => r.errors),
    warnings: results.flatMap((r) => r.warnings),
  };
}

/**
 * Throw if knowledge base validation failed
 */
export function throwIfInvalid(result: ValidationResult, origin: string): void {
  if (!result.valid) {
    throw new MalformedKnowledgeBaseError(origin, result.errors);
  }

  for (const warning of result.warnings) {
    logger.warn({ origin }, warning);
  }
}

export interface ValidatedRequest {
  cancer_type: CancerType;
  stage_token: string;
  proposed_treatment: string;
  symptoms: string[];
}

/**
 * Reject requests that cannot reach the matcher. Stage tokens are only checked
 * for presence here; whether they belong to the cancer type's scheme is a
 * combination question answered during lookup.
 */
export function validateConsultationRequest(request: ConsultationRequest): ValidatedRequest {
  if (typeof request.cancerType !== 'string' || request.cancerType.trim() === '') {
    throw new InvalidInputError('cancerType', 'Cancer type is required');
  }
  const cancer_type = parseCancerType(request.cancerType);
  if (cancer_type === null) {
    throw new InvalidInputError(
      'cancerType',
      `Unsupported cancer type "${request.cancerType}". Supported: Breast, Lung/NSCLC, Colorectal, Prostate`
    );
  }

  if (typeof request.stage !== 'string' || request.stage.trim() === '') {
    throw new InvalidInputError('stage', 'Stage is required');
  }

  if (typeof request.proposedTreatment !== 'string' || request.proposedTreatment.trim() === '') {
    throw new InvalidInputError('proposedTreatment', 'Proposed treatment must not be empty');
  }

  const symptoms: string[] = [];
  if (request.symptoms !== undefined) {
    if (!Array.isArray(request.symptoms)) {
      throw new InvalidInputError('symptoms', 'Symptoms must be a list of strings');
    }
    for (const symptom of request.symptoms) {
      if (typeof symptom !== 'string') {
        throw new InvalidInputError('symptoms', 'Symptoms must be a list of strings');
      }
      const trimmed = symptom.trim().replace(/\s+/g, ' ');
      if (trimmed !== '') symptoms.push(trimmed);
    }
  }

  return {
    cancer_type,
    stage_token: request.stage.trim(),
    proposed_treatment: request.proposedTreatment.trim(),
    symptoms,
  };
}
