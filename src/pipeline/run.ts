/**
 * Consultation orchestrator: validation → lookup → matcher → resolver → synthesizer
 */

import { UnknownCombinationError } from '../domain/errors.js';
import { generateConsultationId } from '../domain/ids.js';
import { canonicalStage } from '../domain/stages.js';
import type {
  ConsultationOutcome,
  ConsultationRequest,
  ConsultationResult,
} from '../domain/types.js';
import type { KnowledgeBase } from '../knowledge/knowledgeBase.js';
import type { SynonymTable } from '../knowledge/synonyms.js';
import { createLogger } from '../utils/log.js';
import { evaluate } from './matcher.js';
import { resolve } from './resolver.js';
import { synthesize } from './synthesize.js';
import { validateConsultationRequest } from './validation.js';

const logger = createLogger('consultation');

export interface ConsultationOptions {
  /** Enables synonym resolution; exact matching is used without it */
  synonyms?: SynonymTable | null;
}

/**
 * Evaluate one consultation against a knowledge base snapshot.
 *
 * Throws InvalidInputError for unusable input and UnknownCombinationError when
 * the (cancer type, stage) pair has no entry; both are raised before matching.
 */
export function runConsultation(
  kb: KnowledgeBase,
  request: ConsultationRequest,
  options: ConsultationOptions = {}
): ConsultationResult {
  const validated = validateConsultationRequest(request);

  const stage = canonicalStage(validated.cancer_type, validated.stage_token);
  if (stage === null) {
    throw new UnknownCombinationError(
      validated.cancer_type,
      validated.stage_token,
      'stage_outside_scheme'
    );
  }

  const entry = kb.lookup(validated.cancer_type, stage);
  const verdict = evaluate(entry, validated.proposed_treatment, options.synonyms);
  const guidance = resolve(entry, verdict);

  const result = synthesize({
    consultation_id: generateConsultationId(
      entry.cancer_type,
      entry.stage,
      verdict.normalized_treatment,
      validated.symptoms,
      kb.version
    ),
    knowledge_base_version: kb.version,
    entry,
    source: kb.sourceFor(entry.cancer_type),
    references: kb.references,
    verdict,
    guidance,
    proposed_treatment: validated.proposed_treatment,
    reported_symptoms: validated.symptoms,
  });

  logger.info(
    {
      consultation_id: result.consultation_id,
      cancer_type: result.cancer_type,
      stage: result.stage,
      alignment: result.alignment,
      recognized: result.treatment_recognized,
    },
    'Consultation evaluated'
  );

  return result;
}

/**
 * Same as runConsultation, with UnknownCombinationError turned into an outcome
 * record for surfaces that report it rather than fail. Every other error propagates.
 */
export function consult(
  kb: KnowledgeBase,
  request: ConsultationRequest,
  options: ConsultationOptions = {}
): ConsultationOutcome {
  try {
    return { status: 'completed', result: runConsultation(kb, request, options) };
  } catch (error) {
    if (error instanceof UnknownCombinationError) {
      logger.info(
        { cancer_type: error.cancerType, stage: error.stage, reason: error.reason },
        'Unknown cancer type / stage combination'
      );
      return {
        status: 'unknown_combination',
        alignment: 'UnknownCombination',
        cancer_type: error.cancerType,
        stage: error.stage,
        reason: error.reason,
        message: error.message,
      };
    }
    throw error;
  }
}
