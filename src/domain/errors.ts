/**
 * Error taxonomy for the consultation engine.
 *
 * UnknownCombinationError and InvalidInputError are recoverable and expected to be
 * handled by callers; MalformedKnowledgeBaseError is fatal and only raised while a
 * knowledge base snapshot is being built.
 */

import type { UnknownCombinationReason } from './types.js';

export type GuidelineCheckErrorCode =
  | 'UNKNOWN_COMBINATION'
  | 'MALFORMED_KNOWLEDGE_BASE'
  | 'INVALID_INPUT';

export abstract class GuidelineCheckError extends Error {
  abstract readonly code: GuidelineCheckErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class UnknownCombinationError extends GuidelineCheckError {
  readonly code = 'UNKNOWN_COMBINATION';

  constructor(
    readonly cancerType: string,
    readonly stage: string,
    readonly reason: UnknownCombinationReason
  ) {
    super(
      reason === 'stage_outside_scheme'
        ? `Stage "${stage}" is not part of the staging scheme for ${cancerType}`
        : `No guideline entry is currently available for ${cancerType} stage ${stage}`
    );
  }
}

export class MalformedKnowledgeBaseError extends GuidelineCheckError {
  readonly code = 'MALFORMED_KNOWLEDGE_BASE';

  constructor(
    readonly origin: string,
    readonly violations: readonly string[]
  ) {
    super(
      `Knowledge base ${origin} failed validation:\n` +
        violations.map((v) => `  - ${v}`).join('\n')
    );
  }
}

export class InvalidInputError extends GuidelineCheckError {
  readonly code = 'INVALID_INPUT';

  constructor(
    readonly field: string,
    message: string
  ) {
    super(message);
  }
}

export function isRecoverableError(
  error: unknown
): error is UnknownCombinationError | InvalidInputError {
  return error instanceof UnknownCombinationError || error instanceof InvalidInputError;
}
