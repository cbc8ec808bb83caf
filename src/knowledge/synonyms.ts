/**
 * Optional synonym table mapping alternate treatment names (brand names,
 * abbreviations, lay terms) to the canonical names used in guideline entries.
 */

import { SynonymDocumentSchema } from './schemas.js';
import { MalformedKnowledgeBaseError } from '../domain/errors.js';
import { normalizeTreatmentName } from '../pipeline/normalize.js';
import { readJson } from '../utils/io.js';
import { createLogger } from '../utils/log.js';

const logger = createLogger('synonyms');

/** normalized alias -> normalized candidate canonical names, in preference order */
export type SynonymTable = ReadonlyMap<string, readonly string[]>;

export type SynonymTargets = string | readonly string[];

/**
 * Aliases that normalize to the same key are rejected; the table would
 * otherwise keep whichever came last.
 */
export function buildSynonymTable(
  synonyms: Readonly<Record<string, SynonymTargets>>,
  origin = 'synonym table'
): SynonymTable {
  const table = new Map<string, readonly string[]>();
  const alias_of = new Map<string, string>();
  const violations: string[] = [];

  for (const [alias, targets] of Object.entries(synonyms)) {
    const key = normalizeTreatmentName(alias);
    const previous = alias_of.get(key);
    if (previous !== undefined) {
      violations.push(`alias "${alias}" duplicates "${previous}"`);
      continue;
    }
    alias_of.set(key, alias);
    const candidates = typeof targets === 'string' ? [targets] : targets;
    table.set(key, candidates.map(normalizeTreatmentName));
  }

  if (violations.length > 0) {
    throw new MalformedKnowledgeBaseError(origin, violations);
  }
  return table;
}

export function parseSynonymDocument(raw: unknown, origin: string): SynonymTable {
  const parsed = SynonymDocumentSchema.safeParse(raw);
  if (!parsed.success) {
    throw new MalformedKnowledgeBaseError(
      origin,
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  return buildSynonymTable(parsed.data.synonyms, origin);
}

export async function loadSynonymTable(file_path: string): Promise<SynonymTable> {
  const table = parseSynonymDocument(await readJson(file_path), file_path);
  logger.info({ file_path, synonyms: table.size }, 'Synonym table loaded');
  return table;
}
