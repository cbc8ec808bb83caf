/**
 * Knowledge base loading: parse, validate, freeze, then hand out a snapshot.
 * A document that fails any check never becomes a snapshot.
 */

import { extname } from 'path';
import { KnowledgeBaseDocumentSchema, type KnowledgeBaseDocument } from './schemas.js';
import { KnowledgeBase, type KnowledgeBaseHolder } from './knowledgeBase.js';
import { GuidelineStore } from './store.js';
import { SQLITE_EXTENSIONS } from '../config/defaults.js';
import { MalformedKnowledgeBaseError } from '../domain/errors.js';
import { canonicalStage } from '../domain/stages.js';
import type { CancerType, GuidelineEntry, GuidelineSource } from '../domain/types.js';
import { throwIfInvalid, validateKnowledgeBaseDocument } from '../pipeline/validation.js';
import { deepFreeze } from '../utils/freeze.js';
import { hashObject } from '../utils/hash.js';
import { fileExists, readJson } from '../utils/io.js';
import { createLogger } from '../utils/log.js';

const logger = createLogger('kb-loader');

/**
 * Schema-check a raw document. Shape errors are reported as knowledge base
 * violations, the same as integrity errors.
 */
export function parseKnowledgeBaseDocument(raw: unknown, origin: string): KnowledgeBaseDocument {
  const parsed = KnowledgeBaseDocumentSchema.safeParse(raw);
  if (!parsed.success) {
    throw new MalformedKnowledgeBaseError(
      origin,
      parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }
  return parsed.data;
}

export function buildKnowledgeBase(raw: unknown, origin: string): KnowledgeBase {
  const document = parseKnowledgeBaseDocument(raw, origin);
  throwIfInvalid(validateKnowledgeBaseDocument(document), origin);

  const entries: GuidelineEntry[] = document.entries.map((entry) => {
    const stage = canonicalStage(entry.cancer_type, entry.stage);
    if (stage === null) {
      throw new MalformedKnowledgeBaseError(origin, [
        `${entry.cancer_type} ${entry.stage}: stage outside scheme`,
      ]);
    }
    return { ...entry, stage };
  });

  const sources = new Map<CancerType, GuidelineSource>(
    document.sources.map((s) => [s.cancer_type, { name: s.name, url: s.url }])
  );

  const version = hashObject(document).substring(0, 12);
  const references = deepFreeze(document.references.map((r) => ({ id: r.id, name: r.name, url: r.url })));
  const kb = new KnowledgeBase(deepFreeze(entries), sources, references, version, origin);

  logger.info({ origin, version, entries: kb.size }, 'Knowledge base loaded');
  return kb;
}

export function isSqlitePath(file_path: string): boolean {
  return SQLITE_EXTENSIONS.includes(extname(file_path).toLowerCase());
}

export async function readKnowledgeBaseSource(file_path: string): Promise<unknown> {
  if (!(await fileExists(file_path))) {
    throw new Error(`Knowledge base not found: ${file_path}`);
  }
  if (isSqlitePath(file_path)) {
    const store = GuidelineStore.openReadOnly(file_path);
    try {
      return store.readDocument();
    } finally {
      store.close();
    }
  }
  return readJson(file_path);
}

/**
 * Load a snapshot from a JSON document or a SQLite store, chosen by extension.
 */
export async function loadKnowledgeBase(file_path: string): Promise<KnowledgeBase> {
  logger.info({ file_path }, 'Loading knowledge base');
  return buildKnowledgeBase(await readKnowledgeBaseSource(file_path), file_path);
}

/**
 * Build a new snapshot and swap it in. On failure the served snapshot is untouched.
 */
export async function reloadKnowledgeBase(
  holder: KnowledgeBaseHolder,
  file_path: string
): Promise<KnowledgeBase> {
  try {
    const next = await loadKnowledgeBase(file_path);
    holder.swap(next);
    return next;
  } catch (error) {
    logger.error(
      { file_path, version: holder.current().version, error },
      'Knowledge base reload failed; keeping current snapshot'
    );
    throw error;
  }
}
