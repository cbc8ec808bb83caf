/**
 * Immutable knowledge base snapshot and the holder that swaps snapshots on reload.
 *
 * Snapshots are only built by the loader, after the whole document has passed
 * validation; nothing in a snapshot changes after construction.
 */

import { UnknownCombinationError } from '../domain/errors.js';
import { entryKey } from '../domain/ids.js';
import { CANCER_TYPES, STAGE_SCHEMES } from '../domain/stages.js';
import type {
  CancerType,
  GuidelineEntry,
  GuidelineReference,
  GuidelineSource,
  Stage,
} from '../domain/types.js';
import { createLogger } from '../utils/log.js';

const logger = createLogger('knowledge-base');

export class KnowledgeBase {
  private readonly by_key: ReadonlyMap<string, GuidelineEntry>;

  constructor(
    private readonly all_entries: readonly GuidelineEntry[],
    private readonly sources: ReadonlyMap<CancerType, GuidelineSource>,
    /** Guideline bodies cited on every result, whatever the cancer type */
    readonly references: readonly GuidelineReference[],
    readonly version: string,
    readonly origin: string
  ) {
    this.by_key = new Map(all_entries.map((e) => [entryKey(e.cancer_type, e.stage), e]));
    Object.freeze(this);
  }

  public lookup(cancer_type: CancerType, stage: Stage): GuidelineEntry {
    const entry = this.by_key.get(entryKey(cancer_type, stage));
    if (!entry) {
      throw new UnknownCombinationError(cancer_type, stage, 'no_curated_entry');
    }
    return entry;
  }

  public has(cancer_type: CancerType, stage: Stage): boolean {
    return this.by_key.has(entryKey(cancer_type, stage));
  }

  public sourceFor(cancer_type: CancerType): GuidelineSource {
    const source = this.sources.get(cancer_type);
    if (!source) {
      // The loader rejects documents with entries but no source
      throw new Error(`No guideline source recorded for ${cancer_type}`);
    }
    return source;
  }

  /** Curated stages in staging-scheme order */
  public stagesFor(cancer_type: CancerType): Stage[] {
    return STAGE_SCHEMES[cancer_type].filter((stage) => this.has(cancer_type, stage));
  }

  public cancerTypes(): CancerType[] {
    return CANCER_TYPES.filter((t) => this.stagesFor(t).length > 0);
  }

  public entries(): readonly GuidelineEntry[] {
    return this.all_entries;
  }

  public get size(): number {
    return this.all_entries.length;
  }
}

/**
 * Holds the snapshot currently served. Callers take `current()` once per
 * consultation and use that snapshot throughout.
 */
export class KnowledgeBaseHolder {
  private snapshot: KnowledgeBase;

  constructor(initial: KnowledgeBase) {
    this.snapshot = initial;
  }

  public current(): KnowledgeBase {
    return this.snapshot;
  }

  public swap(next: KnowledgeBase): KnowledgeBase {
    const previous = this.snapshot;
    this.snapshot = next;
    logger.info(
      { previous_version: previous.version, version: next.version, entries: next.size },
      'Knowledge base snapshot swapped'
    );
    return previous;
  }
}
