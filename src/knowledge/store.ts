/**
 * SQLite-backed guideline store. Holds one row per guideline entry, one per
 * guideline source and one per cross-cancer reference; the loader reads it back as a raw document and validates
 * it like any other source.
 */

import Database from 'better-sqlite3';
import { join } from 'path';
import { KNOWLEDGE_BASE_DEFAULTS } from '../config/defaults.js';
import type { KnowledgeBaseDocument } from './schemas.js';
import { createLogger } from '../utils/log.js';

const logger = createLogger('guideline-store');

interface EntryRow {
  cancer_type: string;
  stage: string;
  entry_json: string;
}

interface SourceRow {
  cancer_type: string;
  name: string;
  url: string;
}

interface ReferenceRow {
  id: string;
  name: string;
  url: string;
}

export interface RawKnowledgeBaseDocument {
  sources: SourceRow[];
  references: ReferenceRow[];
  entries: unknown[];
}

export interface ImportSummary {
  sources: number;
  references: number;
  entries: number;
}

export interface GuidelineStoreOptions {
  /** Open an existing database without creating or altering it */
  readonly?: boolean;
}

export class GuidelineStore {
  private db: Database.Database;

  constructor(
    db_path: string = join(process.cwd(), KNOWLEDGE_BASE_DEFAULTS.DB_PATH),
    options: GuidelineStoreOptions = {}
  ) {
    if (options.readonly) {
      this.db = new Database(db_path, { readonly: true, fileMustExist: true });
    } else {
      this.db = new Database(db_path);
      this.initializeTables();
    }
  }

  /**
   * Open for reading only. Fails when the file does not exist rather than
   * creating an empty store.
   */
  public static openReadOnly(db_path: string): GuidelineStore {
    return new GuidelineStore(db_path, { readonly: true });
  }

  private initializeTables(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS guideline_sources (
        cancer_type TEXT PRIMARY KEY,
        name TEXT NOT NULL,
        url TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS guideline_references (
        id TEXT PRIMARY KEY,
        name TEXT NOT NULL,
        url TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS guideline_entries (
        position INTEGER PRIMARY KEY,
        cancer_type TEXT NOT NULL,
        stage TEXT NOT NULL,
        entry_json TEXT NOT NULL,
        imported_at TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_entry_pair ON guideline_entries(cancer_type, stage);
    `);
    logger.debug('Guideline store tables initialized');
  }

  /**
   * Replace the stored knowledge base with a document, in one transaction.
   */
  public importDocument(document: KnowledgeBaseDocument): ImportSummary {
    const insert_source = this.db.prepare<[string, string, string]>(
      'INSERT INTO guideline_sources (cancer_type, name, url) VALUES (?, ?, ?)'
    );
    const insert_reference = this.db.prepare<[string, string, string]>(
      'INSERT INTO guideline_references (id, name, url) VALUES (?, ?, ?)'
    );
    const insert_entry = this.db.prepare<[number, string, string, string, string]>(`
      INSERT INTO guideline_entries (position, cancer_type, stage, entry_json, imported_at)
      VALUES (?, ?, ?, ?, ?)
    `);

    const imported_at = new Date().toISOString();
    const run = this.db.transaction((doc: KnowledgeBaseDocument) => {
      this.db.exec(
        'DELETE FROM guideline_entries; DELETE FROM guideline_sources; DELETE FROM guideline_references;'
      );
      for (const source of doc.sources) {
        insert_source.run(source.cancer_type, source.name, source.url);
      }
      for (const reference of doc.references) {
        insert_reference.run(reference.id, reference.name, reference.url);
      }
      doc.entries.forEach((entry, index) => {
        insert_entry.run(index, entry.cancer_type, entry.stage, JSON.stringify(entry), imported_at);
      });
    });
    run(document);

    const summary = {
      sources: document.sources.length,
      references: document.references.length,
      entries: document.entries.length,
    };
    logger.info(summary, 'Knowledge base imported into guideline store');
    return summary;
  }

  public readDocument(): RawKnowledgeBaseDocument {
    const sources = this.db
      .prepare<[], SourceRow>('SELECT cancer_type, name, url FROM guideline_sources ORDER BY rowid')
      .all();
    const references = this.db
      .prepare<[], ReferenceRow>('SELECT id, name, url FROM guideline_references ORDER BY rowid')
      .all();
    const rows = this.db
      .prepare<[], EntryRow>(
        'SELECT cancer_type, stage, entry_json FROM guideline_entries ORDER BY position'
      )
      .all();

    const entries = rows.map((row): unknown => JSON.parse(row.entry_json));
    return { sources, references, entries };
  }

  public stats(): { total_entries: number; by_cancer_type: Record<string, number> } {
    const total = this.db
      .prepare<[], { count: number }>('SELECT COUNT(*) as count FROM guideline_entries')
      .get();

    const by_type_rows = this.db
      .prepare<[], { cancer_type: string; count: number }>(
        'SELECT cancer_type, COUNT(*) as count FROM guideline_entries GROUP BY cancer_type ORDER BY cancer_type'
      )
      .all();

    const by_cancer_type: Record<string, number> = {};
    for (const row of by_type_rows) {
      by_cancer_type[row.cancer_type] = row.count;
    }

    return {
      total_entries: total?.count ?? 0,
      by_cancer_type,
    };
  }

  public close(): void {
    this.db.close();
  }
}
