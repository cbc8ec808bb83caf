#!/usr/bin/env node

/**
 * CLI entry point for guideline consultations
 */

import { Command } from 'commander';
import { config } from 'dotenv';
import { resolve } from 'path';
import { loadRuntimeConfig } from '../config/env.js';
import { KNOWLEDGE_BASE_DEFAULTS } from '../config/defaults.js';
import { isRecoverableError } from '../domain/errors.js';
import { parseCancerType } from '../domain/stages.js';
import type { ConsultationOutcome, ConsultationRequest } from '../domain/types.js';
import type { KnowledgeBase } from '../knowledge/knowledgeBase.js';
import {
  loadKnowledgeBase,
  parseKnowledgeBaseDocument,
  readKnowledgeBaseSource,
  buildKnowledgeBase,
} from '../knowledge/loader.js';
import { GuidelineStore } from '../knowledge/store.js';
import { loadSynonymTable, type SynonymTable } from '../knowledge/synonyms.js';
import { parseIntake } from '../pipeline/intake.js';
import { consult } from '../pipeline/run.js';
import { exportResult, printReport } from '../pipeline/export.js';
import { fileExists, readJson } from '../utils/io.js';
import { createLogger } from '../utils/log.js';

// Load .env file
config();

const logger = createLogger('cli');
const program = new Command();

interface KbOption {
  kb?: string;
}

interface ConsultOptions extends KbOption {
  cancerType?: string;
  stage?: string;
  treatment: string;
  symptoms?: string[];
  describe?: string;
  json?: boolean;
  exact?: boolean;
}

interface ExportOptions extends ConsultOptions {
  format: string;
  output?: string;
}

async function openKnowledgeBase(options: KbOption): Promise<KnowledgeBase> {
  const kb_path = options.kb ? resolve(process.cwd(), options.kb) : loadRuntimeConfig().kb_path;
  if (!(await fileExists(kb_path))) {
    throw new Error(`Knowledge base not found: ${kb_path}`);
  }
  return loadKnowledgeBase(kb_path);
}

async function openSynonyms(exact: boolean | undefined): Promise<SynonymTable | null> {
  if (exact) return null;
  const synonyms_path = loadRuntimeConfig().synonyms_path;
  if (synonyms_path === null || !(await fileExists(synonyms_path))) return null;
  return loadSynonymTable(synonyms_path);
}

/**
 * Explicit --cancer-type/--stage win over whatever --describe text yields.
 */
function buildRequest(options: ConsultOptions): ConsultationRequest {
  const parsed = options.describe ? parseIntake(options.describe) : null;
  return {
    cancerType: options.cancerType ?? parsed?.cancerType ?? '',
    stage: options.stage ?? parsed?.stage ?? '',
    proposedTreatment: options.treatment,
    symptoms: options.symptoms,
  };
}

async function runConsultCommand(options: ConsultOptions): Promise<ConsultationOutcome> {
  const kb = await openKnowledgeBase(options);
  const synonyms = await openSynonyms(options.exact);
  return consult(kb, buildRequest(options), { synonyms });
}

function fail(error: unknown, context: string): never {
  if (isRecoverableError(error)) {
    console.error(`\n✗ ${error.message}\n`);
  } else {
    logger.error({ error }, `${context} failed`);
    console.error(`\n✗ ${context} failed: ${error instanceof Error ? error.message : String(error)}\n`);
  }
  process.exit(1);
}

function reportUnknownCombination(outcome: ConsultationOutcome, as_json: boolean | undefined): void {
  if (outcome.status !== 'unknown_combination') return;
  if (as_json) {
    console.log(JSON.stringify(outcome, null, 2));
  } else {
    console.error(`\n✗ Not currently supported: ${outcome.message}\n`);
  }
  process.exitCode = 1;
}

program
  .name('guideline-check')
  .description('Check proposed cancer treatments against oncology guideline entries')
  .version('1.0.0');

// Consult command
program
  .command('consult')
  .description('Evaluate a proposed treatment for a cancer type and stage')
  .option('--cancer-type <type>', 'Breast, Lung/NSCLC, Colorectal or Prostate')
  .option('--stage <stage>', 'Stage token, e.g. "II" or "LowRisk"')
  .requiredOption('--treatment <name>', 'Proposed treatment')
  .option('--symptoms <symptom...>', 'Reported symptoms (informational)')
  .option('--describe <text>', 'Free-text diagnosis to take cancer type and stage from')
  .option('--exact', 'Disable synonym resolution')
  .option('--json', 'Print the result as JSON')
  .option('--kb <path>', 'Knowledge base file (.json or SQLite)')
  .action(async (options: ConsultOptions) => {
    try {
      const outcome = await runConsultCommand(options);
      if (outcome.status === 'completed') {
        if (options.json) {
          console.log(JSON.stringify(outcome.result, null, 2));
        } else {
          printReport(outcome.result);
        }
        return;
      }
      reportUnknownCombination(outcome, options.json);
    } catch (error) {
      fail(error, 'Consultation');
    }
  });

// Export command
program
  .command('export')
  .description('Evaluate a consultation and export the result to a file')
  .option('--cancer-type <type>', 'Breast, Lung/NSCLC, Colorectal or Prostate')
  .option('--stage <stage>', 'Stage token')
  .requiredOption('--treatment <name>', 'Proposed treatment')
  .option('--symptoms <symptom...>', 'Reported symptoms (informational)')
  .option('--describe <text>', 'Free-text diagnosis to take cancer type and stage from')
  .option('--exact', 'Disable synonym resolution')
  .option('--format <format>', 'Output format: csv or json', 'json')
  .option('--output <file>', 'Output file (default: out/consultation_<id>.<format>)')
  .option('--kb <path>', 'Knowledge base file (.json or SQLite)')
  .action(async (options: ExportOptions) => {
    try {
      const format = options.format;
      if (format !== 'csv' && format !== 'json') {
        console.error('\n✗ Invalid format. Use "csv" or "json"\n');
        process.exit(1);
      }

      const outcome = await runConsultCommand(options);
      if (outcome.status === 'completed') {
        const output_path = await exportResult(outcome.result, format, options.output);
        console.log(`\nExported to: ${output_path}\n`);
        return;
      }
      reportUnknownCombination(outcome, false);
    } catch (error) {
      fail(error, 'Export');
    }
  });

// Validate command
program
  .command('validate-kb')
  .description('Load and validate a knowledge base without serving it')
  .option('--kb <path>', 'Knowledge base file (.json or SQLite)')
  .action(async (options: KbOption) => {
    try {
      const kb = await openKnowledgeBase(options);
      console.log(`\n✓ Knowledge base is valid`);
      console.log(`  Source: ${kb.origin}`);
      console.log(`  Version: ${kb.version}`);
      console.log(`  Entries: ${kb.size}`);
      for (const cancer_type of kb.cancerTypes()) {
        const count = kb.entries().filter((e) => e.cancer_type === cancer_type).length;
        console.log(`    ${cancer_type}: ${count}`);
      }
      console.log();
    } catch (error) {
      fail(error, 'Validation');
    }
  });

// Stages command
program
  .command('stages')
  .description('List curated stages for a cancer type')
  .requiredOption('--cancer-type <type>', 'Breast, Lung/NSCLC, Colorectal or Prostate')
  .option('--kb <path>', 'Knowledge base file (.json or SQLite)')
  .action(async (options: KbOption & { cancerType: string }) => {
    try {
      const cancer_type = parseCancerType(options.cancerType);
      if (cancer_type === null) {
        console.error(`\n✗ Unsupported cancer type "${options.cancerType}"\n`);
        process.exit(1);
      }
      const kb = await openKnowledgeBase(options);
      const source = kb.sourceFor(cancer_type);
      console.log(`\n${cancer_type} (${source.name}):`);
      for (const stage of kb.stagesFor(cancer_type)) {
        const entry = kb.lookup(cancer_type, stage);
        console.log(`  ${stage}: ${entry.recommended_treatments.join(', ')}`);
      }
      console.log();
    } catch (error) {
      fail(error, 'Stages');
    }
  });

// Import into SQLite
program
  .command('kb-import')
  .description('Validate a JSON knowledge base and import it into a SQLite guideline store')
  .option('--db <file>', 'SQLite database file', KNOWLEDGE_BASE_DEFAULTS.DB_PATH)
  .option('--kb <path>', 'Source JSON knowledge base')
  .action(async (options: KbOption & { db: string }) => {
    try {
      const kb_path = options.kb ? resolve(process.cwd(), options.kb) : loadRuntimeConfig().kb_path;
      const raw = await readJson(kb_path);
      // Refuse to store anything that would not load
      buildKnowledgeBase(raw, kb_path);
      const document = parseKnowledgeBaseDocument(raw, kb_path);

      const store = new GuidelineStore(resolve(process.cwd(), options.db));
      try {
        const summary = store.importDocument(document);
        console.log(
          `\n✓ Imported ${summary.entries} entries, ${summary.sources} sources and ${summary.references} references into ${options.db}\n`
        );
      } finally {
        store.close();
      }
    } catch (error) {
      fail(error, 'Import');
    }
  });

// SQLite store stats
program
  .command('kb-stats')
  .description('Show guideline store statistics')
  .option('--db <file>', 'SQLite database file', KNOWLEDGE_BASE_DEFAULTS.DB_PATH)
  .action(async (options: { db: string }) => {
    try {
      const db_path = resolve(process.cwd(), options.db);
      if (!(await fileExists(db_path))) {
        throw new Error(`Guideline store not found: ${db_path}`);
      }
      const store = GuidelineStore.openReadOnly(db_path);
      try {
        const stats = store.stats();
        console.log('\nGuideline store statistics:');
        console.log(`  Total entries: ${stats.total_entries}`);
        console.log('\nBy cancer type:');
        for (const [cancer_type, count] of Object.entries(stats.by_cancer_type)) {
          console.log(`  ${cancer_type}: ${count}`);
        }
        console.log();
        // Readback goes through the same validation the server applies
        buildKnowledgeBase(await readKnowledgeBaseSource(db_path), db_path);
        console.log('✓ Stored knowledge base passes validation\n');
      } finally {
        store.close();
      }
    } catch (error) {
      fail(error, 'Store stats');
    }
  });

// Parse command line arguments
program.parseAsync().catch((error: unknown) => fail(error, 'Command'));
