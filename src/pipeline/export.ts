/**
 * Report rendering and export of consultation results
 */

import { join } from 'path';
import { getOutputDir, writeCsv, writeJson, type CsvValue } from '../utils/io.js';
import { createLogger } from '../utils/log.js';
import type { ConsultationResult, CostEstimate, SurvivalStats } from '../domain/types.js';

const logger = createLogger('export');

const RULE = '='.repeat(80);

export function formatInr(value: number): string {
  return value.toLocaleString('en-IN');
}

export function formatUsd(value: number): string {
  return value.toLocaleString('en-US');
}

export function formatCost(cost: CostEstimate | null): string {
  if (cost === null) return 'Not available';
  const basis = cost.basis === 'per_year' ? 'per year' : 'per course';
  return (
    `INR ${formatInr(cost.inr.min)} - ${formatInr(cost.inr.max)} / ` +
    `USD ${formatUsd(cost.usd.min)} - ${formatUsd(cost.usd.max)} (${basis})`
  );
}

export function formatSurvival(stats: SurvivalStats): string {
  if (stats.kind === 'rate') {
    return `${stats.horizon_years}-year survival: ${stats.low_pct}-${stats.high_pct}%`;
  }
  return `Median survival: ${stats.low_months}-${stats.high_months} months`;
}

function adjuvantLines(adjuvant: Readonly<Record<string, string>>): string[] {
  const pairs = Object.entries(adjuvant);
  if (pairs.length === 0) return ['  (none recorded)'];
  return pairs.map(([condition, therapy]) => `  - ${condition}: ${therapy}`);
}

function listLines(items: readonly string[], empty: string): string[] {
  return items.length === 0 ? [`  ${empty}`] : items.map((item) => `  - ${item}`);
}

export function formatReport(result: ConsultationResult): string {
  const lines: string[] = [
    RULE,
    'GUIDELINE CONSULTATION REPORT',
    RULE,
    `Consultation ID: ${result.consultation_id}`,
    `Knowledge base: ${result.knowledge_base_version}`,
    '',
    `Cancer type: ${result.cancer_type_label}`,
    `Stage: ${result.stage_label} (${result.stage_description})`,
    `Proposed treatment: ${result.proposed_treatment}`,
    `Alignment: ${result.alignment}${result.treatment_recognized ? '' : ' (treatment not recognized)'}`,
    `  ${result.alignment_summary}`,
  ];

  if (result.combination_flagged) {
    lines.push('  Note: combination regimens are matched as a single treatment, not per component.');
  }

  lines.push(
    '',
    `GUIDELINE RECOMMENDATIONS (${result.guideline_source.name}):`,
    ...result.matched_guideline_treatments.map((t, i) => `  ${i + 1}. ${t}`),
    `Standard approach: ${result.standard_treatment}`,
    `In plain language: ${result.standard_treatment_plain}`,
    `Evidence: ${result.evidence_level ?? 'N/A'} - ${result.evidence_explanation}`,
    '',
    'REQUIRED TESTS:',
    ...listLines(result.required_tests, '(none)'),
    'RISKS:',
    ...listLines(result.risks, '(none recorded for this treatment)'),
    'ALTERNATIVES:',
    ...listLines(result.alternatives, '(none recorded)'),
    'ADJUVANT THERAPY:',
    ...adjuvantLines(result.adjuvant_therapy),
    `Chemotherapy regimens: ${result.chemotherapy_regimens.length > 0 ? result.chemotherapy_regimens.join(', ') : 'None recorded'}`,
    '',
    `Estimated cost: ${formatCost(result.cost_estimate)}`,
    formatSurvival(result.survival_stats),
    `Recovery time: ${result.recovery_time ?? 'N/A'}`,
    `Contraindications: ${result.contraindications.length > 0 ? result.contraindications.join('; ') : 'None recorded'}`,
    `Notes: ${result.notes ?? 'None'}`,
    `Reported symptoms: ${result.reported_symptoms.length > 0 ? result.reported_symptoms.join('; ') : 'None'}`,
    `Source: ${result.guideline_source.url}`
  );

  if (result.official_guidelines.length > 0) {
    lines.push('', 'OFFICIAL GUIDELINES:');
    lines.push(...result.official_guidelines.map((r) => `  - ${r.name}: ${r.url}`));
  }

  lines.push(RULE);

  return lines.join('\n');
}

export function printReport(result: ConsultationResult): void {
  console.log('\n' + formatReport(result) + '\n');
}

/**
 * One row per field; lists joined with "; ", absent values left empty.
 */
export function flattenResult(result: ConsultationResult): Array<Record<string, CsvValue>> {
  const rows: Array<Record<string, CsvValue>> = [];
  const add = (field: string, value: CsvValue): void => {
    rows.push({ field, value });
  };

  add('consultation_id', result.consultation_id);
  add('knowledge_base_version', result.knowledge_base_version);
  add('cancer_type', result.cancer_type);
  add('stage', result.stage);
  add('proposed_treatment', result.proposed_treatment);
  add('matched_treatment', result.matched_treatment);
  add('alignment', result.alignment);
  add('treatment_recognized', result.treatment_recognized);
  add('guideline_rank', result.guideline_rank);
  add('combination_flagged', result.combination_flagged);
  add('alignment_summary', result.alignment_summary);
  add('matched_guideline_treatments', result.matched_guideline_treatments.join('; '));
  add('required_tests', result.required_tests.join('; '));
  add('risks', result.risks.join('; '));
  add('alternatives', result.alternatives.join('; '));
  add(
    'adjuvant_therapy',
    Object.entries(result.adjuvant_therapy)
      .map(([condition, therapy]) => `${condition}: ${therapy}`)
      .join('; ')
  );
  add('chemotherapy_regimens', result.chemotherapy_regimens.join('; '));
  add('cost_inr_min', result.cost_estimate?.inr.min ?? null);
  add('cost_inr_max', result.cost_estimate?.inr.max ?? null);
  add('cost_usd_min', result.cost_estimate?.usd.min ?? null);
  add('cost_usd_max', result.cost_estimate?.usd.max ?? null);
  add('cost_basis', result.cost_estimate?.basis ?? null);
  add('survival', formatSurvival(result.survival_stats));
  add('recovery_time', result.recovery_time);
  add('evidence_level', result.evidence_level);
  add('contraindications', result.contraindications.join('; '));
  add('notes', result.notes);
  add('reported_symptoms', result.reported_symptoms.join('; '));
  add('guideline_source', result.guideline_source.name);
  add('official_guidelines', result.official_guidelines.map((r) => r.name).join('; '));

  return rows;
}

export async function exportResult(
  result: ConsultationResult,
  format: 'csv' | 'json',
  output_file?: string,
  exported_at: Date = new Date()
): Promise<string> {
  const output_path =
    output_file ?? join(getOutputDir(), `consultation_${result.consultation_id}.${format}`);

  logger.info({ consultation_id: result.consultation_id, format, output_path }, 'Exporting consultation');

  if (format === 'csv') {
    await writeCsv(output_path, flattenResult(result));
  } else {
    await writeJson(output_path, { exported_at: exported_at.toISOString(), result });
  }

  return output_path;
}
