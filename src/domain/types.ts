/**
 * Core domain types for the guideline consultation engine
 */

export type CancerType = 'Breast' | 'Lung/NSCLC' | 'Colorectal' | 'Prostate';

export type TnmStage = '0' | 'I' | 'II' | 'III' | 'IV';
export type ProstateStage = 'LowRisk' | 'IntermediateRisk' | 'HighRisk' | 'Metastatic';
export type Stage = TnmStage | ProstateStage;

export type Alignment = 'Aligned' | 'PartiallyAligned' | 'NotAligned' | 'UnknownCombination';

/** Alignments the matcher can produce; UnknownCombination only exists at the outcome level */
export type VerdictAlignment = Exclude<Alignment, 'UnknownCombination'>;

export interface ConsultationRequest {
  cancerType: string;
  stage: string;
  proposedTreatment: string;
  symptoms?: string[];
}

export interface MoneyRange {
  readonly min: number;
  readonly max: number;
}

export interface CostEstimate {
  readonly inr: MoneyRange;
  readonly usd: MoneyRange;
  readonly basis: 'course' | 'per_year';
}

export type SurvivalStats =
  | {
      readonly kind: 'rate';
      readonly horizon_years: number;
      readonly low_pct: number;
      readonly high_pct: number;
    }
  | {
      readonly kind: 'median';
      readonly low_months: number;
      readonly high_months: number;
    };

export interface GuidelineSource {
  readonly name: string;
  readonly url: string;
}

/** Guideline body consulted across every cancer type (NCCN, ASCO, ...) */
export interface GuidelineReference {
  readonly id: string;
  readonly name: string;
  readonly url: string;
}

export interface GuidelineEntry {
  readonly cancer_type: CancerType;
  readonly stage: Stage;
  readonly standard_treatment: string;
  readonly standard_treatment_plain: string;
  /** Guideline preference order, most preferred first */
  readonly recommended_treatments: readonly string[];
  /** Treatments the entry knows about but does not recommend */
  readonly other_treatments: readonly string[];
  readonly required_biomarkers: readonly string[];
  readonly survival_stats: SurvivalStats;
  readonly risk_profile: Readonly<Record<string, readonly string[]>>;
  readonly cost_estimate: Readonly<Record<string, CostEstimate>>;
  readonly alternative_treatments: Readonly<Record<string, readonly string[]>>;
  /** Patient subgroup or condition -> adjuvant therapy for it */
  readonly adjuvant_therapy: Readonly<Record<string, string>>;
  readonly chemotherapy_regimens: readonly string[];
  readonly recovery_time: string | null;
  readonly evidence_level: string | null;
  readonly contraindications: readonly string[];
  readonly notes: string | null;
}

export interface AlignmentVerdict {
  readonly alignment: VerdictAlignment;
  /** False when the entry has no data about the treatment at all */
  readonly recognized: boolean;
  readonly normalized_treatment: string;
  readonly matched_treatment: string | null;
  /** 1-based position in recommended_treatments */
  readonly rank: number | null;
  readonly synonym_applied: boolean;
}

export interface ResolvedGuidance {
  readonly risks: readonly string[];
  readonly alternatives: readonly string[];
  readonly required_tests: readonly string[];
}

export interface ConsultationResult {
  readonly consultation_id: string;
  readonly knowledge_base_version: string;
  readonly cancer_type: CancerType;
  readonly cancer_type_label: string;
  readonly stage: Stage;
  readonly stage_label: string;
  readonly stage_description: string;
  readonly proposed_treatment: string;
  readonly normalized_treatment: string;
  readonly matched_treatment: string | null;
  readonly synonym_applied: boolean;
  readonly alignment: VerdictAlignment;
  readonly treatment_recognized: boolean;
  readonly guideline_rank: number | null;
  readonly alignment_summary: string;
  readonly combination_flagged: boolean;
  readonly matched_guideline_treatments: readonly string[];
  readonly required_tests: readonly string[];
  readonly risks: readonly string[];
  readonly alternatives: readonly string[];
  readonly cost_estimate: CostEstimate | null;
  readonly survival_stats: SurvivalStats;
  readonly adjuvant_therapy: Readonly<Record<string, string>>;
  readonly chemotherapy_regimens: readonly string[];
  readonly standard_treatment: string;
  readonly standard_treatment_plain: string;
  readonly recovery_time: string | null;
  readonly evidence_level: string | null;
  readonly evidence_explanation: string;
  readonly contraindications: readonly string[];
  readonly notes: string | null;
  readonly guideline_source: GuidelineSource;
  readonly official_guidelines: readonly GuidelineReference[];
  readonly reported_symptoms: readonly string[];
}

export type ConsultationOutcome =
  | {
      status: 'completed';
      result: ConsultationResult;
    }
  | {
      status: 'unknown_combination';
      alignment: 'UnknownCombination';
      cancer_type: string;
      stage: string;
      reason: UnknownCombinationReason;
      message: string;
    };

export type UnknownCombinationReason = 'stage_outside_scheme' | 'no_curated_entry';
