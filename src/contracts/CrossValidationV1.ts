export type CheckStatus = 'pass' | 'warning' | 'fail';

export type ValidationStatus = CheckStatus | 'unknown';

export type ValidationConfidence = 'high' | 'medium' | 'low';

export interface ValidationCheckV1 {
  /** Stable identifier, e.g. 'primary_turns', 'core_loss_density'. */
  parameter: string;
  ourValue: number;
  referenceValue: number;
  unit: string;
  diffPercent: number;
  status: CheckStatus;
  confidence: ValidationConfidence;
  /** Reference model the value was recomputed from. */
  source: string;
  notes: string;
}

export interface SkippedCheckV1 {
  parameter: string;
  reason: string;
}

export interface CrossValidationReportV1 {
  designKind: 'transformer' | 'inductor';
  designMethod: string;
  checks: ValidationCheckV1[];
  /** Checks that could not run; never weighted into the confidence. */
  skipped: SkippedCheckV1[];
  overallStatus: ValidationStatus;
  /** Confidence-weighted mean of check scores, in [0, 1]. */
  overallConfidence: number;
  summary: string;
  recommendations: string[];
}
