import type { ScoringConfig } from "../config-loader/schema.js";
import type {
  DetectedLanguage,
  QualityDimension,
  SeverityTier,
} from "../review/types.js";

export interface ScoringContext {
  /** The snippet exactly as submitted */
  snippet: string;
  /** Snippet with string contents blanked and comments removed */
  code: string;
  comments: readonly string[];
  /** Severity of each comment, same order as `comments` */
  severities: readonly SeverityTier[];
  language: DetectedLanguage;
  scoring: ScoringConfig;
}

export interface DimensionScorer {
  dimension: QualityDimension;
  description: string;
  /** Total points to subtract from the 10-point baseline */
  deductions(ctx: ScoringContext): number;
}

export interface Pattern {
  id: string;
  label: string;
  pattern: RegExp;
}
