import type { ScoringConfig } from "../config-loader/schema.js";
import { DEFAULT_CONFIG } from "../config/defaults.js";
import { classifySeverity } from "../heuristics/severity.js";
import { stripLiterals } from "../heuristics/tokens.js";
import type {
  DetectedLanguage,
  QualityDimension,
  QualityScore,
} from "../review/types.js";
import type { DimensionScorer, ScoringContext } from "./types.js";
import { readability } from "./dimensions/readability.js";
import { performance } from "./dimensions/performance.js";
import { maintainability } from "./dimensions/maintainability.js";
import { bestPractices } from "./dimensions/best-practices.js";

export const MAX_SCORE = 10;

export const DIMENSION_SCORERS: readonly DimensionScorer[] = [
  readability,
  performance,
  maintainability,
  bestPractices,
];

export function roundScore(value: number): number {
  return Math.round(value * 10) / 10;
}

export function buildScoringContext(
  snippet: string,
  comments: readonly string[],
  language: DetectedLanguage,
  scoring: ScoringConfig = DEFAULT_CONFIG.scoring
): ScoringContext {
  return {
    snippet,
    code: stripLiterals(snippet, language),
    comments,
    severities: comments.map((c) => classifySeverity(c)),
    language,
    scoring,
  };
}

/** Baseline minus deductions, clamped to [0, 10], one decimal. */
export function scoreDimension(scorer: DimensionScorer, ctx: ScoringContext): number {
  const raw = MAX_SCORE - scorer.deductions(ctx);
  return roundScore(Math.min(MAX_SCORE, Math.max(0, raw)));
}

/**
 * Four independent subscores, their mean as `overall` and the headroom left
 * as `improvement_potential`. An empty snippet has nothing to deduct, so only
 * Maintainability can drop below 10 (through the comment severities).
 */
export function scoreQuality(
  snippet: string,
  comments: readonly string[],
  language: DetectedLanguage,
  scoring: ScoringConfig = DEFAULT_CONFIG.scoring
): QualityScore {
  const ctx = buildScoringContext(snippet, comments, language, scoring);

  const subscores: Record<QualityDimension, number> = {
    Readability: MAX_SCORE,
    Performance: MAX_SCORE,
    Maintainability: MAX_SCORE,
    BestPractices: MAX_SCORE,
  };
  for (const scorer of DIMENSION_SCORERS) {
    subscores[scorer.dimension] = scoreDimension(scorer, ctx);
  }

  const values = Object.values(subscores);
  const overall = roundScore(values.reduce((a, b) => a + b, 0) / values.length);

  return {
    subscores,
    overall,
    improvement_potential: roundScore(Math.max(0, MAX_SCORE - overall)),
  };
}
