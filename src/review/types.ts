/** Languages the detector can recognise, in tie-break priority order. */
export const LANGUAGES = ["Python", "JavaScript", "Java", "C++", "Go"] as const;

export type KnownLanguage = (typeof LANGUAGES)[number];
export type DetectedLanguage = KnownLanguage | "Unknown";

/** Ordinal: Mild < Moderate < Harsh */
export const SEVERITY_TIERS = ["Mild", "Moderate", "Harsh"] as const;
export type SeverityTier = (typeof SEVERITY_TIERS)[number];

export const QUALITY_DIMENSIONS = [
  "Readability",
  "Performance",
  "Maintainability",
  "BestPractices",
] as const;
export type QualityDimension = (typeof QUALITY_DIMENSIONS)[number];

export const PERSONA_IDS = [
  "senior_developer",
  "tech_lead",
  "pair_programming",
  "mentor",
] as const;
export type Persona = (typeof PERSONA_IDS)[number];

/** A validated request. Only the validator constructs these. */
export interface ReviewRequest {
  readonly code_snippet: string;
  readonly review_comments: readonly string[];
}

export interface QualityScore {
  subscores: Record<QualityDimension, number>;
  overall: number;
  improvement_potential: number;
}

export interface CodeAnalysis {
  language: DetectedLanguage;
  quality: QualityScore;
  total_issues: number;
  /** One tier per comment, in request order */
  severities: SeverityTier[];
  severity_breakdown: Record<SeverityTier, number>;
}

export interface ReviewReport {
  markdown: string;
  enhanced_markdown: string;
  analysis: CodeAnalysis;
  persona: Persona;
  resources: string[];
  generated_at: string;
  duration_ms: number;
}
