import { SEVERITY_TIERS, type SeverityTier } from "../review/types.js";
import { containsToken, countMatches } from "./tokens.js";

/** Lower-case keyword tables, checked Harsh first. */
export const SEVERITY_KEYWORDS: Readonly<Record<Exclude<SeverityTier, "Mild">, readonly string[]>> =
  Object.freeze({
    Harsh: [
      "terrible", "awful", "horrible", "stupid", "dumb", "idiotic", "wrong",
      "never", "garbage", "useless", "ridiculous", "pathetic", "lazy",
      "nonsense", "sloppy", "worst", "obviously", "completely", "totally",
      "absolutely",
    ],
    Moderate: [
      "inefficient", "bad", "poor", "should not", "shouldn't", "don't",
      "do not", "redundant", "unnecessary", "unclear", "confusing", "messy",
      "slow", "avoid", "not descriptive",
    ],
  });

// `!=` and `!==` inside quoted code are not shouting
const SHOUT = /!(?!=)/g;
const SHOUT_THRESHOLD = 2;

export function classifySeverity(comment: string): SeverityTier {
  const text = comment.toLowerCase();

  if (
    countMatches(text, SHOUT) >= SHOUT_THRESHOLD ||
    SEVERITY_KEYWORDS.Harsh.some((k) => containsToken(text, k))
  ) {
    return "Harsh";
  }
  if (SEVERITY_KEYWORDS.Moderate.some((k) => containsToken(text, k))) {
    return "Moderate";
  }
  return "Mild";
}

export function severityRank(tier: SeverityTier): number {
  return SEVERITY_TIERS.indexOf(tier);
}

/**
 * Most frequent tier; a tie goes to the harsher one. An empty list is Mild.
 */
export function dominantSeverity(tiers: readonly SeverityTier[]): SeverityTier {
  const counts = new Map<SeverityTier, number>();
  for (const tier of tiers) counts.set(tier, (counts.get(tier) ?? 0) + 1);

  let dominant: SeverityTier = "Mild";
  let dominantCount = 0;
  for (const tier of SEVERITY_TIERS) {
    const count = counts.get(tier) ?? 0;
    if (count === 0) continue;
    if (
      count > dominantCount ||
      (count === dominantCount && severityRank(tier) > severityRank(dominant))
    ) {
      dominant = tier;
      dominantCount = count;
    }
  }
  return dominant;
}
