import type { DimensionScorer } from "../types.js";

export function countCodeLines(snippet: string): number {
  return snippet.split("\n").filter((line) => line.trim() !== "").length;
}

export const maintainability: DimensionScorer = {
  dimension: "Maintainability",
  description:
    "Snippet length beyond the threshold and how many comments read as harsh or moderate",
  deductions({ snippet, severities, scoring }) {
    const { perExcessLine, harshComment, moderateComment } = scoring.penalties;
    const excess = Math.max(0, countCodeLines(snippet) - scoring.lengthThreshold);
    const harsh = severities.filter((s) => s === "Harsh").length;
    const moderate = severities.filter((s) => s === "Moderate").length;
    return (
      excess * perExcessLine + harsh * harshComment + moderate * moderateComment
    );
  },
};
