import type { DimensionScorer } from "../types.js";
import { countMatches } from "../../heuristics/tokens.js";

const LOOP_COUNTERS = new Set(["i", "j", "k"]);

// A lone letter that is not an attribute access (`u.x`) or part of a number
const SINGLE_LETTER = /(?<![\w$.])([A-Za-z])(?![\w$])/g;

// `a=b`, `a==b`, `a!=b`, `a+b` with nothing between operator and operands
const CRAMPED_OPERATOR = /[\w)\]](?:==|!=|=|\+)[\w(\[]/g;

export function poorNames(code: string): string[] {
  const names = new Set<string>();
  for (const match of code.matchAll(SINGLE_LETTER)) {
    const name = match[1];
    if (name && !LOOP_COUNTERS.has(name)) names.add(name);
  }
  return [...names];
}

export const readability: DimensionScorer = {
  dimension: "Readability",
  description:
    "Single-letter identifiers outside loop counters and operators without surrounding spaces",
  deductions({ code, scoring }) {
    const { poorName, crampedOperator } = scoring.penalties;
    return (
      poorNames(code).length * poorName +
      countMatches(code, CRAMPED_OPERATOR) * crampedOperator
    );
  },
};
