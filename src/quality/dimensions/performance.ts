import type { DimensionScorer, Pattern } from "../types.js";
import { countMatches } from "../../heuristics/tokens.js";

export const INEFFICIENT_PATTERNS: readonly Pattern[] = [
  { id: "index-iteration", label: "iterating with range(len(...))", pattern: /\brange\(\s*len\(/g },
  { id: "list-membership", label: "membership test against a list copy", pattern: /\bin\s+list\(/g },
  { id: "linear-search", label: "linear search with indexOf", pattern: /\.indexOf\(/g },
  { id: "string-concatenation", label: "string building with +=", pattern: /\+=\s*["'`]/g },
  { id: "keys-membership", label: "membership test against .keys()", pattern: /\bin\s+[\w.]+\.keys\(\)/g },
];

const LOOP_HEADER = /^(?:for|while)\b|\.forEach\(/;

// Captures the iterated collection; call expressions such as range(...) are skipped
const COLLECTION_LOOPS: readonly RegExp[] = [
  /\bfor\s+(?!\()[\w\s,()]+?\s+in\s+([A-Za-z_][\w.]*)\b(?!\s*\()/g,
  /\bfor\s*\(\s*(?:const|let|var|final)?\s*[\w<>[\], ]+?\s*(?:\bof\b|\bin\b|:)\s*([A-Za-z_][\w.]*)\b(?!\s*\()/g,
  /\bfor\s+[\w, ]+:=\s*range\s+([A-Za-z_][\w.]*)/g,
  /\b([A-Za-z_][\w.]*)\.(?:forEach|map|filter|reduce|some|every|find)\(/g,
];

function indentOf(line: string): number {
  let width = 0;
  for (const ch of line) {
    if (ch === " ") width += 1;
    else if (ch === "\t") width += 4;
    else break;
  }
  return width;
}

/** Loop headers that open while another loop is still open, judged by indentation. */
export function countNestedLoops(code: string): number {
  const open: number[] = [];
  let nested = 0;

  for (const line of code.split("\n")) {
    const trimmed = line.trim();
    if (!trimmed) continue;

    const indent = indentOf(line);
    while (open.length > 0 && open[open.length - 1] >= indent) open.pop();

    if (LOOP_HEADER.test(trimmed)) {
      if (open.length > 0) nested++;
      open.push(indent);
    }
  }
  return nested;
}

/** Every loop over a collection beyond the first one over that same collection. */
export function countRepeatedIterations(code: string): number {
  const seen = new Map<string, number>();
  for (const pattern of COLLECTION_LOOPS) {
    for (const match of code.matchAll(pattern)) {
      const collection = match[1];
      if (collection) seen.set(collection, (seen.get(collection) ?? 0) + 1);
    }
  }

  let repeated = 0;
  for (const count of seen.values()) repeated += count - 1;
  return repeated;
}

export const performance: DimensionScorer = {
  dimension: "Performance",
  description:
    "Nested loops, repeated passes over one collection and known slow idioms",
  deductions({ code, scoring }) {
    const { nestedLoop, repeatedIteration, inefficientPattern } = scoring.penalties;
    const idioms = INEFFICIENT_PATTERNS.reduce(
      (sum, { pattern }) => sum + countMatches(code, pattern),
      0
    );
    return (
      countNestedLoops(code) * nestedLoop +
      countRepeatedIterations(code) * repeatedIteration +
      idioms * inefficientPattern
    );
  },
};
