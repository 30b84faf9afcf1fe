import type { DimensionScorer, Pattern } from "../types.js";
import type { DetectedLanguage } from "../../review/types.js";
import { countMatches } from "../../heuristics/tokens.js";

const BOOLEAN_LITERAL_COMPARISON = /[=!]==?\s*(?:true|false)\b/g;

export const ANTI_PATTERNS: Readonly<Record<DetectedLanguage, readonly Pattern[]>> =
  Object.freeze({
    Python: [
      { id: "bool-comparison", label: "comparison to True/False", pattern: /[=!]=\s*(?:True|False)\b/g },
      { id: "none-equality", label: "equality test against None", pattern: /[=!]=\s*None\b/g },
      { id: "bare-except", label: "bare except clause", pattern: /\bexcept\s*:/g },
      { id: "wildcard-import", label: "wildcard import", pattern: /\bimport\s+\*/g },
      { id: "mutable-default", label: "mutable default argument", pattern: /\bdef\s+\w+\([^)]*=\s*(?:\[\]|\{\})/g },
      { id: "type-equality", label: "type() equality check", pattern: /\btype\([^)]*\)\s*==/g },
    ],
    JavaScript: [
      { id: "var-declaration", label: "var declaration", pattern: /\bvar\s+/g },
      { id: "loose-equality", label: "loose equality", pattern: /(?<![=!<>])[=!]=(?!=)/g },
      { id: "bool-comparison", label: "comparison to true/false", pattern: BOOLEAN_LITERAL_COMPARISON },
      { id: "eval", label: "eval call", pattern: /\beval\(/g },
      { id: "document-write", label: "document.write", pattern: /\bdocument\.write\(/g },
      { id: "array-constructor", label: "Array constructor", pattern: /\bnew Array\(/g },
    ],
    Java: [
      { id: "stdout-print", label: "printing to System.out", pattern: /\bSystem\.out\.print(?:ln|f)?\(/g },
      { id: "broad-catch", label: "catching Exception or Throwable", pattern: /\bcatch\s*\(\s*(?:Exception|Throwable)\b/g },
      { id: "print-stack-trace", label: "printStackTrace", pattern: /\.printStackTrace\(\)/g },
      { id: "bool-comparison", label: "comparison to true/false", pattern: BOOLEAN_LITERAL_COMPARISON },
      { id: "string-identity", label: "string compared with ==", pattern: /[=!]=\s*"/g },
    ],
    "C++": [
      { id: "using-namespace-std", label: "using namespace std", pattern: /\busing\s+namespace\s+std\b/g },
      { id: "c-allocation", label: "malloc/free", pattern: /\b(?:malloc|free)\(/g },
      { id: "macro", label: "#define macro", pattern: /#define\b/g },
      { id: "goto", label: "goto", pattern: /\bgoto\b/g },
      { id: "null-macro", label: "NULL instead of nullptr", pattern: /\bNULL\b/g },
    ],
    Go: [
      { id: "panic", label: "panic call", pattern: /\bpanic\(/g },
      { id: "discarded-error", label: "error assigned to _", pattern: /\b_\s*=\s*err\b/g },
      { id: "empty-interface", label: "interface{}", pattern: /\binterface\{\}/g },
      { id: "empty-error-branch", label: "empty err != nil branch", pattern: /if\s+err\s*!=\s*nil\s*\{\s*\}/g },
    ],
    Unknown: [],
  });

export function findAntiPatterns(
  code: string,
  language: DetectedLanguage
): Array<{ id: string; label: string; count: number }> {
  return ANTI_PATTERNS[language]
    .map(({ id, label, pattern }) => ({ id, label, count: countMatches(code, pattern) }))
    .filter((hit) => hit.count > 0);
}

export const bestPractices: DimensionScorer = {
  dimension: "BestPractices",
  description: "Language-specific anti-patterns from a fixed table",
  deductions({ code, language, scoring }) {
    const hits = findAntiPatterns(code, language).reduce((sum, h) => sum + h.count, 0);
    return hits * scoring.penalties.antiPattern;
  },
};
