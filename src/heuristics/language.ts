import { LANGUAGES, type DetectedLanguage, type KnownLanguage } from "../review/types.js";
import { countToken } from "./tokens.js";

/** Signature tokens per language. Matching is case-sensitive. */
export const LANGUAGE_SIGNATURES: Readonly<Record<KnownLanguage, readonly string[]>> =
  Object.freeze({
    Python: ["def", "elif", "self", "None", "True", "False", "__init__", "lambda", "print(", "except"],
    JavaScript: ["function", "const", "let", "var", "=>", "console.log", "===", "!==", "undefined", "require("],
    Java: ["public class", "public static", "System.out", "private", "protected", "void", "String[]", "import java", "extends", "implements", "@Override", "ArrayList", "List<", "HashMap", "boolean"],
    "C++": ["#include", "#define", "std::", "cout", "namespace", "template<", "nullptr", "->", "int main"],
    Go: ["func", "package", ":=", "fmt.", "chan", "defer", "import (", "err != nil"],
  });

export function languageScores(snippet: string): Record<KnownLanguage, number> {
  const score = (language: KnownLanguage) =>
    LANGUAGE_SIGNATURES[language].reduce(
      (sum, token) => sum + countToken(snippet, token),
      0
    );

  return {
    Python: score("Python"),
    JavaScript: score("JavaScript"),
    Java: score("Java"),
    "C++": score("C++"),
    Go: score("Go"),
  };
}

/**
 * Picks the language whose signature tokens occur most often. Ties go to
 * the earlier entry of LANGUAGES; no matches at all is Unknown.
 */
export function detectLanguage(snippet: string): DetectedLanguage {
  const scores = languageScores(snippet);
  let best: DetectedLanguage = "Unknown";
  let bestScore = 0;

  for (const language of LANGUAGES) {
    if (scores[language] > bestScore) {
      best = language;
      bestScore = scores[language];
    }
  }
  return best;
}
