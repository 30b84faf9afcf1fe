import type { DetectedLanguage } from "../review/types.js";

const WORD_CHAR = /\w/;
const REGEX_SPECIAL = /[.*+?^${}()|[\]\\]/g;

/**
 * Global regex for a literal token. A side of the token that is a word
 * character only matches at a word boundary, so `def` does not hit
 * `undefined` while `=>` and `std::` match anywhere.
 */
function tokenPattern(token: string): RegExp {
  const escaped = token.replace(REGEX_SPECIAL, "\\$&");
  const head = WORD_CHAR.test(token.charAt(0)) ? "\\b" : "";
  const tail = WORD_CHAR.test(token.charAt(token.length - 1)) ? "\\b" : "";
  return new RegExp(`${head}${escaped}${tail}`, "g");
}

export function countToken(text: string, token: string): number {
  if (!token) return 0;
  return text.match(tokenPattern(token))?.length ?? 0;
}

export function containsToken(text: string, token: string): boolean {
  return countToken(text, token) > 0;
}

export function countMatches(text: string, pattern: RegExp): number {
  const global = pattern.flags.includes("g")
    ? pattern
    : new RegExp(pattern.source, `${pattern.flags}g`);
  return text.match(global)?.length ?? 0;
}

// Optional r/b/u/f prefix, then a triple-quoted, quoted or template literal
const STRING_LITERAL =
  /((?<![\w$])[rRbBuUfF]{1,2})?("""[\s\S]*?"""|'''[\s\S]*?'''|"(?:\\.|[^"\\\n])*"|'(?:\\.|[^'\\\n])*'|`(?:\\[\s\S]|[^`\\])*`)/g;

const TRIPLE_QUOTE = /^(?:"""|''')/;

/**
 * Replaces string prefixes and the contents of string literals with spaces,
 * keeping the quotes, the line breaks and the overall length, then removes
 * comments. Scanners run on the result so words inside strings and comments
 * are not mistaken for code.
 */
export function stripLiterals(code: string, language: DetectedLanguage): string {
  const blanked = code.replace(
    STRING_LITERAL,
    (_match, prefix: string | undefined, literal: string) => {
      const quote = TRIPLE_QUOTE.test(literal) ? literal.slice(0, 3) : literal.charAt(0);
      const body = literal
        .slice(quote.length, literal.length - quote.length)
        .replace(/[^\n]/g, " ");
      return " ".repeat(prefix?.length ?? 0) + quote + body + quote;
    }
  );

  if (language === "Python") {
    return blanked.replace(/#[^\n]*/g, "");
  }
  return blanked.replace(/\/\*[\s\S]*?\*\//g, "").replace(/\/\/[^\n]*/g, "");
}
