import { describe, it, expect } from "vitest";
import { countMatches, countToken, stripLiterals } from "../../src/heuristics/tokens.js";

describe("countToken", () => {
  it("respects word boundaries on word-character edges", () => {
    expect(countToken("def undefined def", "def")).toBe(2);
  });

  it("matches symbolic tokens anywhere", () => {
    expect(countToken("a => b => c", "=>")).toBe(2);
    expect(countToken("std::vector<int> v; std::cout", "std::")).toBe(2);
  });

  it("returns 0 for an empty token", () => {
    expect(countToken("anything", "")).toBe(0);
  });
});

describe("countMatches", () => {
  it("counts all matches even for a non-global pattern", () => {
    expect(countMatches("a!b!c", /!/)).toBe(2);
  });
});

describe("stripLiterals", () => {
  it("blanks Python strings and drops # comments", () => {
    const code = 'x = "a == True"  # b == True';
    expect(stripLiterals(code, "Python")).toBe(`x = "${" ".repeat(9)}"  `);
  });

  it("keeps // inside strings and drops real comments", () => {
    const code = 'const s = "// not a comment"; // real';
    expect(stripLiterals(code, "JavaScript")).toBe(`const s = "${" ".repeat(16)}"; `);
  });

  it("handles escaped quotes", () => {
    expect(stripLiterals('x = "a\\"b"', "Go")).toBe('x = "    "');
  });

  it("blanks string prefixes along with the literal", () => {
    expect(stripLiterals('s = rb"\\d"', "Python")).toBe('s =   "  "');
    expect(stripLiterals('print(f"Hi {name}")', "Python")).toBe('print( "         ")');
  });

  it("blanks triple-quoted strings across lines", () => {
    const code = 'x = """\n  a b\n"""\ny = 1';
    expect(stripLiterals(code, "Python")).toBe('x = """\n     \n"""\ny = 1');
  });

  it("removes block comments", () => {
    expect(stripLiterals("a /* var x */ b", "Java")).toBe("a  b");
  });
});
