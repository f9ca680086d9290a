import { describe, it, expect } from "vitest";
import {
  collapseWhitespace,
  enclosingContainer,
  findBlockEnd,
  findIndentedBlockEnd,
  lineAt,
  scan,
  splitParameters,
} from "../src/infrastructure/extractors/patterns.js";

describe("splitParameters", () => {
  it("splits on top-level commas only", () => {
    expect(splitParameters("a: Map<string, number>, b: (x: number, y: number) => void")).toEqual([
      "a: Map<string, number>",
      "b: (x: number, y: number) => void",
    ]);
  });

  it("returns an empty list for an empty parameter list", () => {
    expect(splitParameters("  ")).toEqual([]);
  });

  it("collapses whitespace inside parameters", () => {
    expect(splitParameters("name:\n    string")).toEqual(["name: string"]);
  });
});

describe("findBlockEnd", () => {
  it("finds the matching closing brace", () => {
    const lines = ["function f() {", "  if (x) {", "  }", "}", "const y = 1;"];
    expect(findBlockEnd(lines, 1)).toBe(4);
  });

  it("ends bodiless declarations on their own line", () => {
    expect(findBlockEnd(["abstract run(): void;", "other() {", "}"], 1)).toBe(1);
  });

  it("falls back to the start line when the block never closes", () => {
    expect(findBlockEnd(["class A {", "  x = 1"], 1)).toBe(1);
  });
});

describe("findIndentedBlockEnd", () => {
  it("stops at the first line indented at or left of the header", () => {
    const lines = ["def f():", "    a = 1", "", "    return a", "x = 2"];
    expect(findIndentedBlockEnd(lines, 1)).toBe(4);
  });
});

describe("enclosingContainer", () => {
  it("returns the innermost container spanning the line", () => {
    const outer = { name: "Outer", startLine: 1, endLine: 20, exported: true };
    const inner = { name: "Inner", startLine: 5, endLine: 10, exported: false };
    expect(enclosingContainer([outer, inner], 7)).toBe(inner);
    expect(enclosingContainer([outer, inner], 12)).toBe(outer);
    expect(enclosingContainer([outer, inner], 1)).toBeUndefined();
  });
});

describe("scan", () => {
  it("reports 1-indexed lines for each match", () => {
    const lines = [...scan(/^fn (\w+)/gm, "fn a\n\nfn b\nfn c")].map(({ match, line }) => [match[1], line]);
    expect(lines).toEqual([
      ["a", 1],
      ["b", 3],
      ["c", 4],
    ]);
  });
});

describe("text helpers", () => {
  it("computes the line of an offset", () => {
    expect(lineAt("a\nb\nc", 4)).toBe(3);
  });

  it("collapses whitespace", () => {
    expect(collapseWhitespace(" a \n  b ")).toBe("a b");
  });
});
