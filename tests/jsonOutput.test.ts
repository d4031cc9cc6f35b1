import { describe, expect, it } from "vitest";
import { extractJsonObject, stripCodeFences } from "../src/pipelines/jsonOutput.js";

describe("stripCodeFences", () => {
  it("unwraps a fenced reply", () => {
    expect(stripCodeFences('```json\n{"a":1}\n```')).toBe('{"a":1}');
    expect(stripCodeFences("  plain  ")).toBe("plain");
  });
});

describe("extractJsonObject", () => {
  it("reads an object surrounded by prose", () => {
    expect(extractJsonObject('Sure! {"answer":"ok","sources":["L1"]} Hope this helps.')).toEqual({
      answer: "ok",
      sources: ["L1"],
    });
  });

  it("stops at the brace closing the first object", () => {
    expect(extractJsonObject('{"answer":"ok","sources":["L1"],"confidence":0.7}\nRefs: {L1}')).toEqual({
      answer: "ok",
      sources: ["L1"],
      confidence: 0.7,
    });
  });

  it("ignores braces and escaped quotes inside strings", () => {
    expect(extractJsonObject('{"answer":"use {x} and \\"}\\" here","nested":{"n":1}}')).toEqual({
      answer: 'use {x} and "}" here',
      nested: { n: 1 },
    });
  });

  it("skips a brace group that is not JSON", () => {
    expect(extractJsonObject('Cited {L1}: {"answer":"ok"}')).toEqual({ answer: "ok" });
  });

  it("returns undefined without a complete object", () => {
    expect(extractJsonObject("no json here")).toBeUndefined();
    expect(extractJsonObject('{"answer":"cut off')).toBeUndefined();
    expect(extractJsonObject("[1, 2]")).toBeUndefined();
  });
});
