import { describe, expect, it } from "vitest";
import { chunkDocument, splitIntoChunks, splitIntoSections } from "../src/pipelines/chunking.js";

describe("chunking pipeline", () => {
  it("splits markdown on headings and drops empty sections", () => {
    const text = [
      "Preamble text",
      "# Alpha",
      "alpha body",
      "## Beta",
      "",
      "# Gamma",
      "gamma body",
    ].join("\n");

    expect(splitIntoSections(text)).toEqual([
      { title: "Introduction", body: "Preamble text" },
      { title: "Alpha", body: "alpha body" },
      { title: "Gamma", body: "gamma body" },
    ]);
  });

  it("returns short text as a single chunk", () => {
    expect(splitIntoChunks("  one short paragraph  ", 100, 20)).toEqual(["one short paragraph"]);
    expect(splitIntoChunks("   ", 100, 20)).toEqual([]);
  });

  it("keeps chunks within the window and overlaps neighbours", () => {
    const text = Array.from({ length: 30 }, (_, i) => `Sentence ${i} ends here.`).join(" ");
    const chunks = splitIntoChunks(text, 100, 20);

    expect(chunks.length).toBeGreaterThan(1);
    expect(chunks.every((chunk) => chunk.length <= 100)).toBe(true);
    expect(chunks[0].startsWith("Sentence 0 ")).toBe(true);
    expect(chunks[chunks.length - 1].endsWith("Sentence 29 ends here.")).toBe(true);
    for (let i = 1; i < chunks.length; i += 1) {
      expect(chunks[i - 1]).toContain(chunks[i].slice(0, 10));
    }
  });

  it("tags every chunk with its section title", () => {
    const body = Array.from({ length: 12 }, (_, i) => `Harbor fact number ${i}.`).join(" ");
    const chunks = chunkDocument(`# Lys Harbor\n${body}\n# Xylos\nA blue mineral.`, 80, 10);

    expect(chunks.length).toBeGreaterThan(2);
    expect(chunks.slice(0, -1).every((chunk) => chunk.section === "Lys Harbor")).toBe(true);
    expect(chunks[chunks.length - 1]).toEqual({ section: "Xylos", text: "A blue mineral." });
  });

  it("rejects a window smaller than one character", () => {
    expect(() => splitIntoChunks("text", 0, 0)).toThrow(RangeError);
  });
});
