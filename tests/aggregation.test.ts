import { describe, expect, it } from "vitest";
import { LocalEvidence, WebEvidence } from "../src/domain/types.js";
import { aggregate } from "../src/pipelines/aggregation.js";

function local(chunkId: string, text: string, section?: string): LocalEvidence {
  return { source_tag: "local", chunk_id: chunkId, text, score: 0.5, ...(section ? { section } : {}) };
}

function web(url: string, title: string, snippet: string, publishedAt?: string): WebEvidence {
  return {
    source_tag: "web",
    url,
    title,
    snippet,
    score: 0.5,
    ...(publishedAt ? { published_at: publishedAt } : {}),
  };
}

describe("aggregate", () => {
  it("numbers local evidence and renders the local block", () => {
    const context = aggregate(
      [
        local("chunk-0001", "Xylos  is\n blue.", "Xylos"),
        local("chunk-0001", "duplicate"),
        local("chunk-0002", "   "),
        local("chunk-0003", "Vance protocol."),
      ],
      [],
    );

    expect(context.local_sources).toEqual([
      {
        ref: "L1",
        source_tag: "local",
        chunk_id: "chunk-0001",
        text: "Xylos is blue.",
        score: 0.5,
        section: "Xylos",
      },
      { ref: "L2", source_tag: "local", chunk_id: "chunk-0003", text: "Vance protocol.", score: 0.5 },
    ]);
    expect(context.local_block).toBe(
      "[L1] chunk-0001 | Xylos: Xylos is blue.\n[L2] chunk-0003: Vance protocol.",
    );
    expect(context.web_block).toBe("");
  });

  it("dedupes web evidence by URL and renders the web block", () => {
    const context = aggregate(
      [],
      [
        web("https://a.example.com/x", "  Alpha  page ", "alpha", " 2026-05-01 "),
        web("", "No URL", "dropped"),
        web("https://a.example.com/x", "Again", "dropped"),
        web("https://b.example.org", "", "beta"),
      ],
    );

    expect(context.web_sources.map((source) => source.ref)).toEqual(["W1", "W2"]);
    expect(context.web_block).toBe(
      [
        "[W1] Alpha page <https://a.example.com/x> (2026-05-01): alpha",
        "[W2] https://b.example.org <https://b.example.org>: beta",
      ].join("\n"),
    );
    expect(context.local_block).toBe("");
  });

  it("stops adding excerpts once the budget is spent", () => {
    const context = aggregate(
      [local("chunk-0001", "x".repeat(8)), local("chunk-0002", "y".repeat(500)), local("chunk-0003", "z")],
      [],
      { localBudget: 10 },
    );

    expect(context.local_sources.map((source) => source.chunk_id)).toEqual(["chunk-0001", "chunk-0002"]);
    expect(context.local_sources[1].text).toBe(`${"y".repeat(397)}...`);
  });

  it("gives the same context for the same input", () => {
    const localHits = [local("chunk-0002", "Lys  Harbor", "Places"), local("chunk-0001", "Xylos")];
    const webHits = [web("https://a.example.com", "A", "alpha", "2026-05-01"), web("https://a.example.com", "A2", "dup")];

    const first = aggregate(localHits, webHits);
    const second = aggregate(localHits, webHits);

    expect(second).toEqual(first);
    expect(first.local_sources.map((source) => source.ref)).toEqual(["L1", "L2"]);
    expect(first.web_sources.map((source) => source.ref)).toEqual(["W1"]);
  });

  it("returns empty blocks for no evidence", () => {
    expect(aggregate([], [])).toEqual({
      local_sources: [],
      web_sources: [],
      local_block: "",
      web_block: "",
    });
  });
});
