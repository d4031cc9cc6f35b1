import { promises as fs } from "node:fs";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { PersistentInMemoryKnowledgeBase } from "../src/infra/store/persistentInMemoryKnowledgeBase.js";
import { makeChunk } from "./helpers/fakes.js";

const TEMP_DIR = path.resolve(".tmp-tests-persistent");
const TEMP_FILE = path.join(TEMP_DIR, "persistent-kb-test.json");

describe("PersistentInMemoryKnowledgeBase", () => {
  afterEach(async () => {
    await fs.rm(TEMP_DIR, { recursive: true, force: true });
  });

  it("reports a missing snapshot", async () => {
    const kb = new PersistentInMemoryKnowledgeBase(TEMP_FILE, { maxBytes: 1_000_000 });

    expect(await kb.initialize()).toBe(false);
    expect((await kb.getStorageInfo()).exists).toBe(false);
    expect(kb.stats().chunks).toBe(0);
  });

  it("restores indexed chunks after restart", async () => {
    const kb1 = new PersistentInMemoryKnowledgeBase(TEMP_FILE, { maxBytes: 1_000_000 });
    const embedded = makeChunk(0, "The Aether Core powers the harbor lights.", "Aether Core");
    embedded.embedding = [0.1, 0.2, 0.3];
    await kb1.replaceAll([embedded, makeChunk(1, "Xylos glows faintly at night.", "Xylos")]);
    await kb1.close();

    const kb2 = new PersistentInMemoryKnowledgeBase(TEMP_FILE, { maxBytes: 1_000_000 });
    expect(await kb2.initialize()).toBe(true);
    expect(kb2.stats()).toEqual({ sources: 1, chunks: 2, embedded_chunks: 1 });

    const hits = await kb2.search({
      query: "aether core",
      queryEmbedding: [0.1, 0.2, 0.3],
      topK: 3,
    });
    expect(hits[0].chunk.chunk_id).toBe("chunk-0000");

    const info = await kb2.getStorageInfo();
    expect(info.exists).toBe(true);
    expect(info.format_version).toBe(1);
    expect(info.size_bytes).toBeGreaterThan(0);
  });

  it("enforces max index file size", async () => {
    const kb = new PersistentInMemoryKnowledgeBase(TEMP_FILE, { maxBytes: 120 });

    await expect(kb.replaceAll([makeChunk(0, "A".repeat(200))])).rejects.toThrow(
      "exceeds size limit",
    );
    expect((await kb.getStorageInfo()).exists).toBe(false);
  });

  it("rejects a snapshot that is not JSON", async () => {
    await fs.mkdir(TEMP_DIR, { recursive: true });
    await fs.writeFile(TEMP_FILE, "not json", "utf-8");

    const kb = new PersistentInMemoryKnowledgeBase(TEMP_FILE, { maxBytes: 1_000_000 });
    await expect(kb.initialize()).rejects.toThrow("Index snapshot is not valid JSON.");
  });

  it("rejects an unknown format version", async () => {
    await fs.mkdir(TEMP_DIR, { recursive: true });
    await fs.writeFile(
      TEMP_FILE,
      JSON.stringify({ format_version: 2, saved_at: "2026-01-01T00:00:00.000Z", snapshot: { chunks: [] } }),
      "utf-8",
    );

    const kb = new PersistentInMemoryKnowledgeBase(TEMP_FILE, { maxBytes: 1_000_000 });
    await expect(kb.initialize()).rejects.toThrow("Unsupported index format version: 2. Expected 1.");
  });
});
