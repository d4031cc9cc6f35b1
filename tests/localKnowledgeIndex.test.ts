import { promises as fs } from "node:fs";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { IndexUnavailableError } from "../src/domain/errors.js";
import { formatChunkId, LocalKnowledgeIndex } from "../src/infra/store/localKnowledgeIndex.js";
import { PersistentInMemoryKnowledgeBase } from "../src/infra/store/persistentInMemoryKnowledgeBase.js";
import { silentLogger } from "../src/utils/logger.js";
import { FakeEmbeddingClient } from "./helpers/fakes.js";

const TEMP_DIR = path.resolve(".tmp-tests-local-index");
const DATA_DIR = path.join(TEMP_DIR, "data");
const INDEX_FILE = path.join(TEMP_DIR, "indexes", "index.json");

const GUIDE = [
  "# Sereleia",
  "Sereleia is a coastal city built on floating reefs.",
  "# Xylos",
  "Xylos is a luminous mineral mined beneath Sereleia.",
].join("\n");

function createIndex(embeddings = new FakeEmbeddingClient(false), dataDir = DATA_DIR) {
  return new LocalKnowledgeIndex({
    knowledgeBase: new PersistentInMemoryKnowledgeBase(INDEX_FILE, { maxBytes: 1_000_000 }),
    embeddings,
    dataDir,
    logger: silentLogger,
  });
}

async function writeGuide() {
  await fs.mkdir(DATA_DIR, { recursive: true });
  await fs.writeFile(path.join(DATA_DIR, "guide.md"), GUIDE, "utf-8");
}

describe("LocalKnowledgeIndex", () => {
  afterEach(async () => {
    await fs.rm(TEMP_DIR, { recursive: true, force: true });
  });

  it("formats zero-padded chunk ids", () => {
    expect(formatChunkId(7)).toBe("chunk-0007");
  });

  it("refuses to search before it is loaded", async () => {
    const index = createIndex();

    expect(index.status()).toBe("loading");
    await expect(index.similaritySearch("xylos", 3)).rejects.toThrow(
      "Local retrieval is unavailable: index is still loading.",
    );
  });

  it("builds the snapshot from the data directory", async () => {
    await writeGuide();
    const index = createIndex();
    await index.initialize();

    expect(index.health()).toEqual({
      status: "ready",
      stats: { sources: 1, chunks: 2, embedded_chunks: 0 },
    });
    await expect(fs.stat(INDEX_FILE)).resolves.toBeDefined();

    const hits = await index.similaritySearch("luminous mineral", 3);
    expect(hits[0].chunk).toEqual({
      chunk_id: "chunk-0001",
      source: "guide.md",
      section: "Xylos",
      index: 1,
      text: "Xylos is a luminous mineral mined beneath Sereleia.",
      embedding: null,
    });
  });

  it("loads an existing snapshot without reading the data directory", async () => {
    await writeGuide();
    await createIndex().initialize();

    const reloaded = createIndex(new FakeEmbeddingClient(false), path.join(TEMP_DIR, "missing"));
    await reloaded.initialize();
    expect(reloaded.status()).toBe("ready");
    expect(reloaded.health().stats.chunks).toBe(2);
  });

  it("embeds chunks and queries when embeddings are configured", async () => {
    await writeGuide();
    const embeddings = new FakeEmbeddingClient(true);
    const index = createIndex(embeddings);
    await index.initialize();

    expect(embeddings.embeddedTexts).toBe(2);
    expect(index.health().stats.embedded_chunks).toBe(2);

    await index.similaritySearch("xylos", 2);
    expect(embeddings.embeddedQueries).toEqual(["xylos"]);
  });

  it("marks itself failed when there is nothing to index", async () => {
    await fs.mkdir(DATA_DIR, { recursive: true });
    const index = createIndex();

    await expect(index.initialize()).rejects.toThrow("no indexable documents found in");
    expect(index.status()).toBe("failed");
    expect(index.health().error).toContain("no indexable documents found in");
    await expect(index.similaritySearch("xylos", 3)).rejects.toBeInstanceOf(IndexUnavailableError);
  });

  it("initializes only once", async () => {
    await writeGuide();
    const index = createIndex();

    expect(index.initialize()).toBe(index.initialize());
    await index.initialize();
    expect(index.status()).toBe("ready");
  });
});
