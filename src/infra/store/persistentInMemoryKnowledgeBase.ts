import { promises as fs } from "node:fs";
import path from "node:path";
import { z } from "zod";
import { IndexedChunk } from "../../domain/knowledgeBase.js";
import { InMemoryKnowledgeBase } from "./inMemoryKnowledgeBase.js";

export const CURRENT_FORMAT_VERSION = 1;

const indexedChunkSchema = z.object({
  chunk_id: z.string().min(1),
  source: z.string(),
  section: z.string(),
  index: z.number().int().nonnegative(),
  text: z.string(),
  embedding: z.array(z.number()).nullable(),
});

const persistedSnapshotSchema = z.object({
  format_version: z.number().int(),
  saved_at: z.string(),
  snapshot: z.object({
    chunks: z.array(indexedChunkSchema),
  }),
});

type PersistedKnowledgeBase = z.infer<typeof persistedSnapshotSchema>;

export interface PersistentInMemoryOptions {
  maxBytes: number;
}

export interface IndexStorageInfo {
  path: string;
  exists: boolean;
  format_version: number;
  max_bytes: number;
  size_bytes: number;
  utilization_ratio: number;
}

/**
 * In-memory knowledge base mirrored to a single JSON snapshot file. Writes go
 * through a temp file and a rename, serialized on one promise chain.
 */
export class PersistentInMemoryKnowledgeBase extends InMemoryKnowledgeBase {
  private writeChain: Promise<void> = Promise.resolve();

  private readonly absolutePath: string;

  constructor(
    filePath: string,
    private readonly options: PersistentInMemoryOptions,
  ) {
    super();
    this.absolutePath = path.resolve(filePath);
  }

  get snapshotPath(): string {
    return this.absolutePath;
  }

  /**
   * Loads the snapshot into memory. Returns false when no snapshot file exists.
   */
  async initialize(): Promise<boolean> {
    let raw: string;
    try {
      raw = await fs.readFile(this.absolutePath, "utf-8");
    } catch (error) {
      if (isFileMissing(error)) {
        return false;
      }
      throw error;
    }

    this.importSnapshot(parseSnapshotFromDisk(raw).snapshot);
    return true;
  }

  override async replaceAll(chunks: IndexedChunk[]): Promise<void> {
    await super.replaceAll(chunks);
    await this.enqueueWrite(() => this.persistNow());
  }

  async getStorageInfo(): Promise<IndexStorageInfo> {
    const stats = await this.readStorageStat();
    return {
      path: this.absolutePath,
      exists: stats.exists,
      format_version: CURRENT_FORMAT_VERSION,
      max_bytes: this.options.maxBytes,
      size_bytes: stats.sizeBytes,
      utilization_ratio:
        this.options.maxBytes > 0
          ? Number((stats.sizeBytes / this.options.maxBytes).toFixed(4))
          : 0,
    };
  }

  async close(): Promise<void> {
    await this.writeChain;
  }

  private enqueueWrite(task: () => Promise<void>): Promise<void> {
    const next = this.writeChain.then(task, task);
    // Later writes still run after a failed one.
    this.writeChain = next.catch(() => undefined);
    return next;
  }

  private async persistNow(): Promise<void> {
    const payload: PersistedKnowledgeBase = {
      format_version: CURRENT_FORMAT_VERSION,
      saved_at: new Date().toISOString(),
      snapshot: this.exportSnapshot(),
    };

    const serialized = JSON.stringify(payload);
    const bytes = Buffer.byteLength(serialized, "utf-8");
    if (bytes > this.options.maxBytes) {
      throw new Error(
        `Index snapshot exceeds size limit (${bytes} > ${this.options.maxBytes} bytes).`,
      );
    }

    await fs.mkdir(path.dirname(this.absolutePath), { recursive: true });
    const tempPath = `${this.absolutePath}.tmp`;
    await fs.writeFile(tempPath, serialized, "utf-8");
    await replaceFileSafely(tempPath, this.absolutePath, serialized);
  }

  private async readStorageStat(): Promise<{ exists: boolean; sizeBytes: number }> {
    try {
      const stat = await fs.stat(this.absolutePath);
      return { exists: true, sizeBytes: stat.size };
    } catch (error) {
      if (isFileMissing(error)) {
        return { exists: false, sizeBytes: 0 };
      }
      throw error;
    }
  }
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

function isFileMissing(error: unknown): boolean {
  return errorCode(error) === "ENOENT";
}

async function replaceFileSafely(
  tempPath: string,
  targetPath: string,
  content: string,
): Promise<void> {
  try {
    await fs.rename(tempPath, targetPath);
    return;
  } catch (error) {
    if (!isReplaceableRenameError(error)) {
      throw error;
    }
  }

  try {
    await fs.rm(targetPath, { force: true });
    await fs.rename(tempPath, targetPath);
    return;
  } catch (error) {
    if (!isReplaceableRenameError(error)) {
      throw error;
    }
  }

  // Windows can keep the target locked; write in place as a last resort.
  await fs.writeFile(targetPath, content, "utf-8");
  await fs.rm(tempPath, { force: true });
}

function isReplaceableRenameError(error: unknown): boolean {
  const code = errorCode(error);
  return code === "EPERM" || code === "EEXIST" || code === "EBUSY";
}

function parseSnapshotFromDisk(raw: string): PersistedKnowledgeBase {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new Error("Index snapshot is not valid JSON.", { cause: error });
  }

  const parsed = persistedSnapshotSchema.safeParse(json);
  if (!parsed.success) {
    throw new Error("Invalid index snapshot format.", { cause: parsed.error });
  }
  if (parsed.data.format_version !== CURRENT_FORMAT_VERSION) {
    throw new Error(
      `Unsupported index format version: ${parsed.data.format_version}. Expected ${CURRENT_FORMAT_VERSION}.`,
    );
  }
  return parsed.data;
}
