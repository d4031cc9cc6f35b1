import { promises as fs } from "node:fs";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import {
  getSupportedDocumentExtensions,
  isSupportedDocumentExtension,
  listDocumentFiles,
  loadDocumentText,
} from "../src/infra/parsers/documentLoader.js";

const TMP_DIR = path.resolve(".tmp-tests-loader");
const TMP_TXT = path.join(TMP_DIR, "loader-sample.txt");

describe("documentLoader", () => {
  afterEach(async () => {
    await fs.rm(TMP_DIR, { recursive: true, force: true });
  });

  it("accepts markdown and plain text only", () => {
    expect(getSupportedDocumentExtensions()).toEqual([".md", ".txt"]);
    expect(isSupportedDocumentExtension("notes/Guide.MD")).toBe(true);
    expect(isSupportedDocumentExtension("manual.pdf")).toBe(false);
  });

  it("loads text file content with normalized line endings", async () => {
    await fs.mkdir(TMP_DIR, { recursive: true });
    await fs.writeFile(TMP_TXT, "line 1\r\nline\t2\n", "utf-8");

    expect(await loadDocumentText(TMP_TXT)).toBe("line 1\nline 2");
  });

  it("rejects unsupported extension", async () => {
    await expect(loadDocumentText("sample.xlsx")).rejects.toThrow(
      "Unsupported extension: .xlsx. Allowed: .md, .txt",
    );
  });

  it("lists supported files recursively in a stable order", async () => {
    await fs.mkdir(path.join(TMP_DIR, "nested"), { recursive: true });
    await fs.writeFile(path.join(TMP_DIR, "b.md"), "b", "utf-8");
    await fs.writeFile(path.join(TMP_DIR, "a.md"), "a", "utf-8");
    await fs.writeFile(path.join(TMP_DIR, "nested", "c.txt"), "c", "utf-8");
    await fs.writeFile(path.join(TMP_DIR, "skip.json"), "{}", "utf-8");

    const files = await listDocumentFiles(TMP_DIR);
    expect(files.map((file) => path.relative(TMP_DIR, file).split(path.sep).join("/"))).toEqual([
      "a.md",
      "b.md",
      "nested/c.txt",
    ]);
  });
});
