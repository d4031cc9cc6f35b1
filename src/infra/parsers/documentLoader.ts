import { promises as fs } from "node:fs";
import path from "node:path";
import { normalizeText } from "../../utils/text.js";

const SUPPORTED_EXTENSIONS = new Set([".md", ".txt"]);

export function isSupportedDocumentExtension(filePath: string): boolean {
  return SUPPORTED_EXTENSIONS.has(path.extname(filePath).toLowerCase());
}

export function getSupportedDocumentExtensions(): string[] {
  return [...SUPPORTED_EXTENSIONS];
}

export async function loadDocumentText(filePath: string): Promise<string> {
  if (!isSupportedDocumentExtension(filePath)) {
    throw new Error(
      `Unsupported extension: ${path.extname(filePath)}. Allowed: ${getSupportedDocumentExtensions().join(", ")}`,
    );
  }
  const content = await fs.readFile(filePath, "utf-8");
  return normalizeText(content);
}

/**
 * Lists supported documents under `dir`, recursively, sorted by relative path so
 * chunk numbering is stable across builds.
 */
export async function listDocumentFiles(dir: string): Promise<string[]> {
  const root = path.resolve(dir);
  const files: string[] = [];

  const walk = async (current: string) => {
    const entries = await fs.readdir(current, { withFileTypes: true });
    for (const entry of entries) {
      const fullPath = path.join(current, entry.name);
      if (entry.isDirectory()) {
        await walk(fullPath);
      } else if (entry.isFile() && isSupportedDocumentExtension(entry.name)) {
        files.push(fullPath);
      }
    }
  };

  await walk(root);
  return files.sort((a, b) => path.relative(root, a).localeCompare(path.relative(root, b)));
}
