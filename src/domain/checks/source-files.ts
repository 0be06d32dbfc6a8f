import fs from "fs";
import fsp from "fs/promises";
import path from "path";

const SKIPPED_DIRS = new Set(["target", ".git", "node_modules"]);

/**
 * Recursively list files under `dir` ending in `extension`, sorted by path.
 * A missing directory yields an empty list.
 */
export async function listSourceFiles(
  dir: string,
  extension = ".rs",
): Promise<string[]> {
  if (!fs.existsSync(dir)) return [];

  const files: string[] = [];
  const walk = async (current: string): Promise<void> => {
    const entries = await fsp.readdir(current, { withFileTypes: true });
    for (const entry of entries) {
      const full = path.join(current, entry.name);
      if (entry.isDirectory()) {
        if (!SKIPPED_DIRS.has(entry.name)) await walk(full);
      } else if (entry.isFile() && entry.name.endsWith(extension)) {
        files.push(full);
      }
    }
  };

  await walk(dir);
  return files.sort();
}

/** Line count as `wc -l` reports it for newline-terminated files. */
export function countLines(content: string): number {
  if (content.length === 0) return 0;
  const parts = content.split("\n").length;
  return content.endsWith("\n") ? parts - 1 : parts;
}

/** Forward-slash relative path, stable across platforms for reports. */
export function relativePath(from: string, to: string): string {
  return path.relative(from, to).split(path.sep).join("/");
}
