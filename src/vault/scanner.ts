import type { Dirent } from "node:fs";
import { readdir } from "node:fs/promises";
import { join } from "node:path";
import type { SkippedEntry } from "./types.ts";

export const NOTE_EXTENSIONS = [".md", ".markdown"] as const;

export function isNoteFile(name: string): boolean {
  return NOTE_EXTENSIONS.some((ext) => name.endsWith(ext));
}

/**
 * Collect every note file below `root`, in traversal order.
 *
 * Hidden entries are ignored. A subdirectory that cannot be listed is
 * reported in `skipped`; an unreadable root throws.
 */
export async function scanNotePaths(
  root: string
): Promise<{ paths: string[]; skipped: SkippedEntry[] }> {
  let entries: Dirent[];
  try {
    entries = await readdir(root, { withFileTypes: true });
  } catch (err) {
    throw new Error(`Cannot read vault root: ${root} (${describeError(err)})`);
  }

  const paths: string[] = [];
  const skipped: SkippedEntry[] = [];
  await collectNoteFiles(root, entries, paths, skipped);
  return { paths, skipped };
}

async function collectNoteFiles(
  dirPath: string,
  entries: Dirent[],
  paths: string[],
  skipped: SkippedEntry[]
): Promise<void> {
  for (const entry of entries) {
    if (entry.name.startsWith(".")) continue;
    const fullPath = join(dirPath, entry.name);

    if (entry.isDirectory()) {
      let children: Dirent[];
      try {
        children = await readdir(fullPath, { withFileTypes: true });
      } catch (err) {
        skipped.push({ path: fullPath, reason: describeError(err) });
        continue;
      }
      await collectNoteFiles(fullPath, children, paths, skipped);
    } else if (isNoteFile(entry.name)) {
      paths.push(fullPath);
    }
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
