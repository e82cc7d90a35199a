import { readFile, stat } from "node:fs/promises";
import { extractMetadata } from "./metadata.ts";
import { matchesQuery } from "./match.ts";
import { describeError, scanNotePaths } from "./scanner.ts";
import type { Note, NoteMatch, Query, SearchResult, SkippedEntry, TagIndex } from "./types.ts";

export class Vault {
  constructor(readonly root: string) {}

  /** Re-scan the vault and return the notes matching `query`, in scan order. */
  async search(query: Query): Promise<SearchResult> {
    const { notes, skipped } = await this.load();
    const matches: NoteMatch[] = [];

    for (const note of notes) {
      const metadata = extractMetadata(note.rawText);
      if (matchesQuery(note, metadata, query)) {
        matches.push({ note, metadata });
      }
    }
    return { query, matches, skipped };
  }

  /** Every tag used in the vault, lower-cased and sorted. */
  async tags(): Promise<TagIndex> {
    const { notes, skipped } = await this.load();
    const all = new Set<string>();
    for (const note of notes) {
      for (const tag of extractMetadata(note.rawText).tags) all.add(tag);
    }
    return { tags: [...all].sort(), skipped };
  }

  /** Read and decode every note file. Unreadable or non-UTF-8 files are skipped. */
  private async load(): Promise<{ notes: Note[]; skipped: SkippedEntry[] }> {
    const { paths, skipped } = await scanNotePaths(this.root);
    const notes: Note[] = [];

    // One file at a time: a vault can hold more notes than the process has descriptors.
    for (const path of paths) {
      const result = await readNote(path);
      if ("note" in result) notes.push(result.note);
      else skipped.push(result.skipped);
    }
    return { notes, skipped };
  }
}

async function readNote(path: string): Promise<{ note: Note } | { skipped: SkippedEntry }> {
  try {
    const [buffer, info] = await Promise.all([readFile(path), stat(path)]);
    const rawText = new TextDecoder("utf-8", { fatal: true }).decode(buffer);
    return { note: { path, rawText, modifiedTime: info.mtime } };
  } catch (err) {
    return { skipped: { path, reason: describeError(err) } };
  }
}
