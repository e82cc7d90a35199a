import { basename, extname } from "node:path";
import type { Metadata, Note, Query } from "./types.ts";

export function matchesQuery(note: Note, metadata: Metadata, query: Query): boolean {
  switch (query.kind) {
    case "subject":
      return matchesSubject(note.path, metadata, query.term);
    case "tags":
      return matchesTags(metadata.tags, query.terms);
    case "date":
      return matchesDate(metadata, query.term);
  }
}

/** Subject contains the term; notes without a subject are matched by file name. */
export function matchesSubject(path: string, metadata: Metadata, term: string): boolean {
  const needle = term.toLowerCase();
  if (metadata.subject !== undefined) {
    return metadata.subject.toLowerCase().includes(needle);
  }
  return noteName(path).toLowerCase().includes(needle);
}

/**
 * A note matches when any term and any of its tags contain one another.
 * Loose on purpose: "ml" matches "html", "fin" matches "finance".
 */
export function matchesTags(tags: ReadonlySet<string>, terms: readonly string[]): boolean {
  for (const term of terms) {
    const needle = term.toLowerCase();
    for (const tag of tags) {
      if (tag.includes(needle) || needle.includes(tag)) return true;
    }
  }
  return false;
}

/** The note's `ID=` code starts with the term. Notes without an ID never match. */
export function matchesDate(metadata: Metadata, term: string): boolean {
  return metadata.id !== undefined && metadata.id.startsWith(term);
}

/** File name without directory or extension. */
export function noteName(path: string): string {
  return basename(path, extname(path));
}
