export interface Note {
  /** Absolute path of the note file */
  path: string;
  /** Full file contents, decoded as UTF-8 */
  rawText: string;
  modifiedTime: Date;
}

export interface Metadata {
  /** Remainder of a `SUBJECT=` first line, trimmed */
  subject?: string;
  /** Lower-cased tags from frontmatter and inline `#tag` markers */
  tags: ReadonlySet<string>;
  /** Date-time code following `ID=`, e.g. `20240131-1530` */
  id?: string;
}

export type SearchKind = "subject" | "tags" | "date";

export type Query =
  | { kind: "subject"; term: string }
  | { kind: "tags"; terms: readonly string[] }
  | { kind: "date"; term: string };

export interface NoteMatch {
  note: Note;
  metadata: Metadata;
}

/** An entry the scan could not read or decode. */
export interface SkippedEntry {
  path: string;
  reason: string;
}

export interface SearchResult {
  query: Query;
  matches: NoteMatch[];
  skipped: SkippedEntry[];
}

export interface TagIndex {
  tags: string[];
  skipped: SkippedEntry[];
}
