export { Vault } from "./vault.ts";
export { extractMetadata, extractSubject, frontmatterBlock } from "./metadata.ts";
export { matchesQuery, matchesSubject, matchesTags, matchesDate, noteName } from "./match.ts";
export { parseQuery, describeQuery } from "./query.ts";
export { scanNotePaths, isNoteFile, describeError, NOTE_EXTENSIONS } from "./scanner.ts";
export type {
  Note,
  Metadata,
  Query,
  SearchKind,
  NoteMatch,
  SkippedEntry,
  SearchResult,
  TagIndex,
} from "./types.ts";
