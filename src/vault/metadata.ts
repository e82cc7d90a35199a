import matter from "gray-matter";
import type { Metadata } from "./types.ts";

const SUBJECT_PREFIX = "SUBJECT=";
const FRONTMATTER_DELIMITER = "---";
const BRACKET_TAGS = /tags:\s*\[(.*?)\]/;
const INLINE_TAG = /#([\p{L}\p{N}_]+)/gu;
const ID_FIELD = /ID=(\d{8}-\d{4})/;

/**
 * Derive a note's metadata from its raw text.
 *
 * Missing or malformed fields are left empty; this never throws.
 */
export function extractMetadata(rawText: string): Metadata {
  const tags = new Set<string>();
  for (const tag of [...frontmatterTags(rawText), ...inlineTags(rawText)]) {
    const folded = tag.toLowerCase();
    if (folded) tags.add(folded);
  }

  return {
    subject: extractSubject(rawText),
    tags,
    id: ID_FIELD.exec(rawText)?.[1],
  };
}

export function extractSubject(rawText: string): string | undefined {
  const end = rawText.indexOf("\n");
  const firstLine = (end === -1 ? rawText : rawText.slice(0, end)).trim();
  if (!firstLine.startsWith(SUBJECT_PREFIX)) return undefined;
  return firstLine.slice(SUBJECT_PREFIX.length).trim();
}

/** Text between a leading `---` line and the next `---` line, if both exist. */
export function frontmatterBlock(rawText: string): string | undefined {
  const lines = rawText.split("\n").map((line) => line.trimEnd());
  if (lines[0] !== FRONTMATTER_DELIMITER) return undefined;

  const close = lines.indexOf(FRONTMATTER_DELIMITER, 1);
  if (close === -1) return undefined;
  return lines.slice(1, close).join("\n");
}

function frontmatterTags(rawText: string): string[] {
  const block = frontmatterBlock(rawText);
  if (block === undefined) return [];

  // Split as text: values keep their spelling (`007`, `2024-01-31`).
  const bracketed = BRACKET_TAGS.exec(block)?.[1];
  if (bracketed !== undefined) return bracketed.split(",").map(cleanTag);

  let data: Record<string, unknown>;
  try {
    // Options bypass gray-matter's per-string cache, which would replay a failed parse as `{}`.
    data = matter(`${FRONTMATTER_DELIMITER}\n${block}\n${FRONTMATTER_DELIMITER}\n`, {}).data;
  } catch {
    return [];
  }

  const declared = data.tags;
  if (!Array.isArray(declared)) return [];
  return declared
    .filter((item): item is string | number => typeof item === "string" || typeof item === "number")
    .map((item) => cleanTag(String(item)));
}

function inlineTags(rawText: string): string[] {
  return Array.from(rawText.matchAll(INLINE_TAG), (match) => match[1] ?? "");
}

function cleanTag(tag: string): string {
  return tag.trim().replace(/^["']+|["']+$/g, "");
}
