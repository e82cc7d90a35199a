import { basename } from "node:path";
import { describeQuery, type NoteMatch } from "../vault/index.ts";
import { MENU_ITEMS, bodyHeight, selectedLines, selectedMatch, type ViewState } from "./state.ts";

export type CellStyle = "normal" | "bold" | "inverse" | "dim";

/** A run of text at a zero-based screen position. */
export interface Cell {
  row: number;
  col: number;
  text: string;
  style: CellStyle;
}

export interface Frame {
  cells: Cell[];
}

export const TITLE = "Vault Search";

const INSTRUCTIONS = {
  menu: "Use ↑↓ arrows to navigate, Enter to select, Ctrl+Q to exit",
  input: "Enter to search, Esc to cancel, Ctrl+Q to exit",
  "results-split": "↑↓ select, Enter full view, PgUp/PgDn scroll, e edit, Esc back, Ctrl+Q exit",
  "results-full": "↑↓ PgUp/PgDn scroll, Enter split view, e edit, Esc back, Ctrl+Q exit",
} as const;

const PROMPTS = {
  subject: "Enter search term:",
  tags: "Enter tags (comma-separated):",
  date: "Enter date or ID prefix (YYYY, YYYYMM, YYYYMMDD-HHMM):",
} as const;

/** Project the view state onto the screen. */
export function renderFrame(state: ViewState): Frame {
  const cells: Cell[] = [];
  switch (state.mode) {
    case "menu":
      renderMenu(state, cells);
      break;
    case "input":
      renderInput(state, cells);
      break;
    case "results-split":
    case "results-full":
      renderResults(state, cells);
      break;
  }

  const { width, height } = state.viewport;
  const footer = state.notice ?? INSTRUCTIONS[state.mode];
  cells.push(centered(height - 1, footer, width, state.notice ? "bold" : "normal"));

  return { cells: cells.filter((c) => c.row >= 0 && c.row < height && c.text.length > 0) };
}

function renderMenu(state: ViewState, cells: Cell[]): void {
  const { width, height } = state.viewport;
  cells.push(centered(1, TITLE, width, "bold"));

  const top = Math.floor(height / 2) - Math.floor(MENU_ITEMS.length / 2);
  MENU_ITEMS.forEach((item, idx) => {
    cells.push(centered(top + idx, item.label, width, idx === state.menuIndex ? "inverse" : "normal"));
  });
}

function renderInput(state: ViewState, cells: Cell[]): void {
  const { width } = state.viewport;
  const kind = state.searchKind ?? "subject";
  cells.push(centered(1, PROMPTS[kind], width, "normal"));

  const boxWidth = Math.max(2, width - 4);
  const inner = boxWidth - 2;
  const typed = `${state.input}_`;
  const visible = typed.length > inner ? typed.slice(typed.length - inner) : typed.padEnd(inner);
  cells.push(
    { row: 3, col: 2, text: `┌${"─".repeat(inner)}┐`, style: "normal" },
    { row: 4, col: 2, text: `│${visible}│`, style: "normal" },
    { row: 5, col: 2, text: `└${"─".repeat(inner)}┘`, style: "normal" }
  );

  if (kind === "tags" && state.knownTags.length > 0) {
    cells.push({
      row: 7,
      col: 2,
      text: truncate(`Known tags: ${state.knownTags.join(", ")}`, width - 4),
      style: "dim",
    });
  }
}

function renderResults(state: ViewState, cells: Cell[]): void {
  const { width, height } = state.viewport;
  const title = state.searching ? "Searching..." : `Found ${state.results.length} results`;
  cells.push(centered(0, title, width, "bold"));
  if (state.query) {
    cells.push(centered(1, `Search terms: ${describeQuery(state.query)}`, width, "normal"));
  }

  const split = state.mode === "results-split";
  const leftWidth = Math.floor(width / 2);
  const paneCol = split ? leftWidth + 2 : 2;
  const paneWidth = split ? width - leftWidth : width;

  if (split) {
    for (let row = 2; row <= height - 2; row++) {
      cells.push({ row, col: leftWidth, text: "│", style: "normal" });
    }
    renderList(state, leftWidth, cells);
  }

  const match = selectedMatch(state);
  if (!match) return;

  cells.push({ row: 2, col: paneCol, text: truncate(noteHeader(match), paneWidth - 4), style: "bold" });
  const visible = selectedLines(state).slice(state.scrollOffset, state.scrollOffset + bodyHeight(state.viewport));
  visible.forEach((line, idx) => {
    cells.push({ row: 3 + idx, col: paneCol, text: truncate(cleanLine(line), paneWidth - 4), style: "normal" });
  });
}

function renderList(state: ViewState, leftWidth: number, cells: Cell[]): void {
  if (!state.searching && state.results.length === 0) {
    cells.push({ row: 2, col: 2, text: truncate("No matches", leftWidth - 4), style: "dim" });
    return;
  }

  const listHeight = Math.max(1, state.viewport.height - 3);
  const start = Math.max(0, state.resultIndex - listHeight + 1);
  const end = Math.min(state.results.length, start + listHeight);

  for (let idx = start; idx < end; idx++) {
    const match = state.results[idx];
    if (!match) continue;
    cells.push({
      row: 2 + idx - start,
      col: 2,
      text: truncate(listLabel(match), leftWidth - 4),
      style: idx === state.resultIndex ? "inverse" : "normal",
    });
  }
}

function listLabel(match: NoteMatch): string {
  const fileName = basename(match.note.path);
  return match.metadata.subject ? `${match.metadata.subject} (${fileName})` : fileName;
}

function noteHeader(match: NoteMatch): string {
  return `Note: ${basename(match.note.path)}  (modified ${formatDate(match.note.modifiedTime)})`;
}

/** Local calendar date as YYYY-MM-DD. */
export function formatDate(date: Date): string {
  const month = String(date.getMonth() + 1).padStart(2, "0");
  const day = String(date.getDate()).padStart(2, "0");
  return `${date.getFullYear()}-${month}-${day}`;
}

/** Cut `text` to `max` characters, marking the cut with "...". */
export function truncate(text: string, max: number): string {
  if (max <= 0) return "";
  if (text.length <= max) return text;
  if (max <= 3) return text.slice(0, max);
  return `${text.slice(0, max - 3)}...`;
}

function centered(row: number, text: string, width: number, style: CellStyle): Cell {
  const shown = truncate(text, width);
  return { row, col: Math.max(0, Math.floor((width - shown.length) / 2)), text: shown, style };
}

function cleanLine(line: string): string {
  return line.replace(/\r$/, "").replace(/\t/g, "    ");
}
