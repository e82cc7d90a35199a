import type { NoteMatch, Query, SearchKind, SkippedEntry } from "../vault/index.ts";

export type Mode = "menu" | "input" | "results-split" | "results-full";

export type MenuAction = { kind: "search"; search: SearchKind } | { kind: "exit" };

export interface MenuItem {
  label: string;
  action: MenuAction;
}

export const MENU_ITEMS: readonly MenuItem[] = [
  { label: "Search by Subject", action: { kind: "search", search: "subject" } },
  { label: "Search by Tag(s)", action: { kind: "search", search: "tags" } },
  { label: "Search by Date", action: { kind: "search", search: "date" } },
  { label: "Exit", action: { kind: "exit" } },
];

export interface Viewport {
  width: number;
  height: number;
}

export interface ViewState {
  readonly mode: Mode;
  readonly menuIndex: number;
  /** Query kind picked from the menu; `null` while in the menu */
  readonly searchKind: SearchKind | null;
  readonly input: string;
  readonly query: Query | null;
  readonly results: readonly NoteMatch[];
  readonly searching: boolean;
  readonly resultIndex: number;
  /** First visible line of the selected note's body */
  readonly scrollOffset: number;
  readonly knownTags: readonly string[];
  readonly viewport: Viewport;
  readonly notice: string | null;
}

export type Key = "up" | "down" | "pageUp" | "pageDown" | "enter" | "escape" | "backspace" | "quit";

export type Event =
  | { type: "key"; key: Key }
  | { type: "char"; char: string }
  | { type: "resize"; viewport: Viewport }
  | { type: "results"; matches: readonly NoteMatch[]; skipped: readonly SkippedEntry[] }
  | { type: "tags"; tags: readonly string[] }
  | { type: "notice"; message: string };

export type Command =
  | { type: "search"; query: Query }
  | { type: "collect-tags" }
  | { type: "edit"; path: string }
  | { type: "exit" };

export interface Transition {
  state: ViewState;
  command?: Command;
}

export const EDIT_CHAR = "e";

export function initialState(viewport: Viewport): ViewState {
  return {
    mode: "menu",
    menuIndex: 0,
    searchKind: null,
    input: "",
    query: null,
    results: [],
    searching: false,
    resultIndex: 0,
    scrollOffset: 0,
    knownTags: [],
    viewport,
    notice: null,
  };
}

/** Rows available to a note body: everything but the title, terms, header and status lines. */
export function bodyHeight(viewport: Viewport): number {
  return Math.max(1, viewport.height - 4);
}

export function selectedMatch(state: ViewState): NoteMatch | undefined {
  return state.results[state.resultIndex];
}

export function selectedLines(state: ViewState): string[] {
  const match = selectedMatch(state);
  return match ? match.note.rawText.split("\n") : [];
}

export function maxScroll(state: ViewState): number {
  return Math.max(0, selectedLines(state).length - bodyHeight(state.viewport));
}

export function clamp(n: number, min: number, max: number): number {
  return Math.min(Math.max(n, min), max);
}
