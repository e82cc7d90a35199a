import { parseQuery } from "../vault/index.ts";
import {
  EDIT_CHAR,
  MENU_ITEMS,
  bodyHeight,
  clamp,
  maxScroll,
  selectedMatch,
  type Event,
  type Key,
  type Transition,
  type ViewState,
} from "./state.ts";

/** Apply one input or completion event to the view state. */
export function transition(state: ViewState, event: Event): Transition {
  switch (event.type) {
    case "key":
      if (event.key === "quit") return { state, command: { type: "exit" } };
      return onKey({ ...state, notice: null }, event.key);

    case "char":
      return onChar({ ...state, notice: null }, event.char);

    case "resize":
      return { state: withinBounds({ ...state, viewport: event.viewport }) };

    case "results": {
      if (!state.searching) return { state };
      const notice =
        event.skipped.length > 0
          ? `Skipped ${event.skipped.length} unreadable ${event.skipped.length === 1 ? "entry" : "entries"}`
          : state.notice;
      return {
        state: withinBounds({ ...state, results: event.matches, searching: false, notice }),
      };
    }

    case "tags":
      return { state: { ...state, knownTags: event.tags } };

    case "notice":
      return { state: { ...state, notice: event.message } };
  }
}

function onKey(state: ViewState, key: Key): Transition {
  switch (state.mode) {
    case "menu":
      return onMenuKey(state, key);
    case "input":
      return onInputKey(state, key);
    case "results-split":
      return onSplitKey(state, key);
    case "results-full":
      return onFullKey(state, key);
  }
}

function onChar(state: ViewState, char: string): Transition {
  if (state.mode === "input") {
    return { state: { ...state, input: state.input + char } };
  }
  if ((state.mode === "results-split" || state.mode === "results-full") && char === EDIT_CHAR) {
    const match = selectedMatch(state);
    if (match) return { state, command: { type: "edit", path: match.note.path } };
  }
  return { state };
}

function onMenuKey(state: ViewState, key: Key): Transition {
  switch (key) {
    case "up":
      return { state: { ...state, menuIndex: clamp(state.menuIndex - 1, 0, MENU_ITEMS.length - 1) } };
    case "down":
      return { state: { ...state, menuIndex: clamp(state.menuIndex + 1, 0, MENU_ITEMS.length - 1) } };
    case "enter": {
      const item = MENU_ITEMS[state.menuIndex];
      if (!item) return { state };
      if (item.action.kind === "exit") return { state, command: { type: "exit" } };

      const next: ViewState = { ...state, mode: "input", searchKind: item.action.search, input: "" };
      return item.action.search === "tags"
        ? { state: next, command: { type: "collect-tags" } }
        : { state: next };
    }
    default:
      return { state };
  }
}

function onInputKey(state: ViewState, key: Key): Transition {
  switch (key) {
    case "backspace":
      return { state: { ...state, input: [...state.input].slice(0, -1).join("") } };
    case "escape":
      return { state: toMenu(state) };
    case "enter": {
      const query = state.searchKind ? parseQuery(state.searchKind, state.input) : null;
      if (!query) return { state: toMenu(state) };
      return {
        state: {
          ...state,
          mode: "results-split",
          query,
          results: [],
          searching: true,
          resultIndex: 0,
          scrollOffset: 0,
        },
        command: { type: "search", query },
      };
    }
    default:
      return { state };
  }
}

function onSplitKey(state: ViewState, key: Key): Transition {
  switch (key) {
    case "up":
    case "down": {
      const step = key === "up" ? -1 : 1;
      const resultIndex = clamp(state.resultIndex + step, 0, Math.max(0, state.results.length - 1));
      if (resultIndex === state.resultIndex) return { state };
      return { state: { ...state, resultIndex, scrollOffset: 0 } };
    }
    case "pageUp":
    case "pageDown":
      return { state: scrollBy(state, pageStep(state, key)) };
    case "enter":
      if (!selectedMatch(state)) return { state };
      return { state: { ...state, mode: "results-full" } };
    case "escape":
      return { state: toMenu(state) };
    default:
      return { state };
  }
}

function onFullKey(state: ViewState, key: Key): Transition {
  switch (key) {
    case "up":
      return { state: scrollBy(state, -1) };
    case "down":
      return { state: scrollBy(state, 1) };
    case "pageUp":
    case "pageDown":
      return { state: scrollBy(state, pageStep(state, key)) };
    case "enter":
      return { state: { ...state, mode: "results-split", scrollOffset: 0 } };
    case "escape":
      return { state: { ...state, mode: "results-split" } };
    default:
      return { state };
  }
}

function pageStep(state: ViewState, key: "pageUp" | "pageDown"): number {
  const page = bodyHeight(state.viewport);
  return key === "pageUp" ? -page : page;
}

function scrollBy(state: ViewState, delta: number): ViewState {
  return { ...state, scrollOffset: clamp(state.scrollOffset + delta, 0, maxScroll(state)) };
}

function toMenu(state: ViewState): ViewState {
  return {
    ...state,
    mode: "menu",
    searchKind: null,
    input: "",
    query: null,
    results: [],
    searching: false,
    resultIndex: 0,
    scrollOffset: 0,
  };
}

/** Re-clamp the cursors after the result set or the viewport changed. */
function withinBounds(state: ViewState): ViewState {
  const resultIndex = clamp(state.resultIndex, 0, Math.max(0, state.results.length - 1));
  const clamped = { ...state, resultIndex };
  return { ...clamped, scrollOffset: clamp(state.scrollOffset, 0, maxScroll(clamped)) };
}
