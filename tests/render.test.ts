import { describe, it, expect } from "vitest";
import { formatDate, renderFrame, truncate, type Cell } from "../src/tui/render.ts";
import { initialState, type ViewState } from "../src/tui/state.ts";
import type { NoteMatch } from "../src/vault/index.ts";

const viewport = { width: 40, height: 12 };

function state(fields: Partial<ViewState>): ViewState {
  return { ...initialState(viewport), ...fields };
}

function note(path: string, rawText: string, subject?: string): NoteMatch {
  return {
    note: { path, rawText, modifiedTime: new Date(2024, 0, 31) },
    metadata: { subject, tags: new Set<string>() },
  };
}

function at(cells: Cell[], row: number, col: number): Cell | undefined {
  return cells.find((c) => c.row === row && c.col === col);
}

describe("truncate", () => {
  it("keeps short text", () => {
    expect(truncate("short", 10)).toBe("short");
  });

  it("marks cut text with an ellipsis", () => {
    expect(truncate("Quarterly Report", 10)).toBe("Quarter...");
  });

  it("cuts without an ellipsis when there is no room for one", () => {
    expect(truncate("abcdef", 2)).toBe("ab");
    expect(truncate("abcdef", 0)).toBe("");
  });
});

describe("formatDate", () => {
  it("formats a local date", () => {
    expect(formatDate(new Date(2024, 0, 5))).toBe("2024-01-05");
  });
});

describe("menu frame", () => {
  it("centers the title and the items", () => {
    const { cells } = renderFrame(state({}));

    expect(at(cells, 1, 14)).toEqual({ row: 1, col: 14, text: "Vault Search", style: "bold" });
    expect(at(cells, 4, 11)).toEqual({ row: 4, col: 11, text: "Search by Subject", style: "inverse" });
    expect(at(cells, 7, 18)).toEqual({ row: 7, col: 18, text: "Exit", style: "normal" });
  });

  it("highlights the selected item", () => {
    const { cells } = renderFrame(state({ menuIndex: 3 }));

    expect(at(cells, 7, 18)?.style).toBe("inverse");
    expect(at(cells, 4, 11)?.style).toBe("normal");
  });

  it("shows a notice in place of the instructions", () => {
    const { cells } = renderFrame(state({ notice: "Editor failed: boom" }));

    expect(cells.filter((c) => c.row === 11)).toEqual([
      { row: 11, col: 10, text: "Editor failed: boom", style: "bold" },
    ]);
  });
});

describe("input frame", () => {
  it("draws the prompt, the input box and the known tags", () => {
    const { cells } = renderFrame(
      state({ mode: "input", searchKind: "tags", input: "fin", knownTags: ["finance", "q1"] })
    );

    expect(at(cells, 1, 5)?.text).toBe("Enter tags (comma-separated):");
    expect(at(cells, 3, 2)?.text).toBe(`┌${"─".repeat(34)}┐`);
    expect(at(cells, 4, 2)?.text).toBe(`│${"fin_".padEnd(34)}│`);
    expect(at(cells, 5, 2)?.text).toBe(`└${"─".repeat(34)}┘`);
    expect(at(cells, 7, 2)).toEqual({ row: 7, col: 2, text: "Known tags: finance, q1", style: "dim" });
  });

  it("shows the end of input longer than the box", () => {
    const { cells } = renderFrame(state({ mode: "input", searchKind: "subject", input: "x".repeat(40) }));

    expect(at(cells, 4, 2)?.text).toBe(`│${"x".repeat(33)}_│`);
  });

  it("omits the tag hint for other searches", () => {
    const { cells } = renderFrame(state({ mode: "input", searchKind: "date", knownTags: ["a"] }));

    expect(cells.some((c) => c.row === 7)).toBe(false);
  });
});

describe("results frame", () => {
  const results = [
    note("/v/quarterly.md", "SUBJECT=Quarterly Report\nline two\n\tTabbed", "Quarterly Report"),
    note("/v/b.md", "plain"),
  ];
  const split = state({
    mode: "results-split",
    searchKind: "subject",
    query: { kind: "subject", term: "report" },
    results,
  });

  it("draws the title and the search terms", () => {
    const { cells } = renderFrame(split);

    expect(at(cells, 0, 12)).toEqual({ row: 0, col: 12, text: "Found 2 results", style: "bold" });
    expect(at(cells, 1, 5)?.text).toBe("Search terms: Subject: report");
  });

  it("lists matches in the left pane with the selection highlighted", () => {
    const { cells } = renderFrame(split);

    expect(at(cells, 2, 2)).toEqual({ row: 2, col: 2, text: "Quarterly Rep...", style: "inverse" });
    expect(at(cells, 3, 2)).toEqual({ row: 3, col: 2, text: "b.md", style: "normal" });
  });

  it("separates the panes", () => {
    const { cells } = renderFrame(split);

    expect(cells.filter((c) => c.col === 20 && c.text === "│").map((c) => c.row)).toEqual([
      2, 3, 4, 5, 6, 7, 8, 9, 10,
    ]);
  });

  it("previews the selected note in the right pane", () => {
    const { cells } = renderFrame(split);

    expect(at(cells, 2, 22)).toEqual({ row: 2, col: 22, text: "Note: quarter...", style: "bold" });
    expect(at(cells, 3, 22)?.text).toBe("SUBJECT=Quart...");
    expect(at(cells, 4, 22)?.text).toBe("line two");
    expect(at(cells, 5, 22)?.text).toBe("    Tabbed");
  });

  it("starts the preview at the scroll offset", () => {
    const { cells } = renderFrame({ ...split, scrollOffset: 1 });

    expect(at(cells, 3, 22)?.text).toBe("line two");
  });

  it("uses the whole width in full view", () => {
    const { cells } = renderFrame({ ...split, mode: "results-full" });

    expect(at(cells, 2, 2)).toEqual({
      row: 2,
      col: 2,
      text: "Note: quarterly.md  (modified 202...",
      style: "bold",
    });
    expect(at(cells, 3, 2)?.text).toBe("SUBJECT=Quarterly Report");
    expect(cells.some((c) => c.text === "│")).toBe(false);
  });

  it("scrolls the list to keep the selection visible", () => {
    const many = Array.from({ length: 15 }, (_, i) => note(`/v/n${i}.md`, "body"));
    const { cells } = renderFrame({ ...split, results: many, resultIndex: 12 });

    expect(at(cells, 2, 2)?.text).toBe("n4.md");
    expect(at(cells, 10, 2)).toEqual({ row: 10, col: 2, text: "n12.md", style: "inverse" });
  });

  it("says so when nothing matched", () => {
    const { cells } = renderFrame({ ...split, results: [] });

    expect(at(cells, 0, 12)?.text).toBe("Found 0 results");
    expect(at(cells, 2, 2)).toEqual({ row: 2, col: 2, text: "No matches", style: "dim" });
  });

  it("shows progress while searching", () => {
    const { cells } = renderFrame({ ...split, results: [], searching: true });

    expect(at(cells, 0, 14)?.text).toBe("Searching...");
    expect(cells.some((c) => c.text === "No matches")).toBe(false);
  });
});
