import type { Frame } from "./render.ts";
import type { Event, Key, Viewport } from "./state.ts";

/** The slice of terminal-kit's `Terminal` this app drives. */
export interface TerminalLike {
  (text: string): unknown;
  readonly width: number;
  readonly height: number;
  bold(text: string): unknown;
  inverse(text: string): unknown;
  dim(text: string): unknown;
  moveTo(x: number, y: number): unknown;
  clear(): unknown;
  styleReset(): unknown;
  hideCursor(hide?: boolean): unknown;
  fullscreen(enabled: boolean): unknown;
  grabInput(enabled: boolean): unknown;
  on(event: "key", listener: (name: string) => void): unknown;
  removeListener(event: "key", listener: (name: string) => void): unknown;
}

export interface TerminalSession {
  start(): void;
  /** Hand the terminal back to the shell: leave fullscreen, stop reading keys. */
  suspend(): void;
  resume(): void;
  stop(): void;
  paint(frame: Frame): void;
  size(): Viewport;
  onKey(listener: (name: string) => void): () => void;
  onResize(listener: (viewport: Viewport) => void): () => void;
}

const KEYS = new Map<string, Key>([
  ["UP", "up"],
  ["DOWN", "down"],
  ["PAGE_UP", "pageUp"],
  ["PAGE_DOWN", "pageDown"],
  ["ENTER", "enter"],
  ["KP_ENTER", "enter"],
  ["ESCAPE", "escape"],
  ["BACKSPACE", "backspace"],
  ["CTRL_Q", "quit"],
  ["CTRL_C", "quit"],
]);

/** Translate a terminal-kit key name into a navigator event. */
export function toEvent(name: string): Event | null {
  const key = KEYS.get(name);
  if (key) return { type: "key", key };
  // Printable input arrives as the character itself.
  if ([...name].length === 1 && name >= " ") return { type: "char", char: name };
  return null;
}

export function createTerminalSession(
  term: TerminalLike,
  output: Pick<NodeJS.EventEmitter, "on" | "removeListener"> = process.stdout
): TerminalSession {
  let active = false;

  const acquire = (): void => {
    term.fullscreen(true);
    term.grabInput(true);
    term.hideCursor();
    active = true;
  };

  const release = (): void => {
    if (!active) return;
    active = false;
    term.grabInput(false);
    term.styleReset();
    term.hideCursor(false);
    term.fullscreen(false);
  };

  return {
    start: acquire,
    suspend: release,
    resume: acquire,
    stop: release,

    paint(frame) {
      if (!active) return;
      term.clear();
      for (const cell of frame.cells) {
        term.moveTo(cell.col + 1, cell.row + 1);
        switch (cell.style) {
          case "bold":
            term.bold(cell.text);
            break;
          case "inverse":
            term.inverse(cell.text);
            break;
          case "dim":
            term.dim(cell.text);
            break;
          case "normal":
            term(cell.text);
            break;
        }
      }
      term.styleReset();
    },

    size() {
      return { width: term.width, height: term.height };
    },

    onKey(listener) {
      term.on("key", listener);
      return () => {
        term.removeListener("key", listener);
      };
    },

    onResize(listener) {
      const handler = (): void => listener({ width: term.width, height: term.height });
      output.on("resize", handler);
      return () => {
        output.removeListener("resize", handler);
      };
    },
  };
}
