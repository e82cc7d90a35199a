import { spawn } from "node:child_process";
import type { TerminalSession } from "./terminal.ts";

export interface EditorProcess {
  once(event: "error", listener: (err: Error) => void): unknown;
  once(event: "exit", listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
}

export type SpawnEditor = (command: string, args: string[]) => EditorProcess;

export const spawnInherited: SpawnEditor = (command, args) =>
  spawn(command, args, { stdio: "inherit" });

/**
 * Run `body` with the terminal released. The terminal is reacquired on
 * every exit path, including a rejected `body`.
 */
export async function withSuspendedTerminal<T>(
  session: Pick<TerminalSession, "suspend" | "resume">,
  body: () => Promise<T>
): Promise<T> {
  session.suspend();
  try {
    return await body();
  } finally {
    session.resume();
  }
}

/**
 * Open `path` in `editor` and wait for it to exit. Rejects on spawn failure or a non-zero exit.
 *
 * `editor` is split on whitespace, so `code --wait` runs `code` with `--wait` before the path.
 * Quoting is not interpreted.
 */
export function openInEditor(
  editor: string,
  path: string,
  session: Pick<TerminalSession, "suspend" | "resume">,
  spawnEditor: SpawnEditor = spawnInherited
): Promise<void> {
  return withSuspendedTerminal(session, () => runEditor(editor, path, spawnEditor));
}

function runEditor(editor: string, path: string, spawnEditor: SpawnEditor): Promise<void> {
  return new Promise((resolve, reject) => {
    const [command = editor, ...args] = editor.split(/\s+/).filter(Boolean);
    const child = spawnEditor(command, [...args, path]);
    child.once("error", (err) => {
      reject(new Error(`Cannot start ${editor}: ${err.message}`));
    });
    child.once("exit", (code, signal) => {
      if (signal) reject(new Error(`${editor} was terminated by ${signal}`));
      else if (code !== 0) reject(new Error(`${editor} exited with code ${code}`));
      else resolve();
    });
  });
}
