import { describeError, type Vault } from "../vault/index.ts";
import { transition } from "./navigator.ts";
import { renderFrame } from "./render.ts";
import { initialState, type Command, type Event } from "./state.ts";
import { toEvent, type TerminalSession } from "./terminal.ts";

export interface AppOptions {
  vault: Pick<Vault, "search" | "tags">;
  session: TerminalSession;
  /** Open a note in the external editor; the terminal is released meanwhile. */
  openEditor: (path: string) => Promise<void>;
}

/**
 * Run the interactive session until the user exits.
 *
 * Events are handled one at a time: a key pressed while a search or the
 * editor is running waits for it to finish. Rejects when a command fails in
 * a way the UI cannot recover from, such as the vault root disappearing.
 */
export async function runApp({ vault, session, openEditor }: AppOptions): Promise<void> {
  let state = initialState(session.size());
  const unsubscribe: Array<() => void> = [];

  session.start();
  try {
    await new Promise<void>((resolve, reject) => {
      let finished = false;
      let queue: Promise<void> = Promise.resolve();

      const dispatch = async (event: Event): Promise<void> => {
        const next = transition(state, event);
        state = next.state;
        session.paint(renderFrame(state));
        if (next.command) await execute(next.command);
      };

      const execute = async (command: Command): Promise<void> => {
        switch (command.type) {
          case "exit":
            finished = true;
            resolve();
            return;

          case "search": {
            const result = await vault.search(command.query);
            await dispatch({ type: "results", matches: result.matches, skipped: result.skipped });
            return;
          }

          case "collect-tags": {
            const index = await vault.tags();
            await dispatch({ type: "tags", tags: index.tags });
            return;
          }

          case "edit":
            try {
              await openEditor(command.path);
              session.paint(renderFrame(state));
            } catch (err) {
              await dispatch({ type: "notice", message: `Editor failed: ${describeError(err)}` });
            }
            return;
        }
      };

      const enqueue = (event: Event): void => {
        queue = queue
          .then(() => (finished ? undefined : dispatch(event)))
          .catch((err: unknown) => {
            finished = true;
            reject(err);
          });
      };

      unsubscribe.push(
        session.onKey((name) => {
          const event = toEvent(name);
          if (event) enqueue(event);
        }),
        session.onResize((viewport) => enqueue({ type: "resize", viewport }))
      );
      session.paint(renderFrame(state));
    });
  } finally {
    for (const off of unsubscribe) off();
    session.stop();
  }
}
