#!/usr/bin/env tsx
import { homedir } from "node:os";
import terminalKit from "terminal-kit";
import { assertVaultRoot, loadConfig } from "./config.ts";
import { runApp } from "./tui/app.ts";
import { openInEditor } from "./tui/editor.ts";
import { createTerminalSession } from "./tui/terminal.ts";
import { Vault, describeError } from "./vault/index.ts";

const args = process.argv.slice(2);

if (args.includes("-h") || args.includes("--help")) {
  console.log(
    "Usage: notescope [vault-path]\n\n" +
      "  NOTESCOPE_VAULT   vault directory (default ~/obsidian)\n" +
      "  NOTESCOPE_EDITOR  editor command (default $VISUAL, $EDITOR, nvim)"
  );
  process.exit(0);
}

try {
  const config = loadConfig(process.env, args, homedir());
  await assertVaultRoot(config.vaultPath);

  const session = createTerminalSession(terminalKit.terminal);
  await runApp({
    vault: new Vault(config.vaultPath),
    session,
    openEditor: (path) => openInEditor(config.editor, path, session),
  });
  process.exit(0);
} catch (err) {
  console.error(`notescope: ${describeError(err)}`);
  process.exit(1);
}
