import { stat } from "node:fs/promises";
import { join, resolve } from "node:path";
import { z } from "zod";
import { describeError } from "./vault/index.ts";

export const DEFAULT_VAULT_DIR = "obsidian";
export const DEFAULT_EDITOR = "nvim";

const configSchema = z.object({
  vaultPath: z
    .string()
    .min(1)
    .describe("Root directory of the notes vault")
    .transform((path) => resolve(path)),
  editor: z.string().min(1).describe("Executable used to edit a note"),
});

export type Config = z.output<typeof configSchema>;

type Env = Record<string, string | undefined>;

/**
 * Resolve settings from the environment and command line.
 *
 * The vault comes from NOTESCOPE_VAULT, then the first argument, then
 * `~/obsidian`. The editor from NOTESCOPE_EDITOR, VISUAL, EDITOR, then nvim.
 */
export function loadConfig(env: Env, args: readonly string[], home: string): Config {
  const vault = nonEmpty(env.NOTESCOPE_VAULT) ?? nonEmpty(args[0]) ?? join(home, DEFAULT_VAULT_DIR);
  const editor =
    nonEmpty(env.NOTESCOPE_EDITOR) ?? nonEmpty(env.VISUAL) ?? nonEmpty(env.EDITOR) ?? DEFAULT_EDITOR;

  return configSchema.parse({ vaultPath: expandHome(vault, home), editor });
}

export function expandHome(path: string, home: string): string {
  if (path === "~") return home;
  if (path.startsWith("~/")) return join(home, path.slice(2));
  return path;
}

/** Fail unless the vault root exists and is a directory. */
export async function assertVaultRoot(vaultPath: string): Promise<void> {
  let isDirectory: boolean;
  try {
    isDirectory = (await stat(vaultPath)).isDirectory();
  } catch (err) {
    throw new Error(`Vault not found: ${vaultPath} (${describeError(err)})`);
  }
  if (!isDirectory) {
    throw new Error(`Vault is not a directory: ${vaultPath}`);
  }
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}
