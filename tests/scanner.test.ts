import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtemp, rm, writeFile, mkdir } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Vault, scanNotePaths } from "../src/vault/index.ts";

/** Directories whose listing fails with EACCES. */
const denied = vi.hoisted(() => new Set<string>());

vi.mock("node:fs/promises", async (importOriginal) => {
  const actual = await importOriginal<typeof import("node:fs/promises")>();
  return {
    ...actual,
    readdir: async (...args: Parameters<typeof actual.readdir>) => {
      const dir = String(args[0]);
      if (denied.has(dir)) {
        throw Object.assign(new Error(`EACCES: permission denied, scandir '${dir}'`), { code: "EACCES" });
      }
      return actual.readdir(...args);
    },
  };
});

let vaultDir: string;

beforeEach(async () => {
  vaultDir = await mkdtemp(join(tmpdir(), "notescope-scan-"));
  await mkdir(join(vaultDir, "locked"));
  await writeFile(join(vaultDir, "locked", "secret.md"), "#secret");
  await writeFile(join(vaultDir, "open.md"), "#open");
  denied.clear();
});

afterEach(async () => {
  await rm(vaultDir, { recursive: true, force: true });
});

describe("unreadable directories", () => {
  it("are reported while the scan continues", async () => {
    denied.add(join(vaultDir, "locked"));

    const { paths, skipped } = await scanNotePaths(vaultDir);

    expect(paths).toEqual([join(vaultDir, "open.md")]);
    expect(skipped).toEqual([
      { path: join(vaultDir, "locked"), reason: `EACCES: permission denied, scandir '${join(vaultDir, "locked")}'` },
    ]);
  });

  it("are listed as skipped by a search", async () => {
    denied.add(join(vaultDir, "locked"));

    const result = await new Vault(vaultDir).search({ kind: "tags", terms: ["open", "secret"] });

    expect(result.matches.map((m) => m.note.path)).toEqual([join(vaultDir, "open.md")]);
    expect(result.skipped.map((s) => s.path)).toEqual([join(vaultDir, "locked")]);
  });

  it("are read once access is restored", async () => {
    const { paths, skipped } = await scanNotePaths(vaultDir);

    expect([...paths].sort()).toEqual([join(vaultDir, "locked", "secret.md"), join(vaultDir, "open.md")]);
    expect(skipped).toEqual([]);
  });

  it("fail the scan when the vault root is one of them", async () => {
    denied.add(vaultDir);

    await expect(scanNotePaths(vaultDir)).rejects.toThrow(`Cannot read vault root: ${vaultDir}`);
  });
});
