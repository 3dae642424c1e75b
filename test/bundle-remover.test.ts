import { existsSync } from "node:fs";
import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import { removeArtifact } from "../src/bundles/remover.js";
import { silentLogger } from "../src/log.js";
import { clearExecutableProbeCache } from "../src/process/executable-probe.js";
import { createMemoryLogger, prependPath, writeScript } from "./helpers.js";

const createBundle = async (target: string) => {
  await mkdir(path.join(target, "Contents"), { recursive: true });
  await writeFile(path.join(target, "Contents", "Info.plist"), "<plist/>");
};

describe("bundles/remover", () => {
  afterEach(() => {
    clearExecutableProbeCache();
  });

  it("does nothing for a missing target", async () => {
    const root = await mkdtemp(path.join(os.tmpdir(), "switch-actions-remove-"));
    try {
      const result = await removeArtifact(path.join(root, "Sleep.app"), { useTrash: false, logger: silentLogger });
      expect(result).toEqual({ ok: true, removed: false, method: "none" });
    } finally {
      await rm(root, { recursive: true, force: true });
    }
  });

  it("deletes a bundle directory when trash is disabled", async () => {
    const root = await mkdtemp(path.join(os.tmpdir(), "switch-actions-remove-"));
    try {
      const target = path.join(root, "Sleep.app");
      await mkdir(path.join(target, "Contents"), { recursive: true });
      await writeFile(path.join(target, "Contents", "Info.plist"), "<plist/>");

      const result = await removeArtifact(target, { useTrash: false, logger: silentLogger });

      expect(result).toEqual({ ok: true, removed: true, method: "delete" });
      expect(existsSync(target)).toBe(false);
    } finally {
      await rm(root, { recursive: true, force: true });
    }
  });

  it("moves the bundle with the trash command when one is on PATH", async () => {
    const root = await mkdtemp(path.join(os.tmpdir(), "switch-actions-remove-"));
    const binDir = path.join(root, "bin");
    const trashDir = path.join(root, "Trash");
    await mkdir(trashDir);
    await writeScript(binDir, "trash", `mv "$1" "${trashDir}/"\n`);
    const restorePath = prependPath(binDir);
    clearExecutableProbeCache();
    try {
      const target = path.join(root, "Sleep.app");
      await createBundle(target);

      const result = await removeArtifact(target, { useTrash: true, logger: silentLogger });

      expect(result).toEqual({ ok: true, removed: true, method: "trash" });
      expect(existsSync(target)).toBe(false);
      expect(existsSync(path.join(trashDir, "Sleep.app", "Contents", "Info.plist"))).toBe(true);
    } finally {
      restorePath();
      await rm(root, { recursive: true, force: true });
    }
  });

  it("deletes the bundle with a warning when the trash command fails", async () => {
    const root = await mkdtemp(path.join(os.tmpdir(), "switch-actions-remove-"));
    const binDir = path.join(root, "bin");
    await writeScript(binDir, "trash", "exit 2\n");
    const restorePath = prependPath(binDir);
    clearExecutableProbeCache();
    try {
      const target = path.join(root, "Sleep.app");
      await createBundle(target);
      const { logger, output } = createMemoryLogger();

      const result = await removeArtifact(target, { useTrash: true, logger });

      expect(result).toEqual({ ok: true, removed: true, method: "delete" });
      expect(existsSync(target)).toBe(false);
      expect(output.warn).toEqual([`trash failed for ${target}; deleting instead`]);
    } finally {
      restorePath();
      await rm(root, { recursive: true, force: true });
    }
  });

  it("skips the trash command when trash is disabled", async () => {
    const root = await mkdtemp(path.join(os.tmpdir(), "switch-actions-remove-"));
    const binDir = path.join(root, "bin");
    const marker = path.join(root, "trash-called");
    await writeScript(binDir, "trash", `touch "${marker}"\nexit 1\n`);
    const restorePath = prependPath(binDir);
    clearExecutableProbeCache();
    try {
      const target = path.join(root, "Sleep.app");
      await createBundle(target);

      const result = await removeArtifact(target, { useTrash: false, logger: silentLogger });

      expect(result).toEqual({ ok: true, removed: true, method: "delete" });
      expect(existsSync(marker)).toBe(false);
    } finally {
      restorePath();
      await rm(root, { recursive: true, force: true });
    }
  });
});
