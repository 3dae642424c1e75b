import { existsSync } from "node:fs";
import { chmod, copyFile, mkdir, mkdtemp, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import type { Logger } from "../log.js";
import type { ActionDefinition, ActionFailure, DefaultDefinition, ResolvedSources } from "../types.js";
import { resolveSources } from "../actions/repository.js";
import type { BundleCompiler } from "./compiler.js";
import { iconSlotPath, scriptSlotPath } from "./layout.js";
import { removeArtifact } from "./remover.js";

export interface BuildBundleInput {
  definition: ActionDefinition;
  defaults: DefaultDefinition;
  targetPath: string;
  compiler: BundleCompiler;
  useTrash: boolean;
  logger: Logger;
}

export type BuildBundleResult = { ok: true; path: string; sources: ResolvedSources } | ActionFailure;

const failBuild = (error: string): ActionFailure => ({ ok: false, code: "build_error", error });

const describeError = (error: unknown): string => (error instanceof Error ? error.message : String(error));

const compileLaunchScript = async (input: {
  launchScript: string;
  targetPath: string;
  compiler: BundleCompiler;
}): Promise<{ ok: true } | { ok: false; error: string }> => {
  const scratchDir = await mkdtemp(path.join(os.tmpdir(), "switch-actions-"));
  try {
    const sourcePath = path.join(scratchDir, "launch-entry.applescript");
    await copyFile(input.launchScript, sourcePath);
    return await input.compiler.compile({ sourcePath, targetPath: input.targetPath });
  } finally {
    await rm(scratchDir, { recursive: true, force: true });
  }
};

export const buildBundle = async (input: BuildBundleInput): Promise<BuildBundleResult> => {
  const { definition, targetPath, logger } = input;
  const sources = resolveSources(definition, input.defaults);

  const removed = await removeArtifact(targetPath, { useTrash: input.useTrash, logger });
  if (!removed.ok) {
    return failBuild(`could not remove existing bundle at ${targetPath}: ${removed.error}`);
  }

  logger.debug("compiling launch script", { action: definition.id, source: sources.launchScript.path });
  try {
    await mkdir(path.dirname(targetPath), { recursive: true });
    const compiled = await compileLaunchScript({
      launchScript: sources.launchScript.path,
      targetPath,
      compiler: input.compiler,
    });
    if (!compiled.ok) {
      return failBuild(`could not compile ${definition.displayName}: ${compiled.error}`);
    }
  } catch (error) {
    return failBuild(`could not compile ${definition.displayName}: ${describeError(error)}`);
  }
  if (!existsSync(targetPath)) {
    return failBuild(`compiler produced nothing at ${targetPath}.`);
  }

  try {
    const scriptSlot = scriptSlotPath(targetPath);
    await mkdir(path.dirname(scriptSlot), { recursive: true });
    await copyFile(sources.payloadScript.path, scriptSlot);
    await chmod(scriptSlot, 0o755);
    logger.debug("payload injected", { from: sources.payloadScript.origin });

    const iconSlot = iconSlotPath(targetPath);
    await mkdir(path.dirname(iconSlot), { recursive: true });
    await copyFile(sources.icon.path, iconSlot);
    logger.debug("icon injected", { from: sources.icon.origin });
  } catch (error) {
    return failBuild(`could not finish ${targetPath}: ${describeError(error)}`);
  }

  return { ok: true, path: targetPath, sources };
};
