import { existsSync } from "node:fs";
import { readdir, stat } from "node:fs/promises";
import path from "node:path";

import {
  bundlePathFor,
  DEFAULT_DEFINITION_NAME,
  definitionDirFor,
  definitionFiles,
  type ActionsConfig,
} from "../config.js";
import type {
  ActionDefinition,
  ActionFailure,
  ActionListEntry,
  ArtifactKind,
  DefaultDefinition,
  ResolvedSources,
} from "../types.js";
import { nameToId, toDisplayName } from "./names.js";

type RepositoryConfig = Pick<ActionsConfig, "repositoryRoot" | "definitionSuffix">;

export type ResolveActionResult = { ok: true; definition: ActionDefinition } | ActionFailure;

export type ResolveDefaultResult = { ok: true; defaults: DefaultDefinition } | ActionFailure;

const isDirectory = async (target: string): Promise<boolean> => {
  try {
    return (await stat(target)).isDirectory();
  } catch {
    return false;
  }
};

const fileIfPresent = async (target: string): Promise<string | undefined> => {
  try {
    return (await stat(target)).isFile() ? target : undefined;
  } catch {
    return undefined;
  }
};

const isUnsafeName = (displayName: string): boolean => {
  return displayName.includes("/") || displayName.includes("\\") || displayName.includes("\0") || displayName === "." || displayName === "..";
};

const isDefaultName = (displayName: string): boolean => nameToId(displayName) === nameToId(DEFAULT_DEFINITION_NAME);

const readRepositoryNames = async (repositoryRoot: string): Promise<string[]> => {
  try {
    return await readdir(repositoryRoot);
  } catch {
    return [];
  }
};

// The on-disk spelling wins: "LOGIN WINDOW" resolves to "Login Window.action" and keeps that name.
const findDefinitionName = async (config: RepositoryConfig, displayName: string): Promise<string | undefined> => {
  const wanted = `${displayName}${config.definitionSuffix}`;
  const names = await readRepositoryNames(config.repositoryRoot);
  const match = names.find((name) => name === wanted) ?? names.find((name) => name.toLowerCase() === wanted.toLowerCase());
  if (!match || !(await isDirectory(path.resolve(config.repositoryRoot, match)))) {
    return undefined;
  }
  return match.slice(0, match.length - config.definitionSuffix.length);
};

export const resolveAction = async (config: RepositoryConfig, idOrName: string): Promise<ResolveActionResult> => {
  const input = String(idOrName || "").trim();
  if (!input) {
    return { ok: false, code: "missing_argument", error: "an action id is required." };
  }

  const requestedName = toDisplayName(input);
  const notFound: ActionFailure = { ok: false, code: "not_found", error: `no action named "${input}".` };
  if (isUnsafeName(requestedName) || isDefaultName(requestedName)) {
    return notFound;
  }

  const displayName = await findDefinitionName(config, requestedName);
  if (!displayName || isDefaultName(displayName)) {
    return notFound;
  }
  const definitionDir = definitionDirFor(config, displayName);

  const [launchScript, payloadScript, icon, installHook, uninstallHook] = await Promise.all([
    fileIfPresent(path.join(definitionDir, definitionFiles.launchScript)),
    fileIfPresent(path.join(definitionDir, definitionFiles.payloadScript)),
    fileIfPresent(path.join(definitionDir, definitionFiles.icon)),
    fileIfPresent(path.join(definitionDir, definitionFiles.installHook)),
    fileIfPresent(path.join(definitionDir, definitionFiles.uninstallHook)),
  ]);

  return {
    ok: true,
    definition: {
      id: nameToId(displayName),
      displayName,
      definitionDir,
      ...(launchScript ? { launchScript } : {}),
      ...(payloadScript ? { payloadScript } : {}),
      ...(icon ? { icon } : {}),
      ...(installHook ? { installHook } : {}),
      ...(uninstallHook ? { uninstallHook } : {}),
    },
  };
};

export const resolveDefaultDefinition = async (config: RepositoryConfig): Promise<ResolveDefaultResult> => {
  const definitionDir = definitionDirFor(config, DEFAULT_DEFINITION_NAME);
  const [launchScript, payloadScript, icon] = await Promise.all([
    fileIfPresent(path.join(definitionDir, definitionFiles.launchScript)),
    fileIfPresent(path.join(definitionDir, definitionFiles.payloadScript)),
    fileIfPresent(path.join(definitionDir, definitionFiles.icon)),
  ]);
  if (!launchScript || !payloadScript || !icon) {
    const missing = [
      launchScript ? null : definitionFiles.launchScript,
      payloadScript ? null : definitionFiles.payloadScript,
      icon ? null : definitionFiles.icon,
    ].filter(Boolean);
    return {
      ok: false,
      code: "build_error",
      error: `default definition at ${definitionDir} is missing ${missing.join(", ")}.`,
    };
  }
  return { ok: true, defaults: { definitionDir, launchScript, payloadScript, icon } };
};

export const resolveSources = (definition: ActionDefinition, defaults: DefaultDefinition): ResolvedSources => {
  const pick = (kind: ArtifactKind) => {
    const override = definition[kind];
    return override ? { path: override, origin: "override" as const } : { path: defaults[kind], origin: "default" as const };
  };
  return {
    launchScript: pick("launchScript"),
    payloadScript: pick("payloadScript"),
    icon: pick("icon"),
  };
};

export const listActions = async (
  config: RepositoryConfig & Pick<ActionsConfig, "installRoot" | "bundleSuffix">,
): Promise<ActionListEntry[]> => {
  const entries: ActionListEntry[] = [];
  for (const name of await readRepositoryNames(config.repositoryRoot)) {
    if (!name.endsWith(config.definitionSuffix)) {
      continue;
    }
    const displayName = name.slice(0, name.length - config.definitionSuffix.length);
    if (!displayName || isDefaultName(displayName)) {
      continue;
    }
    // stat follows symlinks, so a linked definition lists the same way it resolves
    if (!(await isDirectory(path.resolve(config.repositoryRoot, name)))) {
      continue;
    }
    entries.push({
      id: nameToId(displayName),
      displayName,
      installed: existsSync(bundlePathFor(config, displayName)),
    });
  }
  return entries;
};
