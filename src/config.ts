import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";

import { z } from "zod";

const currentFile = fileURLToPath(import.meta.url);
const srcDir = path.dirname(currentFile);
const parentDir = path.resolve(srcDir, "..");
// compiled output lives in dist/src, sources in src
export const projectRoot = path.basename(parentDir) === "dist" ? path.resolve(parentDir, "..") : parentDir;
export const defaultRepositoryRoot = path.resolve(projectRoot, "actions");
export const defaultInstallRoot = path.resolve(os.homedir(), "Applications", "Switch Actions");

export const DEFINITION_SUFFIX = ".action";
export const BUNDLE_SUFFIX = ".app";
export const DEFAULT_DEFINITION_NAME = "Default";

export const definitionFiles = {
  launchScript: "launch-entry.applescript",
  payloadScript: "payload.sh",
  icon: "icon.icns",
  installHook: "install-hook.sh",
  uninstallHook: "uninstall-hook.sh",
} as const;

export interface ActionsConfig {
  repositoryRoot: string;
  installRoot: string;
  definitionSuffix: string;
  bundleSuffix: string;
  compilerCommand: string;
  useTrash: boolean;
  debug: boolean;
}

const toBool = (value: string | undefined, fallback: boolean): boolean => {
  if (value == null || value.trim() === "") {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  return normalized === "1" || normalized === "true" || normalized === "yes" || normalized === "on";
};

const toOptional = (value: string | undefined): string | undefined => {
  if (value == null) {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed === "" ? undefined : trimmed;
};

const expandHome = (value: string): string => {
  if (value === "~") {
    return os.homedir();
  }
  if (value.startsWith("~/")) {
    return path.join(os.homedir(), value.slice(2));
  }
  return value;
};

const envSchema = z.object({
  SWITCH_ACTIONS_REPOSITORY: z.string().optional(),
  SWITCH_ACTIONS_INSTALL_ROOT: z.string().optional(),
  SWITCH_ACTIONS_COMPILER: z.string().optional(),
  SWITCH_ACTIONS_USE_TRASH: z.string().optional(),
  SWITCH_ACTIONS_DEBUG: z.string().optional(),
});

/**
 * Builds the configuration for a single invocation. Nothing here is cached;
 * every caller gets its own frozen object.
 */
export const resolveConfig = (
  env: Record<string, string | undefined> = process.env,
  overrides: Partial<ActionsConfig> = {},
): Readonly<ActionsConfig> => {
  const parsed = envSchema.parse(env);
  const repositoryRoot = toOptional(parsed.SWITCH_ACTIONS_REPOSITORY);
  const installRoot = toOptional(parsed.SWITCH_ACTIONS_INSTALL_ROOT);

  return Object.freeze({
    repositoryRoot: repositoryRoot ? path.resolve(expandHome(repositoryRoot)) : defaultRepositoryRoot,
    installRoot: installRoot ? path.resolve(expandHome(installRoot)) : defaultInstallRoot,
    definitionSuffix: DEFINITION_SUFFIX,
    bundleSuffix: BUNDLE_SUFFIX,
    compilerCommand: toOptional(parsed.SWITCH_ACTIONS_COMPILER) ?? "/usr/bin/osacompile",
    useTrash: toBool(parsed.SWITCH_ACTIONS_USE_TRASH, true),
    debug: toBool(parsed.SWITCH_ACTIONS_DEBUG, false),
    ...overrides,
  });
};

export const definitionDirFor = (config: Pick<ActionsConfig, "repositoryRoot" | "definitionSuffix">, displayName: string) =>
  path.resolve(config.repositoryRoot, `${displayName}${config.definitionSuffix}`);

export const bundlePathFor = (config: Pick<ActionsConfig, "installRoot" | "bundleSuffix">, displayName: string) =>
  path.resolve(config.installRoot, `${displayName}${config.bundleSuffix}`);
