import { chmod, copyFile, mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import type { BundleCompiler, CompileInput } from "../src/bundles/compiler.js";
import { definitionFiles, resolveConfig, type ActionsConfig } from "../src/config.js";
import type { Logger } from "../src/log.js";

export const DEFAULT_LAUNCH = 'do shell script "default launch"\n';
export const DEFAULT_PAYLOAD = "#!/bin/sh\necho default payload\n";
export const DEFAULT_ICON = Buffer.from([0x69, 0x63, 0x6e, 0x73, 0, 0, 0, 8]);

const fileKinds = ["launchScript", "payloadScript", "icon", "installHook", "uninstallHook"] as const;

export type DefinitionFiles = Partial<Record<(typeof fileKinds)[number], string | Buffer>>;

export const writeDefinition = async (repositoryRoot: string, displayName: string, files: DefinitionFiles = {}) => {
  const dir = path.join(repositoryRoot, `${displayName}.action`);
  await mkdir(dir, { recursive: true });
  for (const kind of fileKinds) {
    const content = files[kind];
    if (content !== undefined) {
      await writeFile(path.join(dir, definitionFiles[kind]), content);
    }
  }
  return dir;
};

export interface TestWorkspace {
  root: string;
  repositoryRoot: string;
  installRoot: string;
  config: Readonly<ActionsConfig>;
  cleanup: () => Promise<void>;
}

export const createWorkspace = async (options?: { createInstallRoot?: boolean }): Promise<TestWorkspace> => {
  const root = await mkdtemp(path.join(os.tmpdir(), "switch-actions-test-"));
  const repositoryRoot = path.join(root, "actions");
  const installRoot = path.join(root, "Applications");
  await writeDefinition(repositoryRoot, "Default", {
    launchScript: DEFAULT_LAUNCH,
    payloadScript: DEFAULT_PAYLOAD,
    icon: DEFAULT_ICON,
  });
  if (options?.createInstallRoot !== false) {
    await mkdir(installRoot, { recursive: true });
  }
  return {
    root,
    repositoryRoot,
    installRoot,
    config: resolveConfig({}, { repositoryRoot, installRoot, useTrash: false }),
    cleanup: () => rm(root, { recursive: true, force: true }),
  };
};

/** Stands in for osacompile: writes the source into Contents/Resources/Scripts/main.scpt. */
export const createFakeCompiler = (options?: { fail?: string }) => {
  const calls: CompileInput[] = [];
  const compiler: BundleCompiler = {
    compile: async (input) => {
      calls.push(input);
      if (options?.fail) {
        return { ok: false, error: options.fail };
      }
      const scriptsDir = path.join(input.targetPath, "Contents", "Resources", "Scripts");
      await mkdir(scriptsDir, { recursive: true });
      await copyFile(input.sourcePath, path.join(scriptsDir, "main.scpt"));
      return { ok: true };
    },
  };
  return { compiler, calls };
};

export const createMemoryLogger = () => {
  const output: Record<keyof Logger, string[]> = { info: [], warn: [], error: [], debug: [] };
  const logger: Logger = {
    info: (message) => {
      output.info.push(message);
    },
    warn: (message) => {
      output.warn.push(message);
    },
    error: (message) => {
      output.error.push(message);
    },
    debug: (message) => {
      output.debug.push(message);
    },
  };
  return { logger, output };
};

/** Writes an executable shell script and returns its path. */
export const writeScript = async (dir: string, name: string, body: string) => {
  await mkdir(dir, { recursive: true });
  const scriptPath = path.join(dir, name);
  await writeFile(scriptPath, `#!/bin/sh\n${body}`);
  await chmod(scriptPath, 0o755);
  return scriptPath;
};

/** Puts `binDir` first on PATH until the returned restore function runs. */
export const prependPath = (binDir: string) => {
  const prior = process.env.PATH;
  process.env.PATH = prior ? `${binDir}${path.delimiter}${prior}` : binDir;
  return () => {
    if (prior === undefined) {
      delete process.env.PATH;
    } else {
      process.env.PATH = prior;
    }
  };
};
