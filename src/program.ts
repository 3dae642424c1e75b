import { readFileSync } from "node:fs";
import path from "node:path";

import { Command } from "commander";
import prompts from "prompts";
import { z } from "zod";

import { createOsacompileCompiler, type BundleCompiler } from "./bundles/compiler.js";
import { installCommand, listCommand, showCommand, uninstallCommand, type CommandContext } from "./commands.js";
import { projectRoot, resolveConfig } from "./config.js";
import { createLifecycleManager, type ConfirmFn } from "./lifecycle/manager.js";
import { createLogger, type Logger } from "./log.js";

export interface ProgramOptions {
  env?: Record<string, string | undefined>;
  createCompiler?: (command: string) => BundleCompiler;
  confirm?: ConfirmFn;
  logger?: (options: { debug: boolean }) => Logger;
  setExitCode?: (code: number) => void;
}

const packageSchema = z.object({ version: z.string() });

export const readPackageVersion = (): string => {
  try {
    const raw: unknown = JSON.parse(readFileSync(path.join(projectRoot, "package.json"), "utf-8"));
    const parsed = packageSchema.safeParse(raw);
    return parsed.success ? parsed.data.version : "0.0.0";
  } catch {
    return "0.0.0";
  }
};

export const confirmWithPrompt: ConfirmFn = async (message) => {
  const response = await prompts(
    { type: "confirm", name: "value", message, initial: true },
    { onCancel: () => false },
  );
  return response.value === true;
};

export const createProgram = (options: ProgramOptions = {}): Command => {
  const program = new Command();
  const setExitCode =
    options.setExitCode ??
    ((code: number) => {
      process.exitCode = code;
    });

  const buildContext = (yes: boolean): CommandContext => {
    const globals = program.opts<{ debug?: boolean }>();
    const config = resolveConfig(options.env ?? process.env, globals.debug ? { debug: true } : {});
    const logger = (options.logger ?? createLogger)({ debug: config.debug });
    logger.debug("configuration", {
      repository: config.repositoryRoot,
      installRoot: config.installRoot,
      compiler: config.compilerCommand,
      trash: config.useTrash,
    });
    const manager = createLifecycleManager({
      config,
      compiler: (options.createCompiler ?? createOsacompileCompiler)(config.compilerCommand),
      logger,
      confirm: yes ? async () => true : options.confirm ?? confirmWithPrompt,
    });
    return { manager, logger };
  };

  program
    .name("switch-actions")
    .description("Install app bundles that switch users, sleep, lock or log out")
    .version(readPackageVersion())
    .option("--debug", "Print every step to stderr");

  program
    .command("install")
    .description("Build an action bundle into the install root (rebuilds if present)")
    .argument("[id]", "Action id, e.g. login-window, or its display name")
    .option("-a, --all", "Install every action")
    .option("-y, --yes", "Create the install root without asking")
    .action(async (id: string | undefined, opts: { all?: boolean; yes?: boolean }) => {
      setExitCode(await installCommand(buildContext(Boolean(opts.yes)), id, opts));
    });

  program
    .command("uninstall")
    .description("Remove an installed action bundle")
    .argument("[id]", "Action id or display name")
    .option("-a, --all", "Uninstall every installed action")
    .action(async (id: string | undefined, opts: { all?: boolean }) => {
      setExitCode(await uninstallCommand(buildContext(false), id, opts));
    });

  program
    .command("list")
    .description("List available actions and whether each is installed")
    .option("--json", "Print JSON")
    .action(async (opts: { json?: boolean }) => {
      setExitCode(await listCommand(buildContext(false), opts));
    });

  program
    .command("show")
    .description("Show where an action's files resolve from")
    .argument("[id]", "Action id or display name")
    .action(async (id: string | undefined) => {
      setExitCode(await showCommand(buildContext(false), id));
    });

  return program;
};
