import type { InstallResult, LifecycleManager, UninstallResult } from "./lifecycle/manager.js";
import type { Logger } from "./log.js";
import type { ActionListEntry } from "./types.js";

export interface CommandContext {
  manager: LifecycleManager;
  logger: Logger;
}

const pretty = (value: unknown): string => JSON.stringify(value, null, 2);

const reportInstall = (logger: Logger, result: InstallResult): number => {
  if (!result.ok) {
    logger.error(result.error);
    return 1;
  }
  if (result.state === "declined") {
    logger.info("Nothing installed.");
    return 0;
  }
  logger.info(result.path ? `Installed ${result.displayName} at ${result.path}` : `Installed ${result.displayName}`);
  return 0;
};

const reportUninstall = (logger: Logger, result: UninstallResult): number => {
  if (!result.ok) {
    logger.error(result.error);
    return 1;
  }
  logger.info(`Uninstalled ${result.displayName}`);
  return 0;
};

export const formatActionList = (entries: ActionListEntry[]): string[] => {
  const sorted = [...entries].sort((a, b) => a.id.localeCompare(b.id));
  const width = Math.max(0, ...sorted.map((entry) => entry.id.length));
  return sorted.map((entry) => `${entry.id.padEnd(width)}  ${entry.installed ? "installed" : "-"}`);
};

export const installCommand = async (
  context: CommandContext,
  id: string | undefined,
  options: { all?: boolean },
): Promise<number> => {
  if (options.all) {
    if (id?.trim()) {
      context.logger.error("install takes either an action id or --all, not both.");
      return 1;
    }
    const batch = await context.manager.installAll();
    if (!batch.results.length) {
      context.logger.info("No actions found.");
    }
    let code = 0;
    for (const result of batch.results) {
      code = Math.max(code, reportInstall(context.logger, result));
    }
    return code;
  }
  if (!id?.trim()) {
    context.logger.error("install requires an action id (see `list`).");
    return 1;
  }
  return reportInstall(context.logger, await context.manager.install(id));
};

export const uninstallCommand = async (
  context: CommandContext,
  id: string | undefined,
  options: { all?: boolean },
): Promise<number> => {
  if (options.all) {
    if (id?.trim()) {
      context.logger.error("uninstall takes either an action id or --all, not both.");
      return 1;
    }
    const batch = await context.manager.uninstallAll();
    if (!batch.results.length) {
      context.logger.info("Nothing to uninstall.");
    }
    let code = 0;
    for (const result of batch.results) {
      code = Math.max(code, reportUninstall(context.logger, result));
    }
    return code;
  }
  if (!id?.trim()) {
    context.logger.error("uninstall requires an action id (see `list`).");
    return 1;
  }
  return reportUninstall(context.logger, await context.manager.uninstall(id));
};

export const listCommand = async (context: CommandContext, options: { json?: boolean }): Promise<number> => {
  const entries = await context.manager.list();
  if (options.json) {
    context.logger.info(pretty(entries));
    return 0;
  }
  if (!entries.length) {
    context.logger.info("No actions found.");
    return 0;
  }
  for (const line of formatActionList(entries)) {
    context.logger.info(line);
  }
  return 0;
};

export const showCommand = async (context: CommandContext, id: string | undefined): Promise<number> => {
  if (!id?.trim()) {
    context.logger.error("show requires an action id (see `list`).");
    return 1;
  }
  const result = await context.manager.describe(id);
  if (!result.ok) {
    context.logger.error(result.error);
    return 1;
  }
  context.logger.info(
    pretty({
      id: result.definition.id,
      name: result.definition.displayName,
      definition: result.definition.definitionDir,
      target: result.targetPath,
      installed: result.installed,
      hooks: result.hooks,
      sources: result.sources,
    }),
  );
  return 0;
};
