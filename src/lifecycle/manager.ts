import { existsSync } from "node:fs";
import { mkdir, stat } from "node:fs/promises";

import { listActions, resolveAction, resolveDefaultDefinition, resolveSources } from "../actions/repository.js";
import type { BundleCompiler } from "../bundles/compiler.js";
import { bundlePathFor, type ActionsConfig } from "../config.js";
import type { Logger } from "../log.js";
import type { ActionDefinition, ActionFailure, ActionListEntry, LifecycleState, ResolvedSources } from "../types.js";
import { selectProcedure, type ProcedureContext } from "./procedures.js";

export type ConfirmFn = (message: string) => Promise<boolean>;

export interface LifecycleManagerOptions {
  config: Readonly<ActionsConfig>;
  compiler: BundleCompiler;
  logger: Logger;
  confirm: ConfirmFn;
}

type Failed = ActionFailure & { state: "failed"; states: LifecycleState[] };

export type InstallResult =
  | {
      ok: true;
      state: "installed";
      states: LifecycleState[];
      id: string;
      displayName: string;
      procedure: "default" | "custom";
      path: string | null;
      sources: ResolvedSources | null;
    }
  | { ok: true; state: "declined"; states: LifecycleState[]; id: string; displayName: string }
  | Failed;

export type UninstallResult =
  | {
      ok: true;
      state: "removed";
      states: LifecycleState[];
      id: string;
      displayName: string;
      procedure: "default" | "custom";
      path: string | null;
    }
  | Failed;

export type DescribeResult =
  | {
      ok: true;
      definition: ActionDefinition;
      sources: ResolvedSources;
      targetPath: string;
      installed: boolean;
      hooks: { install: boolean; uninstall: boolean };
    }
  | ActionFailure;

export type BatchResult<T> = { ok: boolean; results: T[] };

export interface LifecycleManager {
  install: (idOrName: string) => Promise<InstallResult>;
  uninstall: (idOrName: string) => Promise<UninstallResult>;
  list: () => Promise<ActionListEntry[]>;
  describe: (idOrName: string) => Promise<DescribeResult>;
  installAll: () => Promise<BatchResult<InstallResult>>;
  uninstallAll: () => Promise<BatchResult<UninstallResult>>;
}

class StateTrail {
  readonly states: LifecycleState[] = ["idle"];

  constructor(
    private readonly logger: Logger,
    private readonly label: string,
  ) {}

  enter(state: LifecycleState) {
    this.logger.debug(`${this.label}: ${this.current} -> ${state}`);
    this.states.push(state);
  }

  get current(): LifecycleState {
    return this.states[this.states.length - 1] ?? "idle";
  }

  fail(failure: ActionFailure): Failed {
    this.enter("failed");
    return { ok: false, code: failure.code, error: failure.error, state: "failed", states: [...this.states] };
  }
}

export const createLifecycleManager = (options: LifecycleManagerOptions): LifecycleManager => {
  const { config, logger } = options;
  const context: ProcedureContext = { config, compiler: options.compiler, logger };

  const ensureInstallRoot = async (): Promise<{ ok: true; created: boolean } | { ok: false; declined: true } | ActionFailure> => {
    if (existsSync(config.installRoot)) {
      if ((await stat(config.installRoot)).isDirectory()) {
        return { ok: true, created: false };
      }
      return { ok: false, code: "build_error", error: `${config.installRoot} exists and is not a directory.` };
    }
    const accepted = await options.confirm(`${config.installRoot} does not exist. Create it?`);
    if (!accepted) {
      return { ok: false, declined: true };
    }
    try {
      await mkdir(config.installRoot, { recursive: true });
    } catch (error) {
      return {
        ok: false,
        code: "build_error",
        error: `could not create ${config.installRoot}: ${error instanceof Error ? error.message : String(error)}`,
      };
    }
    logger.debug("created install root", { path: config.installRoot });
    return { ok: true, created: true };
  };

  const install = async (idOrName: string): Promise<InstallResult> => {
    const trail = new StateTrail(logger, `install ${idOrName}`);
    trail.enter("resolving");
    const resolved = await resolveAction(config, idOrName);
    if (!resolved.ok) {
      return trail.fail(resolved);
    }
    const { definition } = resolved;

    const root = await ensureInstallRoot();
    if (!root.ok) {
      if ("declined" in root) {
        trail.enter("declined");
        return { ok: true, state: "declined", states: [...trail.states], id: definition.id, displayName: definition.displayName };
      }
      return trail.fail(root);
    }

    const procedure = selectProcedure(definition, "install");
    trail.enter("building");
    const outcome = await procedure.install(definition, context);
    if (!outcome.ok) {
      return trail.fail(outcome);
    }
    trail.enter("installed");
    return {
      ok: true,
      state: "installed",
      states: [...trail.states],
      id: definition.id,
      displayName: definition.displayName,
      procedure: procedure.kind,
      path: outcome.path,
      sources: outcome.sources,
    };
  };

  const uninstall = async (idOrName: string): Promise<UninstallResult> => {
    const trail = new StateTrail(logger, `uninstall ${idOrName}`);
    trail.enter("resolving");
    const resolved = await resolveAction(config, idOrName);
    if (!resolved.ok) {
      return trail.fail(resolved);
    }
    const { definition } = resolved;

    const procedure = selectProcedure(definition, "uninstall");
    if (procedure.kind === "default" && !existsSync(bundlePathFor(config, definition.displayName))) {
      return trail.fail({ ok: false, code: "not_installed", error: `${definition.displayName} is not installed.` });
    }
    trail.enter("uninstalling");
    const outcome = await procedure.uninstall(definition, context);
    if (!outcome.ok) {
      return trail.fail(outcome);
    }
    trail.enter("removed");
    return {
      ok: true,
      state: "removed",
      states: [...trail.states],
      id: definition.id,
      displayName: definition.displayName,
      procedure: procedure.kind,
      path: outcome.path,
    };
  };

  const list = () => listActions(config);

  const describe = async (idOrName: string): Promise<DescribeResult> => {
    const resolved = await resolveAction(config, idOrName);
    if (!resolved.ok) {
      return resolved;
    }
    const defaults = await resolveDefaultDefinition(config);
    if (!defaults.ok) {
      return defaults;
    }
    const { definition } = resolved;
    const targetPath = bundlePathFor(config, definition.displayName);
    return {
      ok: true,
      definition,
      sources: resolveSources(definition, defaults.defaults),
      targetPath,
      installed: existsSync(targetPath),
      hooks: { install: Boolean(definition.installHook), uninstall: Boolean(definition.uninstallHook) },
    };
  };

  const installAll = async (): Promise<BatchResult<InstallResult>> => {
    const results: InstallResult[] = [];
    for (const entry of await list()) {
      const result = await install(entry.displayName);
      results.push(result);
      if (!result.ok || result.state === "declined") {
        return { ok: result.ok, results };
      }
    }
    return { ok: true, results };
  };

  const uninstallAll = async (): Promise<BatchResult<UninstallResult>> => {
    const results: UninstallResult[] = [];
    for (const entry of await list()) {
      if (!entry.installed) {
        continue;
      }
      const result = await uninstall(entry.displayName);
      results.push(result);
      if (!result.ok) {
        return { ok: false, results };
      }
    }
    return { ok: true, results };
  };

  return { install, uninstall, list, describe, installAll, uninstallAll };
};
