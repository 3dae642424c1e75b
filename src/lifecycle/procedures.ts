import { resolveDefaultDefinition } from "../actions/repository.js";
import { buildBundle } from "../bundles/builder.js";
import type { BundleCompiler } from "../bundles/compiler.js";
import { removeArtifact } from "../bundles/remover.js";
import { bundlePathFor, DEFAULT_DEFINITION_NAME, definitionDirFor, type ActionsConfig } from "../config.js";
import type { Logger } from "../log.js";
import { runCommand, tailText } from "../process/runner.js";
import type { ActionDefinition, ActionFailure, ResolvedSources } from "../types.js";

export interface ProcedureContext {
  config: Readonly<ActionsConfig>;
  compiler: BundleCompiler;
  logger: Logger;
}

export type InstallOutcome = { ok: true; path: string | null; sources: ResolvedSources | null } | ActionFailure;

export type UninstallOutcome = { ok: true; path: string | null } | ActionFailure;

export type ProcedurePhase = "install" | "uninstall";

export interface ActionProcedure {
  kind: "default" | "custom";
  install: (definition: ActionDefinition, context: ProcedureContext) => Promise<InstallOutcome>;
  uninstall: (definition: ActionDefinition, context: ProcedureContext) => Promise<UninstallOutcome>;
}

export const createDefaultProcedure = (): ActionProcedure => ({
  kind: "default",
  install: async (definition, { config, compiler, logger }) => {
    const defaults = await resolveDefaultDefinition(config);
    if (!defaults.ok) {
      return defaults;
    }
    const built = await buildBundle({
      definition,
      defaults: defaults.defaults,
      targetPath: bundlePathFor(config, definition.displayName),
      compiler,
      useTrash: config.useTrash,
      logger,
    });
    if (!built.ok) {
      return built;
    }
    return { ok: true, path: built.path, sources: built.sources };
  },
  uninstall: async (definition, { config, logger }) => {
    const targetPath = bundlePathFor(config, definition.displayName);
    const removed = await removeArtifact(targetPath, { useTrash: config.useTrash, logger });
    if (!removed.ok) {
      return { ok: false, code: "remove_error", error: `could not remove ${targetPath}: ${removed.error}` };
    }
    return { ok: true, path: targetPath };
  },
});

export const hookEnvironment = (definition: ActionDefinition, config: Readonly<ActionsConfig>, phase: ProcedurePhase) => ({
  ACTION_ID: definition.id,
  ACTION_NAME: definition.displayName,
  ACTION_DIR: definition.definitionDir,
  ACTION_PHASE: phase,
  DEFAULT_DIR: definitionDirFor(config, DEFAULT_DEFINITION_NAME),
  INSTALL_ROOT: config.installRoot,
  BUNDLE_SUFFIX: config.bundleSuffix,
  BUNDLE_COMPILER: config.compilerCommand,
});

/**
 * Hooks run as a separate `/bin/sh` process with the action described in
 * their environment. Their output is only shown with --debug.
 */
export const createCustomProcedure = (hookPath: string): ActionProcedure => {
  const runHook = async (definition: ActionDefinition, context: ProcedureContext, phase: ProcedurePhase) => {
    context.logger.debug(`running ${phase} hook`, { hook: hookPath });
    const result = await runCommand("/bin/sh", [hookPath], {
      cwd: definition.definitionDir,
      env: hookEnvironment(definition, context.config, phase),
    });
    if (result.stdout.trim()) {
      context.logger.debug(`${phase} hook stdout`, { output: tailText(result.stdout.trim(), 2_000) });
    }
    return result;
  };

  return {
    kind: "custom",
    install: async (definition, context) => {
      const result = await runHook(definition, context, "install");
      if (!result.ok) {
        const detail = tailText(result.stderr.trim(), 2_000) || `exit code ${result.exitCode}`;
        return { ok: false, code: "build_error", error: `install hook for ${definition.displayName} failed: ${detail}` };
      }
      return { ok: true, path: null, sources: null };
    },
    uninstall: async (definition, context) => {
      const result = await runHook(definition, context, "uninstall");
      if (!result.ok) {
        const detail = tailText(result.stderr.trim(), 2_000) || `exit code ${result.exitCode}`;
        return { ok: false, code: "remove_error", error: `uninstall hook for ${definition.displayName} failed: ${detail}` };
      }
      return { ok: true, path: null };
    },
  };
};

export const selectProcedure = (definition: ActionDefinition, phase: ProcedurePhase): ActionProcedure => {
  const hook = phase === "install" ? definition.installHook : definition.uninstallHook;
  return hook ? createCustomProcedure(hook) : createDefaultProcedure();
};
