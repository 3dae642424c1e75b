import { runCommand, tailText } from "../process/runner.js";

export interface CompileInput {
  sourcePath: string;
  targetPath: string;
}

export type CompileResult = { ok: true } | { ok: false; error: string };

/** Turns a launch script into a double-clickable bundle at `targetPath`. */
export interface BundleCompiler {
  compile: (input: CompileInput) => Promise<CompileResult>;
}

export const createOsacompileCompiler = (command = "/usr/bin/osacompile"): BundleCompiler => {
  return {
    compile: async ({ sourcePath, targetPath }) => {
      const result = await runCommand(command, ["-o", targetPath, sourcePath]);
      if (!result.ok) {
        const detail = tailText(result.stderr.trim() || result.stdout.trim(), 2_000);
        return { ok: false, error: detail || `${command} exited with code ${result.exitCode}` };
      }
      return { ok: true };
    },
  };
};
