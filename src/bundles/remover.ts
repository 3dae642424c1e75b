import { existsSync } from "node:fs";
import { rm } from "node:fs/promises";

import type { Logger } from "../log.js";
import { getExecutableProbe } from "../process/executable-probe.js";
import { runCommand } from "../process/runner.js";

export type RemoveResult = { ok: true; removed: boolean; method: "trash" | "delete" | "none" } | { ok: false; error: string };

/**
 * Moves a bundle to the Trash when a `trash` executable is around, otherwise
 * deletes it. A missing target is not an error.
 */
export const removeArtifact = async (
  targetPath: string,
  options: { useTrash: boolean; logger: Logger },
): Promise<RemoveResult> => {
  if (!existsSync(targetPath)) {
    return { ok: true, removed: false, method: "none" };
  }

  if (options.useTrash) {
    const probe = await getExecutableProbe("trash");
    if (probe.available && probe.path) {
      options.logger.debug("moving to trash", { path: targetPath });
      const result = await runCommand(probe.path, [targetPath]);
      if (result.ok && !existsSync(targetPath)) {
        return { ok: true, removed: true, method: "trash" };
      }
      options.logger.warn(`trash failed for ${targetPath}; deleting instead`);
    }
  }

  options.logger.debug("deleting", { path: targetPath });
  try {
    await rm(targetPath, { recursive: true, force: true });
  } catch (error) {
    return { ok: false, error: error instanceof Error ? error.message : String(error) };
  }
  return { ok: true, removed: true, method: "delete" };
};
