import { access, constants as fsConstants } from "node:fs/promises";
import path from "node:path";

import { runCommand } from "./runner.js";

export interface ExecutableProbeResult {
  available: boolean;
  path: string | null;
}

const probeCache = new Map<string, Promise<ExecutableProbeResult>>();

const runProbe = async (binary: string): Promise<ExecutableProbeResult> => {
  if (path.isAbsolute(binary)) {
    try {
      await access(binary, fsConstants.X_OK);
      return { available: true, path: binary };
    } catch {
      return { available: false, path: null };
    }
  }

  const result = await runCommand("which", [binary]);
  if (!result.ok) {
    return { available: false, path: null };
  }
  const candidate = result.stdout
    .split(/\r?\n/)
    .map((line) => line.trim())
    .find(Boolean);
  return candidate ? { available: true, path: candidate } : { available: false, path: null };
};

/** Looks up an executable once per process; later calls reuse the first answer. */
export const getExecutableProbe = async (binary: string): Promise<ExecutableProbeResult> => {
  const candidate = String(binary || "").trim();
  if (!candidate) {
    return { available: false, path: null };
  }
  const cached = probeCache.get(candidate);
  if (cached) {
    return cached;
  }
  const pending = runProbe(candidate);
  probeCache.set(candidate, pending);
  return pending;
};

export const clearExecutableProbeCache = () => {
  probeCache.clear();
};
