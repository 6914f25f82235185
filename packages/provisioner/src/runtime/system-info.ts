import os from "node:os";
import path from "node:path";
import type { CommandRunner } from "../exec/command-runner";

export interface DiskSpace {
  total: number;
  free: number;
  path: string;
}

/** Where Ollama keeps pulled models for the current user. */
export const resolveModelStore = (env: NodeJS.ProcessEnv = process.env): string =>
  env.OLLAMA_MODELS ?? path.join(os.homedir(), ".ollama", "models");

/** `df -k` on the path, or its closest existing parent; zeros when nothing answers. */
export async function getDiskSpace(runner: CommandRunner, targetPath: string): Promise<DiskSpace> {
  let checkPath = targetPath;
  for (;;) {
    const out = await runner.run("df", ["-k", checkPath]);
    if (out.exitCode === 0) {
      const lastLine = out.stdout.trim().split("\n").slice(-1)[0] ?? "";
      const parts = lastLine.split(/\s+/);
      const total = parseInt(parts[1] || "0", 10) * 1024;
      const free = parseInt(parts[3] || "0", 10) * 1024;
      return { total: isNaN(total) ? 0 : total, free: isNaN(free) ? 0 : free, path: checkPath };
    }
    const parent = path.dirname(checkPath);
    if (parent === checkPath) return { total: 0, free: 0, path: targetPath };
    checkPath = parent;
  }
}

/**
 * Rough on-disk size of a model from the parameter count in its tag (`qwen2.5-coder:7b`).
 * ~0.5 bytes/param at Q4. Null when the tag carries no size.
 */
export function estimateDiskSize(modelId: string): number | null {
  const match = modelId.match(/[:_-](\d+(?:\.\d+)?)b\b/i);
  if (!match) return null;
  const billions = parseFloat(match[1]);
  return Math.round(billions * 0.5 * 1e9);
}

export const fmtBytes = (bytes: number): string => {
  if (bytes >= 1e9) return `${(bytes / 1e9).toFixed(1)} GB`;
  if (bytes >= 1e6) return `${(bytes / 1e6).toFixed(0)} MB`;
  return `${bytes} bytes`;
};
