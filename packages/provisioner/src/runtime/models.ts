import type { CommandRunner } from "../exec/command-runner";

/** Ollama treats an untagged name as `:latest`. */
export const normalizeModelId = (id: string): string => (id.includes(":") ? id : `${id}:latest`);

/**
 * Parse `ollama list`:
 *
 *   NAME                ID              SIZE      MODIFIED
 *   llama3.1:8b         46e0c10c039e    4.9 GB    2 weeks ago
 */
export function parseModelList(output: string): Set<string> {
  const models = new Set<string>();
  for (const line of output.split("\n")) {
    const name = line.trim().split(/\s+/)[0];
    if (!name || name === "NAME") continue;
    models.add(normalizeModelId(name));
  }
  return models;
}

export async function listCachedModels(runner: CommandRunner, binary: string): Promise<Set<string>> {
  const out = await runner.run(binary, ["list"]);
  return out.exitCode === 0 ? parseModelList(out.stdout) : new Set();
}
