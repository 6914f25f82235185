import type { ProvisioningManifest } from "@docdash/core";
import type { CommandRunner } from "../exec/command-runner";
import { readRuntimeVersion } from "../runtime/install";
import type { Painter } from "./reporter";

export const FALLBACK_VERSION = "installed";

export type SummaryFacts = {
  runtimeVersion: string;
  versions: Array<{ label: string; version: string }>;
  dryRun: boolean;
};

const RULE = "═".repeat(50);

const field = (label: string, value: string) => `  ${`${label}:`.padEnd(10)} ${value}`;

/** The closing block: versions, models, and what the operator still has to do by hand. */
export function formatSummary(manifest: ProvisioningManifest, facts: SummaryFacts, paint: Painter): string[] {
  const { runtime, models, reminders } = manifest;
  const lines = [
    paint.green(RULE),
    paint.green(facts.dryRun ? "  ✅ Dry run complete, nothing was changed" : "  ✅ Setup Complete!"),
    paint.green(RULE),
    "",
    field(runtime.displayName, facts.runtimeVersion),
    field("Models", models.map((m) => m.id).join(", ")),
    ...facts.versions.map((v) => field(v.label, v.version)),
    "",
    `  ${paint.yellow("Make sure your API key is set:")}`,
    `  export ${reminders.apiKeyVariable}=${JSON.stringify(reminders.apiKeyExample)}`,
    "",
  ];
  const first = models[0];
  if (first) {
    lines.push(
      `  ${paint.yellow(`To test ${runtime.displayName}:`)}`,
      `  ${runtime.binary} run ${first.id} ${JSON.stringify(reminders.smokeTestPrompt)}`,
      ""
    );
  }
  lines.push(`  ${paint.yellow("To start the dashboard:")}`, `  ${reminders.dashboardCommand}`, "");
  return lines;
}

export async function probeModuleVersion(runner: CommandRunner, interpreter: string, module: string): Promise<string> {
  const out = await runner.run(interpreter, ["-c", `import ${module}; print(${module}.__version__)`]);
  const version = out.stdout.trim();
  return out.exitCode === 0 && version ? version : FALLBACK_VERSION;
}

export async function collectSummaryFacts(
  runner: CommandRunner,
  manifest: ProvisioningManifest,
  dryRun: boolean
): Promise<SummaryFacts> {
  const runtimeVersion = (await readRuntimeVersion({ runner, manifest })) ?? FALLBACK_VERSION;
  const versions: SummaryFacts["versions"] = [];
  for (const probe of manifest.versionProbes) {
    versions.push({
      label: probe.label,
      version: await probeModuleVersion(runner, manifest.python.interpreter, probe.module),
    });
  }
  return { runtimeVersion, versions, dryRun };
}
