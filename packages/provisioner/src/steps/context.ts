import type { ProvisioningManifest, StepId, StepOutcome } from "@docdash/core";
import type { CommandRunner } from "../exec/command-runner";
import type { ProvisionLog } from "../log/provision-log";
import type { Reporter } from "../report/reporter";

export interface StepOptions {
  dryRun: boolean;
  strictPackages: boolean;
  settleMs: number;
  readyTimeoutMs: number;
}

export interface StepContext {
  manifest: ProvisioningManifest;
  runner: CommandRunner;
  reporter: Reporter;
  log: ProvisionLog;
  /** Directories are created relative to this. */
  cwd: string;
  platform: NodeJS.Platform;
  options: StepOptions;
}

export interface ProvisioningStep {
  id: StepId;
  title(manifest: ProvisioningManifest): string;
  run(ctx: StepContext): Promise<StepOutcome>;
}
