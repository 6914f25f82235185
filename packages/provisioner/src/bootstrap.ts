import os from "node:os";
import path from "node:path";
import type { BootstrapReport, ProvisioningManifest, StepRecord } from "@docdash/core";
import { defaultManifest } from "@docdash/core";
import { StepFailedError } from "./errors";
import { createCommandRunner, type CommandRunner } from "./exec/command-runner";
import { createProvisionLog, type ProvisionLog } from "./log/provision-log";
import { Reporter } from "./report/reporter";
import { collectSummaryFacts, formatSummary } from "./report/summary";
import { PROVISIONING_STEPS, type ProvisioningStep, type StepContext } from "./steps";

export const DEFAULT_SETTLE_MS = 3000;
export const DEFAULT_READY_TIMEOUT_MS = 15_000;

export const BANNER_TITLE = "Document Dashboard — Setup";

export interface BootstrapOptions {
  manifest?: ProvisioningManifest;
  runner?: CommandRunner;
  reporter?: Reporter;
  log?: ProvisionLog;
  cwd?: string;
  platform?: NodeJS.Platform;
  dryRun?: boolean;
  strictPackages?: boolean;
  settleMs?: number;
  readyTimeoutMs?: number;
  /** Replace the step list; the order given is the order run. */
  steps?: readonly ProvisioningStep[];
}

/**
 * Run every provisioning step in order, then print the summary. The first failing step
 * aborts the run with a StepFailedError carrying the partial report; nothing is rolled back.
 */
export async function runBootstrap(options: BootstrapOptions = {}): Promise<BootstrapReport> {
  const cwd = options.cwd ?? process.cwd();
  const manifest = options.manifest ?? defaultManifest();
  const dryRun = options.dryRun ?? false;
  const steps = options.steps ?? PROVISIONING_STEPS;
  const ctx: StepContext = {
    manifest,
    cwd,
    runner: options.runner ?? createCommandRunner(),
    reporter: options.reporter ?? new Reporter(),
    log: options.log ?? createProvisionLog(dryRun ? os.tmpdir() : path.join(cwd, "logs")),
    platform: options.platform ?? os.platform(),
    options: {
      dryRun,
      strictPackages: options.strictPackages ?? false,
      settleMs: options.settleMs ?? DEFAULT_SETTLE_MS,
      readyTimeoutMs: options.readyTimeoutMs ?? DEFAULT_READY_TIMEOUT_MS,
    },
  };

  const report: BootstrapReport = { steps: [], runtimeVersion: "", completed: false, dryRun };
  ctx.log.info("bootstrap", `start cwd=${cwd} dryRun=${dryRun}`);
  ctx.reporter.banner(BANNER_TITLE);

  for (const [index, step] of steps.entries()) {
    const title = step.title(manifest);
    ctx.reporter.blank();
    ctx.reporter.step(index + 1, steps.length, title);
    const started = Date.now();
    try {
      const outcome = await step.run(ctx);
      const record: StepRecord = {
        id: step.id,
        title,
        status: outcome.status,
        detail: outcome.detail,
        durationMs: Date.now() - started,
      };
      report.steps.push(record);
      if (outcome.packages) report.packages = outcome.packages;
      ctx.log.info(step.id, `${outcome.status}: ${outcome.detail}`);
    } catch (err) {
      ctx.log.error(step.id, err);
      const failure = new StepFailedError(step.id, title.replace(/\.\.\.$/, ""), err);
      failure.report = report;
      throw failure;
    }
  }

  const facts = await collectSummaryFacts(ctx.runner, manifest, dryRun);
  report.runtimeVersion = facts.runtimeVersion;
  report.completed = true;
  ctx.reporter.blank();
  ctx.reporter.lines(formatSummary(manifest, facts, ctx.reporter.painter));
  ctx.log.info("bootstrap", "complete");
  return report;
}
