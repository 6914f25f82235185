import type { StepOutcome } from "@docdash/core";
import { CommandFailedError } from "../errors";
import { formatCommand } from "../exec/command-runner";
import { applyFirstAvailable } from "../strategy";
import { RUNTIME_DOWNLOAD_URL, getRuntimeInstallStrategies, readRuntimeVersion } from "../runtime/install";
import type { ProvisioningStep, StepContext } from "./context";

export const installRuntimeStep: ProvisioningStep = {
  id: "install-runtime",
  title: (manifest) => `Checking ${manifest.runtime.displayName}...`,

  async run(ctx: StepContext): Promise<StepOutcome> {
    const { runtime } = ctx.manifest;

    if (await ctx.runner.which(runtime.binary)) {
      const version = (await readRuntimeVersion(ctx)) ?? "unknown";
      ctx.reporter.ok(`${runtime.displayName} already installed: ${version}`);
      return { status: "skipped", detail: version };
    }

    ctx.reporter.action("📦", `Installing ${runtime.displayName}...`);
    const pacman = await ctx.runner.run("pacman", ["-Qi", runtime.packageName]);
    if (pacman.exitCode === 0) {
      ctx.reporter.ok(`${runtime.displayName} package found`);
      return { status: "skipped", detail: "package found" };
    }

    const used = await applyFirstAvailable(getRuntimeInstallStrategies(runtime), ctx, {
      hint: `Install it manually from ${RUNTIME_DOWNLOAD_URL}`,
    });

    if (!ctx.options.dryRun && !(await ctx.runner.which(runtime.binary))) {
      throw new CommandFailedError(
        formatCommand("command", ["-v", runtime.binary]),
        1,
        `${used} finished but ${runtime.binary} is not on PATH`
      );
    }

    ctx.reporter.ok(`${runtime.displayName} installed via ${used}`);
    return { status: "done", detail: `installed via ${used}` };
  },
};
