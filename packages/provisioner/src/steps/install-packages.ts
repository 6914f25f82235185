import type { PackageInstallResult, StepOutcome } from "@docdash/core";
import { PackageInstallError } from "../errors";
import type { ProvisioningStep, StepContext } from "./context";
import { execute } from "./execute";

const INSTALL_FLAGS = ["install", "--break-system-packages", "--quiet"];

/** Ask pip which of the packages are importable now; used only after a failed install. */
async function probeInstalled(ctx: StepContext, packages: string[]): Promise<{ installed: string[]; missing: string[] }> {
  const installed: string[] = [];
  const missing: string[] = [];
  for (const name of packages) {
    const out = await ctx.runner.run(ctx.manifest.python.pip, ["show", name]);
    (out.exitCode === 0 ? installed : missing).push(name);
  }
  return { installed, missing };
}

/**
 * One pip run for the whole list, output captured. By default a failed install still reports
 * success on the terminal; the per-package result goes to the log and the run report.
 */
export async function installPackages(ctx: StepContext): Promise<PackageInstallResult> {
  const { packages, python } = ctx.manifest;

  if (ctx.options.dryRun) {
    await execute(ctx, python.pip, [...INSTALL_FLAGS, ...packages]);
    return { status: "success", installed: [...packages], missing: [], exitCode: 0, stderr: "" };
  }

  const out = await ctx.runner.run(python.pip, [...INSTALL_FLAGS, ...packages]);
  if (out.exitCode === 0) {
    return { status: "success", installed: [...packages], missing: [], exitCode: 0, stderr: out.stderr };
  }

  const { installed, missing } = await probeInstalled(ctx, packages);
  return {
    status: missing.length === 0 ? "success" : installed.length === 0 ? "failure" : "partial",
    installed,
    missing,
    exitCode: out.exitCode,
    stderr: out.stderr,
  };
}

export const installPackagesStep: ProvisioningStep = {
  id: "install-packages",
  title: () => "Installing Python dependencies...",

  async run(ctx: StepContext): Promise<StepOutcome> {
    const { packages } = ctx.manifest;
    if (packages.length === 0) {
      ctx.reporter.ok("No Python packages requested");
      return { status: "skipped", detail: "no packages" };
    }

    const result = await installPackages(ctx);
    if (result.exitCode !== 0) {
      ctx.log.warn(
        "install-packages",
        `pip exited ${result.exitCode}; status=${result.status}; missing=[${result.missing.join(", ")}]; stderr=${result.stderr.trim()}`
      );
    } else {
      ctx.log.info("install-packages", `installed: ${result.installed.join(", ")}`);
    }

    if (ctx.options.strictPackages && result.status !== "success") {
      throw new PackageInstallError(result);
    }

    ctx.reporter.ok("Python packages installed");
    return {
      status: "done",
      detail: `${result.installed.length}/${packages.length} packages present`,
      packages: result,
    };
  },
};
