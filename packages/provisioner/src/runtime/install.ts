import type { RuntimeSpec } from "@docdash/core";
import { shellQuote } from "../exec/command-runner";
import type { ProvisioningStrategy } from "../strategy";
import type { StepContext } from "../steps/context";
import { execute } from "../steps/execute";

export const RUNTIME_DOWNLOAD_URL = "https://ollama.com/download";

type InstallStrategy = ProvisioningStrategy<StepContext>;

/** AUR helpers install from the community repository; tried before the vendor script. */
const aurHelper = (helper: "yay" | "paru", runtime: RuntimeSpec): InstallStrategy => ({
  name: helper,
  isAvailable: (ctx) => ctx.runner.which(helper),
  apply: async (ctx) => {
    await execute(ctx, helper, ["-S", "--noconfirm", runtime.packageName], { inherit: true });
  },
});

const homebrew = (runtime: RuntimeSpec): InstallStrategy => ({
  name: "brew",
  isAvailable: async (ctx) => ctx.platform === "darwin" && (await ctx.runner.which("brew")),
  apply: async (ctx) => {
    await execute(ctx, "brew", ["install", runtime.packageName], { inherit: true });
  },
});

const vendorScript = (runtime: RuntimeSpec): InstallStrategy => ({
  name: "install script",
  isAvailable: async (ctx) => ctx.platform !== "win32" && (await ctx.runner.which("curl")),
  apply: async (ctx) => {
    ctx.reporter.note("Using official install script...");
    await execute(ctx, "bash", ["-o", "pipefail", "-c", `curl -fsSL ${shellQuote(runtime.installScriptUrl)} | sh`], {
      inherit: true,
    });
  },
});

export const getRuntimeInstallStrategies = (runtime: RuntimeSpec): InstallStrategy[] => [
  aurHelper("yay", runtime),
  aurHelper("paru", runtime),
  homebrew(runtime),
  vendorScript(runtime),
];

/** `ollama --version`, or null when the binary cannot answer. */
export async function readRuntimeVersion(ctx: Pick<StepContext, "runner" | "manifest">): Promise<string | null> {
  const out = await ctx.runner.run(ctx.manifest.runtime.binary, ["--version"]);
  const version = out.stdout.trim();
  return out.exitCode === 0 && version ? version : null;
}
