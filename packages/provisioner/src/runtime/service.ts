import type { RuntimeSpec } from "@docdash/core";
import { formatCommand } from "../exec/command-runner";
import type { ProvisioningStrategy } from "../strategy";
import type { StepContext } from "../steps/context";
import { execute } from "../steps/execute";

type ServiceStrategy = ProvisioningStrategy<StepContext>;

export async function isServiceActive(ctx: Pick<StepContext, "runner">, runtime: RuntimeSpec): Promise<boolean> {
  const out = await ctx.runner.run("systemctl", ["is-active", "--quiet", runtime.serviceName]);
  return out.exitCode === 0;
}

const systemdUnit = (runtime: RuntimeSpec): ServiceStrategy => ({
  name: "systemd",
  isAvailable: (ctx) => ctx.runner.which("systemctl"),
  apply: async (ctx) => {
    await execute(ctx, "sudo", ["systemctl", "enable", "--now", runtime.serviceName], { inherit: true });
  },
});

/** No service manager: leave `ollama serve` running in the background. */
const detachedServe = (runtime: RuntimeSpec): ServiceStrategy => ({
  name: "background process",
  // under dry run step 1 only announced the install, so the binary is not there yet
  isAvailable: async (ctx) => ctx.options.dryRun || (await ctx.runner.which(runtime.binary)),
  apply: async (ctx) => {
    const line = formatCommand(runtime.binary, ["serve"]);
    if (ctx.options.dryRun) {
      ctx.reporter.note(`would run: ${line} &`);
      return;
    }
    ctx.log.info("exec", `${line} &`);
    await ctx.runner.spawnDetached(runtime.binary, ["serve"]);
  },
});

export const getServiceStartStrategies = (runtime: RuntimeSpec): ServiceStrategy[] => [
  systemdUnit(runtime),
  detachedServe(runtime),
];
