import type { StepOutcome } from "@docdash/core";
import { applyFirstAvailable } from "../strategy";
import { isRuntimeReachable, waitForRuntime } from "../runtime/detect";
import { getServiceStartStrategies, isServiceActive } from "../runtime/service";
import type { ProvisioningStep, StepContext } from "./context";

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export const startRuntimeStep: ProvisioningStep = {
  id: "start-runtime",
  title: (manifest) => `Starting ${manifest.runtime.displayName} service...`,

  async run(ctx: StepContext): Promise<StepOutcome> {
    const { runtime } = ctx.manifest;

    if (await isServiceActive(ctx, runtime)) {
      ctx.reporter.ok(`${runtime.displayName} service already running`);
      return { status: "skipped", detail: "already running" };
    }

    // started earlier without a service manager
    if (await isRuntimeReachable(runtime.endpoint)) {
      ctx.reporter.ok(`${runtime.displayName} already answering at ${runtime.endpoint}`);
      return { status: "skipped", detail: "already answering" };
    }

    ctx.reporter.action("🔄", `Starting ${runtime.binary}...`);
    const used = await applyFirstAvailable(getServiceStartStrategies(runtime), ctx, { fallThrough: true });

    if (!ctx.options.dryRun) {
      if (ctx.options.settleMs > 0) await sleep(ctx.options.settleMs);
      const ready = await waitForRuntime(runtime.endpoint, { timeoutMs: ctx.options.readyTimeoutMs });
      if (!ready) {
        ctx.log.warn("start-runtime", `${runtime.endpoint} not answering after ${ctx.options.readyTimeoutMs}ms`);
        ctx.reporter.warn(`${runtime.displayName} is not answering at ${runtime.endpoint} yet`);
      }
    }

    ctx.reporter.ok(`${runtime.displayName} started`);
    return { status: "done", detail: `started via ${used}` };
  },
};
