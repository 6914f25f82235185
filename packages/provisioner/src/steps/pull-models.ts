import type { StepOutcome } from "@docdash/core";
import { listCachedModels, normalizeModelId } from "../runtime/models";
import { estimateDiskSize, fmtBytes, getDiskSpace, resolveModelStore } from "../runtime/system-info";
import type { ProvisioningStep, StepContext } from "./context";
import { execute } from "./execute";

export const pullModelsStep: ProvisioningStep = {
  id: "pull-models",
  title: () => "Pulling AI models...",

  async run(ctx: StepContext): Promise<StepOutcome> {
    const { runtime, models } = ctx.manifest;
    const cached = await listCachedModels(ctx.runner, runtime.binary);
    const disk = await getDiskSpace(ctx.runner, resolveModelStore());

    let pulled = 0;
    for (const model of models) {
      const alreadyCached = cached.has(normalizeModelId(model.id));
      if (alreadyCached) {
        ctx.log.info("pull-models", `${model.id} already cached; pulling anyway to pick up updates`);
      } else {
        pulled++;
        const size = estimateDiskSize(model.id);
        if (size !== null && disk.total > 0 && disk.free < size) {
          ctx.reporter.warn(`${model.id} needs ~${fmtBytes(size)} disk but only ${fmtBytes(disk.free)} is free`);
        }
      }
      ctx.reporter.action("📥", model.role ? `Pulling ${model.id} (${model.role})...` : `Pulling ${model.id}...`);
      await execute(ctx, runtime.binary, ["pull", model.id], { inherit: true });
    }

    ctx.reporter.ok("Models ready");
    return pulled === 0
      ? { status: "skipped", detail: "all models already cached" }
      : { status: "done", detail: `${pulled} of ${models.length} models downloaded` };
  },
};
