import fs from "node:fs";
import path from "node:path";
import type { StepOutcome } from "@docdash/core";
import type { ProvisioningStep, StepContext } from "./context";

export const createDirectoriesStep: ProvisioningStep = {
  id: "create-directories",
  title: () => "Setting up data directories...",

  async run(ctx: StepContext): Promise<StepOutcome> {
    let created = 0;
    for (const dir of ctx.manifest.directories) {
      const target = path.resolve(ctx.cwd, dir);
      if (fs.existsSync(target)) {
        if (!fs.statSync(target).isDirectory()) {
          throw new Error(`${dir} exists but is not a directory`);
        }
        continue;
      }
      created++;
      if (ctx.options.dryRun) {
        ctx.reporter.note(`would create: ${dir}`);
        continue;
      }
      fs.mkdirSync(target, { recursive: true });
      ctx.log.info("create-directories", `created ${target}`);
    }

    ctx.reporter.ok("Directories created");
    return created === 0
      ? { status: "skipped", detail: "all directories present" }
      : { status: "done", detail: `${created} of ${ctx.manifest.directories.length} created` };
  },
};
