import type { CommandResult, RunOptions } from "../exec/command-runner";
import { formatCommand } from "../exec/command-runner";
import { CommandFailedError } from "../errors";
import type { StepContext } from "./context";

/**
 * Run a command that changes the machine. Under --dry-run it is only announced.
 * Probes (which, status checks, version queries) go straight to ctx.runner instead.
 */
export async function execute(
  ctx: StepContext,
  command: string,
  args: string[],
  options?: RunOptions
): Promise<CommandResult> {
  const line = formatCommand(command, args);
  if (ctx.options.dryRun) {
    ctx.reporter.note(`would run: ${line}`);
    ctx.log.info("dry-run", line);
    return { stdout: "", stderr: "", exitCode: 0 };
  }
  ctx.log.info("exec", line);
  const result = await ctx.runner.run(command, args, options);
  if (result.exitCode !== 0) {
    ctx.log.warn("exec", `${line} exited ${result.exitCode}${result.stderr ? `: ${result.stderr.trim()}` : ""}`);
    throw new CommandFailedError(line, result.exitCode, result.stderr);
  }
  return result;
}
