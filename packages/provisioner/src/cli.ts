import os from "node:os";
import path from "node:path";
import { Command, CommanderError } from "commander";
import { runBootstrap } from "./bootstrap";
import { loadConfig, loadManifest, type CliFlags } from "./config";
import { errorMessage } from "./errors";
import type { CommandRunner } from "./exec/command-runner";
import { createProvisionLog, type ProvisionLog } from "./log/provision-log";
import { Reporter } from "./report/reporter";

export const VERSION = "0.1.0";

export type CliDeps = {
  runner?: CommandRunner;
  write?: (line: string) => void;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  color?: boolean;
  platform?: NodeJS.Platform;
};

export function createProgram(): Command {
  return new Command()
    .name("docdash-setup")
    .description("Provision this machine for the document dashboard: Ollama, models, python packages, data directories")
    .version(VERSION)
    .option("--manifest <file>", "JSON provisioning manifest merged over the built-in one")
    .option("--dry-run", "print what would be done without changing anything")
    .option("--strict-packages", "fail when python packages are still missing after install")
    .option("--settle-ms <ms>", "wait after starting the runtime before polling it")
    .option("--ready-timeout-ms <ms>", "how long to poll the runtime before moving on")
    .option(
      "--log-dir <dir>",
      "directory for provision.log (default: <cwd>/logs, created before the first step; a temp dir under --dry-run)"
    )
    .option("--cwd <dir>", "directory the data directories are created in");
}

/** Parses argv, runs the bootstrap and returns the process exit code. */
export async function main(argv: string[] = process.argv, deps: CliDeps = {}): Promise<number> {
  const program = createProgram().exitOverride();
  try {
    await program.parseAsync(argv);
  } catch (err) {
    if (err instanceof CommanderError) return err.exitCode;
    throw err;
  }

  const flags = program.opts<CliFlags>();
  const reporter = new Reporter({ color: deps.color, write: deps.write });
  let log: ProvisionLog | undefined;
  try {
    const config = loadConfig(flags, deps.env ?? process.env, deps.cwd ?? process.cwd());
    const manifest = loadManifest(config.manifestPath);
    log = createProvisionLog(config.logDir ?? (config.dryRun ? os.tmpdir() : path.join(config.cwd, "logs")));
    await runBootstrap({
      manifest,
      log,
      reporter,
      runner: deps.runner,
      platform: deps.platform,
      cwd: config.cwd,
      dryRun: config.dryRun,
      strictPackages: config.strictPackages,
      settleMs: config.settleMs,
      readyTimeoutMs: config.readyTimeoutMs,
    });
    return 0;
  } catch (err) {
    // config and manifest errors happen before the run's log exists
    (log ?? createProvisionLog(os.tmpdir())).error("cli", err);
    reporter.blank();
    reporter.failure(errorMessage(err));
    return 1;
  }
}
