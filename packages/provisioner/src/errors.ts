import type { BootstrapReport, PackageInstallResult, StepId } from "@docdash/core";

export const errorMessage = (err: unknown): string => (err instanceof Error ? err.message : String(err));

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export class CommandFailedError extends Error {
  readonly commandLine: string;
  readonly exitCode: number;
  readonly stderr: string;

  constructor(commandLine: string, exitCode: number, stderr: string) {
    const tail = stderr.trim().split("\n").slice(-1)[0];
    super(`\`${commandLine}\` exited with code ${exitCode}${tail ? `: ${tail}` : ""}`);
    this.name = "CommandFailedError";
    this.commandLine = commandLine;
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}

export class NoStrategyAvailableError extends Error {
  readonly candidates: string[];

  constructor(candidates: string[], hint?: string) {
    super(`None of ${candidates.join(", ")} is available on this machine${hint ? `. ${hint}` : ""}`);
    this.name = "NoStrategyAvailableError";
    this.candidates = candidates;
  }
}

export class PackageInstallError extends Error {
  readonly result: PackageInstallResult;

  constructor(result: PackageInstallResult) {
    super(
      result.missing.length > 0
        ? `Package install ${result.status}; missing: ${result.missing.join(", ")}`
        : `Package installer exited with code ${result.exitCode}`
    );
    this.name = "PackageInstallError";
    this.result = result;
  }
}

export class StepFailedError extends Error {
  readonly step: StepId;
  readonly title: string;
  /** Steps that finished before this one failed. */
  report?: BootstrapReport;

  constructor(step: StepId, title: string, cause: unknown) {
    super(`${title} failed: ${errorMessage(cause)}`, { cause });
    this.name = "StepFailedError";
    this.step = step;
    this.title = title;
  }
}
