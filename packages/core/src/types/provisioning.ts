export type StepId =
  | "install-runtime"
  | "start-runtime"
  | "pull-models"
  | "install-packages"
  | "create-directories";

export const STEP_ORDER: readonly StepId[] = [
  "install-runtime",
  "start-runtime",
  "pull-models",
  "install-packages",
  "create-directories",
];

/** "skipped" means the target state was already there; "done" means this run produced it. */
export type StepStatus = "done" | "skipped";

export interface StepOutcome {
  status: StepStatus;
  detail: string;
  /** Set by the package step only. */
  packages?: PackageInstallResult;
}

export interface StepRecord {
  status: StepStatus;
  detail: string;
  id: StepId;
  title: string;
  durationMs: number;
}

export type PackageInstallStatus = "success" | "partial" | "failure";

export interface PackageInstallResult {
  status: PackageInstallStatus;
  installed: string[];
  missing: string[];
  exitCode: number;
  stderr: string;
}

export interface BootstrapReport {
  steps: StepRecord[];
  packages?: PackageInstallResult;
  runtimeVersion: string;
  completed: boolean;
  dryRun: boolean;
}
