import type { ProvisioningStep } from "./context";
import { installRuntimeStep } from "./install-runtime";
import { startRuntimeStep } from "./start-runtime";
import { pullModelsStep } from "./pull-models";
import { installPackagesStep } from "./install-packages";
import { createDirectoriesStep } from "./create-directories";

/** Fixed order: each step relies on the ones before it. */
export const PROVISIONING_STEPS: readonly ProvisioningStep[] = [
  installRuntimeStep,
  startRuntimeStep,
  pullModelsStep,
  installPackagesStep,
  createDirectoriesStep,
];

export type { ProvisioningStep, StepContext, StepOptions } from "./context";
export { installPackages } from "./install-packages";
