import { describe, it, expect } from "vitest";
import { STEP_ORDER, defaultManifest } from "@docdash/core";
import { PROVISIONING_STEPS } from "../../src/steps";

describe("PROVISIONING_STEPS", () => {
  it("runs in the fixed provisioning order", () => {
    expect(PROVISIONING_STEPS.map((s) => s.id)).toEqual(STEP_ORDER);
  });

  it("titles each step for the progress header", () => {
    expect(PROVISIONING_STEPS.map((s) => s.title(defaultManifest()))).toEqual([
      "Checking Ollama...",
      "Starting Ollama service...",
      "Pulling AI models...",
      "Installing Python dependencies...",
      "Setting up data directories...",
    ]);
  });
});
