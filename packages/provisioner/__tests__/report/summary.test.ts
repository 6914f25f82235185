import { describe, it, expect } from "vitest";
import { defaultManifest, parseManifest } from "@docdash/core";
import { collectSummaryFacts, formatSummary, probeModuleVersion } from "../../src/report/summary";
import type { Painter } from "../../src/report/reporter";
import { FakeMachine, RUNTIME_VERSION } from "../helpers/fake-machine";

const plain: Painter = { green: (t) => t, yellow: (t) => t };
const RULE = "═".repeat(50);

describe("summary", () => {
  it("formats the closing block", () => {
    const lines = formatSummary(
      defaultManifest(),
      {
        runtimeVersion: RUNTIME_VERSION,
        versions: [
          { label: "ChromaDB", version: "0.5.3" },
          { label: "Anthropic", version: "0.34.2" },
        ],
        dryRun: false,
      },
      plain
    );
    expect(lines).toEqual([
      RULE,
      "  ✅ Setup Complete!",
      RULE,
      "",
      "  Ollama:    ollama version is 0.5.7",
      "  Models:    qwen2.5-coder:7b, llama3.1:8b",
      "  ChromaDB:  0.5.3",
      "  Anthropic: 0.34.2",
      "",
      "  Make sure your API key is set:",
      '  export ANTHROPIC_API_KEY="sk-ant-..."',
      "",
      "  To test Ollama:",
      '  ollama run qwen2.5-coder:7b "Hello, are you working?"',
      "",
      "  To start the dashboard:",
      "  streamlit run app.py",
      "",
    ]);
  });

  it("says nothing changed after a dry run", () => {
    const lines = formatSummary(defaultManifest(), { runtimeVersion: "installed", versions: [], dryRun: true }, plain);
    expect(lines[1]).toBe("  ✅ Dry run complete, nothing was changed");
  });

  it("leaves out the smoke test when there are no models", () => {
    const lines = formatSummary(parseManifest({ models: [] }), { runtimeVersion: "installed", versions: [], dryRun: false }, plain);
    expect(lines).not.toContain("  To test Ollama:");
    expect(lines).toContain("  Models:    ");
  });

  it("runs the interpreter to read a module version", async () => {
    const machine = new FakeMachine({ pipPackages: new Set(["chromadb"]) });
    expect(await probeModuleVersion(machine, "python3", "chromadb")).toBe("0.5.3");
    expect(machine.calls).toEqual(["python3 -c import chromadb; print(chromadb.__version__)"]);
  });

  it("falls back to 'installed' when versions cannot be read", async () => {
    const facts = await collectSummaryFacts(new FakeMachine(), defaultManifest(), false);
    expect(facts).toEqual({
      runtimeVersion: "installed",
      versions: [
        { label: "ChromaDB", version: "installed" },
        { label: "Anthropic", version: "installed" },
      ],
      dryRun: false,
    });
  });

  it("reports the runtime's own version line when it answers", async () => {
    const machine = new FakeMachine({ binaries: new Set(["ollama"]) });
    const facts = await collectSummaryFacts(machine, defaultManifest(), false);
    expect(facts.runtimeVersion).toBe(RUNTIME_VERSION);
  });
});
