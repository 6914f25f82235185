import { describe, it, expect } from "vitest";
import { ManifestError, STEP_ORDER, defaultManifest, parseManifest } from "../src";

describe("manifest", () => {
  describe("defaultManifest", () => {
    it("names the two models the dashboard uses", () => {
      expect(defaultManifest().models).toEqual([
        { id: "qwen2.5-coder:7b", role: "document engine" },
        { id: "llama3.1:8b", role: "general assistant" },
      ]);
    });

    it("lists the four data directories", () => {
      expect(defaultManifest().directories).toEqual(["data/vectorstore", "data/ingest", "ingest_inbox", "logs"]);
    });

    it("lists the python packages in install order", () => {
      const { packages } = defaultManifest();
      expect(packages).toHaveLength(11);
      expect(packages[0]).toBe("chromadb");
      expect(packages[packages.length - 1]).toBe("tiktoken");
      expect(packages).toContain("langchain-text-splitters");
    });

    it("targets ollama on its default port", () => {
      const { runtime } = defaultManifest();
      expect(runtime.binary).toBe("ollama");
      expect(runtime.endpoint).toBe("http://localhost:11434");
      expect(runtime.installScriptUrl).toBe("https://ollama.com/install.sh");
    });

    it("returns a fresh copy each call", () => {
      const a = defaultManifest();
      a.packages.push("extra");
      expect(defaultManifest().packages).not.toContain("extra");
    });
  });

  describe("parseManifest", () => {
    it("fills missing top-level keys from the default manifest", () => {
      const manifest = parseManifest({ models: [{ id: "phi3:mini" }] });
      expect(manifest.models).toEqual([{ id: "phi3:mini", role: "" }]);
      expect(manifest.packages).toEqual(defaultManifest().packages);
      expect(manifest.directories).toEqual(defaultManifest().directories);
    });

    it("merges runtime fields over the defaults", () => {
      const manifest = parseManifest({ runtime: { endpoint: "http://127.0.0.1:11500" } });
      expect(manifest.runtime.endpoint).toBe("http://127.0.0.1:11500");
      expect(manifest.runtime.binary).toBe("ollama");
      expect(manifest.runtime.serviceName).toBe("ollama");
    });

    it("merges python and reminders fields over the defaults", () => {
      const manifest = parseManifest({ python: { pip: "pip3" }, reminders: { dashboardCommand: "npm start" } });
      expect(manifest.python).toEqual({ pip: "pip3", interpreter: "python3" });
      expect(manifest.reminders.dashboardCommand).toBe("npm start");
      expect(manifest.reminders.apiKeyVariable).toBe("ANTHROPIC_API_KEY");
    });

    it("drops duplicate packages, directories and model ids keeping the first", () => {
      const manifest = parseManifest({
        packages: ["chromadb", "tiktoken", "chromadb"],
        directories: ["logs", "logs", "data"],
        models: [
          { id: "a:1b", role: "first" },
          { id: "a:1b", role: "second" },
        ],
      });
      expect(manifest.packages).toEqual(["chromadb", "tiktoken"]);
      expect(manifest.directories).toEqual(["logs", "data"]);
      expect(manifest.models).toEqual([{ id: "a:1b", role: "first" }]);
    });

    it("rejects absolute directories", () => {
      expect(() => parseManifest({ directories: ["/etc/docdash"] })).toThrow(ManifestError);
      try {
        parseManifest({ directories: ["/etc/docdash"] });
      } catch (err) {
        expect(err).toBeInstanceOf(ManifestError);
        if (err instanceof ManifestError) {
          expect(err.issues).toEqual(["directories.0: must be a relative path inside the working directory"]);
        }
      }
    });

    it("rejects directories that climb out of the working directory", () => {
      expect(() => parseManifest({ directories: ["data/../../outside"] })).toThrow(/directories\.0/);
    });

    it("rejects empty model ids", () => {
      expect(() => parseManifest({ models: [{ id: "  " }] })).toThrow(/models\.0\.id/);
    });

    it("rejects a non-object manifest", () => {
      try {
        parseManifest(["not", "a", "manifest"]);
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(ManifestError);
        if (err instanceof ManifestError) expect(err.issues).toEqual(["(root): expected an object"]);
      }
    });
  });

  it("orders steps install, start, pull, packages, directories", () => {
    expect(STEP_ORDER).toEqual(["install-runtime", "start-runtime", "pull-models", "install-packages", "create-directories"]);
  });
});
