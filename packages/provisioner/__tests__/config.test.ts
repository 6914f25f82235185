import fs from "node:fs";
import path from "node:path";
import { describe, it, expect } from "vitest";
import { defaultManifest } from "@docdash/core";
import { loadConfig, loadManifest } from "../src/config";
import { ConfigError } from "../src/errors";
import { makeTempDir } from "./helpers/fake-machine";

describe("config", () => {
  describe("loadConfig", () => {
    it("uses defaults when nothing is set", () => {
      expect(loadConfig({}, {}, "/work")).toEqual({
        cwd: "/work",
        dryRun: false,
        strictPackages: false,
        settleMs: 3000,
        readyTimeoutMs: 15000,
      });
    });

    it("reads DOCDASH_* variables", () => {
      const config = loadConfig(
        {},
        {
          DOCDASH_MANIFEST: "manifest.json",
          DOCDASH_LOG_DIR: "/var/log/docdash",
          DOCDASH_SETTLE_MS: "500",
          DOCDASH_READY_TIMEOUT_MS: "2000",
          DOCDASH_STRICT_PACKAGES: "TRUE",
        },
        "/work"
      );
      expect(config).toMatchObject({
        manifestPath: "/work/manifest.json",
        logDir: "/var/log/docdash",
        settleMs: 500,
        readyTimeoutMs: 2000,
        strictPackages: true,
      });
    });

    it("lets flags override the environment", () => {
      const config = loadConfig(
        { settleMs: "100", strictPackages: false, cwd: "site", dryRun: true },
        { DOCDASH_SETTLE_MS: "500", DOCDASH_STRICT_PACKAGES: "1" },
        "/work"
      );
      expect(config).toMatchObject({ settleMs: 100, strictPackages: false, cwd: "/work/site", dryRun: true });
    });

    it("ignores blank variables", () => {
      expect(loadConfig({}, { DOCDASH_MANIFEST: "  ", DOCDASH_SETTLE_MS: "" }, "/work")).toMatchObject({
        manifestPath: undefined,
        settleMs: 3000,
      });
    });

    it("rejects a non-numeric delay", () => {
      expect(() => loadConfig({ settleMs: "soon" }, {}, "/work")).toThrow(ConfigError);
      expect(() => loadConfig({ settleMs: "soon" }, {}, "/work")).toThrow(/settleMs/);
    });

    it("rejects a negative timeout", () => {
      expect(() => loadConfig({ readyTimeoutMs: "-1" }, {}, "/work")).toThrow(/readyTimeoutMs/);
    });

    it("rejects an unrecognised strict flag", () => {
      expect(() => loadConfig({}, { DOCDASH_STRICT_PACKAGES: "maybe" }, "/work")).toThrow(/strictPackages/);
    });
  });

  describe("loadManifest", () => {
    it("returns the built-in manifest without a path", () => {
      expect(loadManifest()).toEqual(defaultManifest());
    });

    it("merges a manifest file over the defaults", () => {
      const file = path.join(makeTempDir(), "manifest.json");
      fs.writeFileSync(file, JSON.stringify({ models: [{ id: "phi3:mini", role: "test" }], packages: ["tiktoken"] }));
      const manifest = loadManifest(file);
      expect(manifest.models).toEqual([{ id: "phi3:mini", role: "test" }]);
      expect(manifest.packages).toEqual(["tiktoken"]);
      expect(manifest.directories).toEqual(defaultManifest().directories);
    });

    it("reports unreadable JSON as a ConfigError", () => {
      const file = path.join(makeTempDir(), "manifest.json");
      fs.writeFileSync(file, "{ not json");
      expect(() => loadManifest(file)).toThrow(ConfigError);
      expect(() => loadManifest(file)).toThrow(`Cannot read manifest ${file}`);
    });

    it("reports a missing file as a ConfigError", () => {
      const file = path.join(makeTempDir(), "missing.json");
      expect(() => loadManifest(file)).toThrow(/ENOENT/);
    });
  });
});
