import fs from "node:fs";
import path from "node:path";
import * as z from "zod/v4";
import { defaultManifest, parseManifest, type ProvisioningManifest } from "@docdash/core";
import { ConfigError, errorMessage } from "./errors";
import { DEFAULT_READY_TIMEOUT_MS, DEFAULT_SETTLE_MS } from "./bootstrap";

/** Options as commander hands them over. */
export type CliFlags = {
  manifest?: string;
  dryRun?: boolean;
  strictPackages?: boolean;
  settleMs?: string;
  readyTimeoutMs?: string;
  logDir?: string;
  cwd?: string;
};

const envFlag = z
  .enum(["1", "0", "true", "false", "yes", "no"])
  .transform((v) => v === "1" || v === "true" || v === "yes");

const ConfigSchema = z.object({
  cwd: z.string().min(1),
  manifestPath: z.string().min(1).optional(),
  logDir: z.string().min(1).optional(),
  dryRun: z.boolean(),
  strictPackages: z.union([z.boolean(), envFlag]),
  settleMs: z.coerce.number().int().min(0),
  readyTimeoutMs: z.coerce.number().int().min(0),
});

export type ProvisionerConfig = z.infer<typeof ConfigSchema>;

const nonBlank = (value: string | undefined): string | undefined => (value && value.trim() ? value : undefined);

/**
 * Defaults, then DOCDASH_* environment variables, then CLI flags. Relative paths resolve
 * against `baseDir`.
 */
export function loadConfig(
  flags: CliFlags = {},
  env: NodeJS.ProcessEnv = process.env,
  baseDir: string = process.cwd()
): ProvisionerConfig {
  const manifestPath = nonBlank(flags.manifest) ?? nonBlank(env.DOCDASH_MANIFEST);
  const logDir = nonBlank(flags.logDir) ?? nonBlank(env.DOCDASH_LOG_DIR);
  const raw = {
    cwd: path.resolve(baseDir, flags.cwd ?? "."),
    manifestPath: manifestPath && path.resolve(baseDir, manifestPath),
    logDir: logDir && path.resolve(baseDir, logDir),
    dryRun: flags.dryRun ?? false,
    strictPackages: flags.strictPackages ?? nonBlank(env.DOCDASH_STRICT_PACKAGES)?.toLowerCase() ?? false,
    settleMs: flags.settleMs ?? nonBlank(env.DOCDASH_SETTLE_MS) ?? DEFAULT_SETTLE_MS,
    readyTimeoutMs: flags.readyTimeoutMs ?? nonBlank(env.DOCDASH_READY_TIMEOUT_MS) ?? DEFAULT_READY_TIMEOUT_MS,
  };
  const result = ConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(
      `Invalid configuration: ${result.error.issues.map((i) => `${i.path.map(String).join(".")}: ${i.message}`).join("; ")}`
    );
  }
  return result.data;
}

/** The built-in manifest, or the JSON file at `manifestPath` merged over it. */
export function loadManifest(manifestPath?: string): ProvisioningManifest {
  if (!manifestPath) return defaultManifest();
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(manifestPath, "utf8"));
  } catch (err) {
    throw new ConfigError(`Cannot read manifest ${manifestPath}: ${errorMessage(err)}`);
  }
  return parseManifest(parsed);
}
