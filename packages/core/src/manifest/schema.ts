import * as z from "zod/v4";
import defaultManifestJson from "./default-manifest.json";

const nonEmpty = z.string().trim().min(1);

/** Relative, and never climbing out of the working directory. */
const isInsideWorkingDir = (p: string) =>
  !/^([a-zA-Z]:)?[\\/]/.test(p) && !p.split(/[\\/]+/).includes("..");

const uniqueStrings = (list: string[]) => [...new Set(list)];

export const RuntimeSpecSchema = z.object({
  displayName: nonEmpty,
  binary: nonEmpty,
  packageName: nonEmpty,
  serviceName: nonEmpty,
  endpoint: z.url(),
  installScriptUrl: z.url(),
});

export const PythonSpecSchema = z.object({
  pip: nonEmpty,
  interpreter: nonEmpty,
});

export const ModelSpecSchema = z.object({
  id: nonEmpty,
  role: z.string().default(""),
});

export const VersionProbeSchema = z.object({
  label: nonEmpty,
  module: z.string().regex(/^[A-Za-z_][A-Za-z0-9_.]*$/, "must be a python module name"),
});

export const RemindersSchema = z.object({
  apiKeyVariable: nonEmpty,
  apiKeyExample: z.string(),
  smokeTestPrompt: z.string(),
  dashboardCommand: nonEmpty,
});

export const ManifestSchema = z.object({
  runtime: RuntimeSpecSchema,
  models: z
    .array(ModelSpecSchema)
    .transform((models) => models.filter((m, i) => models.findIndex((o) => o.id === m.id) === i)),
  packages: z.array(nonEmpty).transform(uniqueStrings),
  directories: z
    .array(nonEmpty.refine(isInsideWorkingDir, "must be a relative path inside the working directory"))
    .transform(uniqueStrings),
  python: PythonSpecSchema,
  versionProbes: z.array(VersionProbeSchema),
  reminders: RemindersSchema,
});

export type RuntimeSpec = z.infer<typeof RuntimeSpecSchema>;
export type PythonSpec = z.infer<typeof PythonSpecSchema>;
export type ModelSpec = z.infer<typeof ModelSpecSchema>;
export type VersionProbe = z.infer<typeof VersionProbeSchema>;
export type Reminders = z.infer<typeof RemindersSchema>;
export type ProvisioningManifest = z.infer<typeof ManifestSchema>;

export class ManifestError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid provisioning manifest: ${issues.join("; ")}`);
    this.name = "ManifestError";
    this.issues = issues;
  }
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/** The manifest the dashboard expects: Ollama, two models, the python stack, four directories. */
export function defaultManifest(): ProvisioningManifest {
  return ManifestSchema.parse(defaultManifestJson);
}

/**
 * Validate a manifest read from JSON. Top-level keys that are missing fall back to the
 * default manifest; `runtime`, `python` and `reminders` are merged field by field.
 */
export function parseManifest(input: unknown): ProvisioningManifest {
  if (!isRecord(input)) {
    throw new ManifestError(["(root): expected an object"]);
  }
  const base = defaultManifest();
  const merged = {
    ...base,
    ...input,
    runtime: isRecord(input.runtime) ? { ...base.runtime, ...input.runtime } : input.runtime ?? base.runtime,
    python: isRecord(input.python) ? { ...base.python, ...input.python } : input.python ?? base.python,
    reminders: isRecord(input.reminders) ? { ...base.reminders, ...input.reminders } : input.reminders ?? base.reminders,
  };
  const result = ManifestSchema.safeParse(merged);
  if (!result.success) {
    throw new ManifestError(
      result.error.issues.map((issue) => `${issue.path.map(String).join(".") || "(root)"}: ${issue.message}`)
    );
  }
  return result.data;
}
