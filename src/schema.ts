import semver from "semver";
import { z } from "zod";

const Name = z
  .string()
  .regex(/^[a-z0-9][a-z0-9._-]*$/, "Must be lowercase letters, digits, '.', '_' or '-'");

const LogLevel = z.enum(["debug", "info", "warn", "error", "silent"]);

// --- Global settings (<home>/config.yaml) ---

export const SettingsFileSchema = z.object({
  devenv_dir: z.string().optional(),
  environments_dir: z.string().optional(),
  plugins_dir: z.string().optional(),
  cache_dir: z.string().optional(),
  log_level: LogLevel.optional(),
  auto_update: z.boolean().optional(),
  concurrency: z.number().int().min(1).max(64).optional(),
  min_confidence: z.number().min(0).max(1).optional(),
  retry: z
    .object({
      max_attempts: z.number().int().min(1).optional(),
      base_delay_ms: z.number().int().min(0).optional(),
      max_delay_ms: z.number().int().min(0).optional(),
    })
    .optional(),
  task_timeout_ms: z.number().int().positive().optional(),
  probe_timeout_ms: z.number().int().positive().optional(),
  // Accepted for compatibility with older config files; no behaviour attached
  team_sync: z.boolean().optional(),
  security_scan: z.boolean().optional(),
  performance_monitoring: z.boolean().optional(),
});

export type SettingsFile = z.infer<typeof SettingsFileSchema>;

// --- Project configuration (<project>/devenv.yaml) ---

export const ProjectConfigSchema = z.object({
  name: Name.optional(),
  languages: z.record(z.string(), z.union([z.string(), z.number()])).optional(),
  tools: z
    .union([
      z.array(z.string()),
      z.record(z.string(), z.union([z.string(), z.number()])),
    ])
    .optional(),
  scripts: z.record(z.string(), z.string()).optional(),
});

export type ProjectConfig = z.infer<typeof ProjectConfigSchema>;

// --- Persisted environment descriptor (<environments_dir>/<name>.yaml) ---

const HealthIssue = z.object({
  language: z.string(),
  plugin: z.string().optional(),
  kind: z.enum(["probe-failed", "plugin-missing", "version-drift", "reported"]),
  severity: z.enum(["degraded", "unhealthy"]),
  message: z.string(),
});

const HealthRecord = z.object({
  status: z.enum(["healthy", "degraded", "unhealthy"]),
  score: z.number(),
  issues: z.array(HealthIssue),
  recommendations: z.array(z.string()),
  checked_at: z.string(),
});

const SetupSummary = z.object({
  finished_at: z.string(),
  cancelled: z.boolean(),
  succeeded: z.array(z.string()),
  failed: z.array(z.string()),
  pending: z.array(z.string()),
});

export const EnvironmentFileSchema = z.object({
  name: Name,
  status: z.enum(["uninitialized", "creating", "active", "inactive", "degraded", "removed"]),
  project_path: z.string(),
  languages: z.record(z.string(), z.string()),
  tools: z.array(z.string()).default([]),
  frameworks: z.record(z.string(), z.string()).default({}),
  scripts: z.record(z.string(), z.string()).default({}),
  plugins: z.record(z.string(), z.string()).default({}),
  variables: z.record(z.string(), z.string()).default({}),
  created_at: z.string(),
  activated_at: z.string().optional(),
  health: HealthRecord.optional(),
  last_setup: SetupSummary.optional(),
});

export type EnvironmentFile = z.infer<typeof EnvironmentFileSchema>;

// --- Shared descriptor (devenv share / devenv import) ---

export const SharedDescriptorSchema = z.object({
  schema_version: z.literal(1),
  name: Name,
  languages: z.record(z.string(), z.string()),
  tools: z.array(z.string()).default([]),
  frameworks: z.record(z.string(), z.string()).default({}),
  scripts: z.record(z.string(), z.string()).default({}),
});

export type SharedDescriptor = z.infer<typeof SharedDescriptorSchema>;

// --- Script plugins (<plugins_dir>/*.yaml) ---

export const ScriptPluginSchema = z.object({
  name: Name,
  kind: z.enum(["language", "tool", "manager"]).default("tool"),
  description: z.string().optional(),
  provides: z.array(z.string()).optional(),
  versions: z
    .string()
    .refine((v) => semver.validRange(v) !== null, "Must be a semver range")
    .default("*"),
  default_version: z.string(),
  depends_on: z.array(z.string()).default([]),
  install: z.string().describe("Shell command that installs into {install_dir}"),
  fallback: z.string().optional().describe("Shell command tried once after a permanent failure"),
  update: z.string().optional(),
  install_dependencies: z.string().optional(),
  deactivate: z
    .string()
    .optional()
    .describe("Shell command run when the environment is switched away from"),
  check: z.string().describe("Shell command printing the installed version"),
  env: z.record(z.string(), z.string()).default({}),
  path: z.array(z.string()).default(["{install_dir}/bin"]),
});

export type ScriptPluginManifest = z.infer<typeof ScriptPluginSchema>;

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((i) => `  ${i.path.join(".") || "(root)"}: ${i.message}`)
    .join("\n");
}
