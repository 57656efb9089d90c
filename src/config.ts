import { readFile } from "node:fs/promises";
import { join, resolve } from "node:path";
import { homedir } from "node:os";
import { parse as parseYaml } from "yaml";
import type { z } from "zod";
import { ConfigurationError } from "./errors.js";
import type { LogLevel } from "./log.js";
import {
  ProjectConfigSchema,
  SettingsFileSchema,
  formatIssues,
  type ProjectConfig,
  type SettingsFile,
} from "./schema.js";

export const SETTINGS_FILE = "config.yaml";
export const PROJECT_CONFIG_FILE = "devenv.yaml";

export interface RetrySettings {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface Settings {
  devenvDir: string;
  environmentsDir: string;
  pluginsDir: string;
  cacheDir: string;
  logLevel: LogLevel;
  autoUpdate: boolean;
  concurrency: number;
  minConfidence: number;
  retry: RetrySettings;
  taskTimeoutMs: number;
  probeTimeoutMs: number;
}

export const DEFAULT_RETRY: RetrySettings = {
  maxAttempts: 3,
  baseDelayMs: 500,
  maxDelayMs: 8_000,
};

export function defaultSettings(home: string): Settings {
  return {
    devenvDir: home,
    environmentsDir: join(home, "environments"),
    pluginsDir: join(home, "plugins"),
    cacheDir: join(home, "cache"),
    logLevel: "info",
    autoUpdate: false,
    concurrency: 4,
    minConfidence: 0.5,
    retry: { ...DEFAULT_RETRY },
    taskTimeoutMs: 600_000,
    probeTimeoutMs: 30_000,
  };
}

export function resolveHome(env: NodeJS.ProcessEnv = process.env): string {
  return env.DEVENV_HOME ? resolve(env.DEVENV_HOME) : join(homedir(), ".devenv");
}

/**
 * Read and validate a YAML file. Returns undefined when the file does not
 * exist; any other failure is a ConfigurationError naming the file.
 */
export async function readYamlFile<T>(
  path: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): Promise<T | undefined> {
  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch (err: unknown) {
    if (isNotFound(err)) return undefined;
    throw new ConfigurationError(`Cannot read ${path}`, { path }, err);
  }
  return parseYamlText(raw, schema, path);
}

export function parseYamlText<T>(
  raw: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  label: string,
): T {
  let parsed: unknown;
  try {
    parsed = parseYaml(raw);
  } catch (err: unknown) {
    throw new ConfigurationError(`Invalid YAML in ${label}`, { path: label }, err);
  }

  const result = schema.safeParse(parsed ?? {});
  if (!result.success) {
    throw new ConfigurationError(
      `Validation failed for ${label}:\n${formatIssues(result.error)}`,
      { path: label },
    );
  }
  return result.data;
}

export async function loadSettings(
  opts: { home?: string; env?: NodeJS.ProcessEnv } = {},
): Promise<Settings> {
  const env = opts.env ?? process.env;
  const home = opts.home ?? resolveHome(env);
  const file: SettingsFile =
    (await readYamlFile(join(home, SETTINGS_FILE), SettingsFileSchema)) ?? {};
  const defaults = defaultSettings(file.devenv_dir ?? home);

  const settings: Settings = {
    devenvDir: file.devenv_dir ?? home,
    environmentsDir: file.environments_dir ?? defaults.environmentsDir,
    pluginsDir: file.plugins_dir ?? defaults.pluginsDir,
    cacheDir: file.cache_dir ?? defaults.cacheDir,
    logLevel: file.log_level ?? defaults.logLevel,
    autoUpdate: file.auto_update ?? defaults.autoUpdate,
    concurrency: file.concurrency ?? defaults.concurrency,
    minConfidence: file.min_confidence ?? defaults.minConfidence,
    retry: {
      maxAttempts: file.retry?.max_attempts ?? defaults.retry.maxAttempts,
      baseDelayMs: file.retry?.base_delay_ms ?? defaults.retry.baseDelayMs,
      maxDelayMs: file.retry?.max_delay_ms ?? defaults.retry.maxDelayMs,
    },
    taskTimeoutMs: file.task_timeout_ms ?? defaults.taskTimeoutMs,
    probeTimeoutMs: file.probe_timeout_ms ?? defaults.probeTimeoutMs,
  };

  // Environment overrides
  const level = env.DEVENV_LOG_LEVEL;
  if (
    level === "debug" ||
    level === "info" ||
    level === "warn" ||
    level === "error" ||
    level === "silent"
  ) {
    settings.logLevel = level;
  } else if (level) {
    throw new ConfigurationError(`DEVENV_LOG_LEVEL has unknown level "${level}"`);
  }
  if (env.DEVENV_CONCURRENCY) {
    const concurrency = parseInt(env.DEVENV_CONCURRENCY, 10);
    if (isNaN(concurrency) || concurrency < 1) {
      throw new ConfigurationError(
        `DEVENV_CONCURRENCY must be a positive integer, got "${env.DEVENV_CONCURRENCY}"`,
      );
    }
    settings.concurrency = concurrency;
  }

  return settings;
}

export async function loadProjectConfig(dir: string): Promise<ProjectConfig | undefined> {
  return readYamlFile(join(dir, PROJECT_CONFIG_FILE), ProjectConfigSchema);
}

export function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
