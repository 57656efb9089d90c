import {
  existsSync,
  mkdirSync,
  readFileSync,
  readdirSync,
  renameSync,
  rmSync,
  writeFileSync,
} from "node:fs";
import { join } from "node:path";
import { stringify } from "yaml";
import { parseYamlText } from "./config.js";
import { EnvironmentFileSchema, type EnvironmentFile } from "./schema.js";
import type { Environment, HealthRecord, SetupSummary } from "./types.js";

const ACTIVE_POINTER = ".active";
const DESCRIPTOR_EXT = ".yaml";
const ACTIVATION_SCRIPT = "activate.sh";

function toFile(env: Environment): EnvironmentFile {
  return {
    name: env.name,
    status: env.status,
    project_path: env.projectPath,
    languages: env.languages,
    tools: env.tools,
    frameworks: env.frameworks,
    scripts: env.scripts,
    plugins: env.plugins,
    variables: env.variables,
    created_at: env.createdAt,
    activated_at: env.activatedAt,
    health: env.health && {
      status: env.health.status,
      score: env.health.score,
      issues: [...env.health.issues],
      recommendations: [...env.health.recommendations],
      checked_at: env.health.checkedAt,
    },
    last_setup: env.lastSetup && {
      finished_at: env.lastSetup.finishedAt,
      cancelled: env.lastSetup.cancelled,
      succeeded: env.lastSetup.succeeded,
      failed: env.lastSetup.failed,
      pending: env.lastSetup.pending,
    },
  };
}

function fromFile(file: EnvironmentFile): Environment {
  const health: HealthRecord | undefined = file.health && {
    status: file.health.status,
    score: file.health.score,
    issues: file.health.issues,
    recommendations: file.health.recommendations,
    checkedAt: file.health.checked_at,
  };
  const lastSetup: SetupSummary | undefined = file.last_setup && {
    finishedAt: file.last_setup.finished_at,
    cancelled: file.last_setup.cancelled,
    succeeded: file.last_setup.succeeded,
    failed: file.last_setup.failed,
    pending: file.last_setup.pending,
  };
  return {
    name: file.name,
    // A descriptor left in creating means the process died mid-setup
    status: file.status === "creating" ? "degraded" : file.status,
    projectPath: file.project_path,
    languages: file.languages,
    tools: file.tools,
    frameworks: file.frameworks,
    scripts: file.scripts,
    plugins: file.plugins,
    variables: file.variables,
    createdAt: file.created_at,
    activatedAt: file.activated_at,
    health,
    lastSetup,
  };
}

/** Replace `path` with `content` through a temp file and rename. */
export function writeFileAtomic(path: string, content: string): void {
  const tmp = `${path}.${process.pid}.tmp`;
  try {
    writeFileSync(tmp, content, "utf-8");
    renameSync(tmp, path);
  } finally {
    rmSync(tmp, { force: true });
  }
}

/**
 * One YAML descriptor per environment under the environments directory,
 * plus a `.active` pointer naming the active one.
 */
export class EnvironmentStore {
  constructor(readonly dir: string) {}

  descriptorPath(name: string): string {
    return join(this.dir, name + DESCRIPTOR_EXT);
  }

  loadAll(): Environment[] {
    if (!existsSync(this.dir)) return [];
    return readdirSync(this.dir)
      .filter((entry) => entry.endsWith(DESCRIPTOR_EXT))
      .sort()
      .map((entry) => {
        const path = join(this.dir, entry);
        return fromFile(parseYamlText(readFileSync(path, "utf-8"), EnvironmentFileSchema, path));
      });
  }

  save(env: Environment): void {
    mkdirSync(this.dir, { recursive: true });
    writeFileAtomic(this.descriptorPath(env.name), stringify(toFile(env)));
  }

  /** Directory for per-environment files such as the activation script. */
  environmentDir(name: string): string {
    return join(this.dir, name);
  }

  writeActivationScript(name: string, content: string): string {
    const dir = this.environmentDir(name);
    mkdirSync(dir, { recursive: true });
    const path = join(dir, ACTIVATION_SCRIPT);
    writeFileAtomic(path, content);
    return path;
  }

  delete(name: string): void {
    rmSync(this.descriptorPath(name), { force: true });
    rmSync(this.environmentDir(name), { recursive: true, force: true });
  }

  readActive(): string | undefined {
    const path = join(this.dir, ACTIVE_POINTER);
    if (!existsSync(path)) return undefined;
    return readFileSync(path, "utf-8").trim() || undefined;
  }

  writeActive(name: string | undefined): void {
    mkdirSync(this.dir, { recursive: true });
    writeFileAtomic(join(this.dir, ACTIVE_POINTER), name ? name + "\n" : "");
  }
}
