import { existsSync } from "node:fs";
import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { setTimeout as delay } from "node:timers/promises";
import semver from "semver";
import { DEFAULT_RETRY, type RetrySettings } from "./config.js";
import { KeyedMutex, withTimeout } from "./concurrency.js";
import {
  DevenvError,
  InstallFailedError,
  errorMessage,
} from "./errors.js";
import { execRunner, runShell, type CommandRunner } from "./exec.js";
import { silentLogger, type Logger } from "./log.js";
import {
  COMPLETE_MARKER,
  composeActivation,
  contextFor,
  dependencyOrder,
  installDirFor,
  withActivation,
  type ContextBase,
} from "./providers/activation.js";
import { normalizeRange, type PluginRegistry } from "./providers/registry.js";
import type { LanguageProvider } from "./providers/types.js";
import type { InstallTask, ProjectProfile, TaskStatus } from "./types.js";

export interface PlannedTask {
  plugin: string;
  version: string;
  dependsOn: string[];
  /** Languages or tools from the profile that pulled this plugin in. */
  requestedBy: string[];
}

export interface SkippedRequirement {
  name: string;
  reason: string;
}

export interface InstallPlan {
  tasks: PlannedTask[];
  skipped: SkippedRequirement[];
}

export interface InstallReport {
  tasks: InstallTask[];
  skipped: SkippedRequirement[];
  cancelled: boolean;
  warnings: string[];
  /** Every task succeeded and the run was not interrupted. */
  ok: boolean;
}

export interface InstallerOptions {
  cacheDir: string;
  concurrency?: number;
  retry?: RetrySettings;
  taskTimeoutMs?: number;
  autoUpdate?: boolean;
  runner?: CommandRunner;
  logger?: Logger;
  env?: NodeJS.ProcessEnv;
  sleep?: (ms: number) => Promise<void>;
  /** Shared between installers that write to the same cache. */
  locks?: KeyedMutex;
}

export interface InstallRunOptions {
  signal?: AbortSignal;
  projectPath?: string;
  /** Install project dependencies once every task has succeeded. */
  installDependencies?: boolean;
  scripts?: Readonly<Record<string, string>>;
  onTaskUpdate?: (task: Readonly<InstallTask>) => void;
}

const TRANSITIONS: Record<TaskStatus, readonly TaskStatus[]> = {
  pending: ["running"],
  running: ["succeeded", "failed", "retrying"],
  retrying: ["running"],
  succeeded: [],
  failed: [],
};

const TRANSIENT_ERRNO = new Set(["ETIMEDOUT", "ECONNRESET", "ECONNREFUSED", "ENOTFOUND", "EAI_AGAIN", "EPIPE"]);

export function backoffDelay(attempt: number, retry: RetrySettings): number {
  return Math.min(retry.maxDelayMs, retry.baseDelayMs * 2 ** (attempt - 1));
}

/** Pick the concrete version to install for a request. */
export function targetVersion(provider: LanguageProvider, requested: string | undefined): string {
  if (!requested) return provider.defaultVersion;
  const exact = semver.valid(requested.trim().replace(/^v(?=\d)/, ""));
  if (exact) return exact;
  const range = normalizeRange(requested);
  if (semver.satisfies(provider.defaultVersion, range)) return provider.defaultVersion;
  return semver.minVersion(range)?.version ?? requested;
}

function classify(err: unknown, plugin: string, version: string): InstallFailedError {
  if (err instanceof InstallFailedError) return err;
  const code = err instanceof Error && "code" in err ? String(err.code) : undefined;
  return new InstallFailedError(
    `${plugin}@${version} install failed: ${errorMessage(err)}`,
    code !== undefined && TRANSIENT_ERRNO.has(code),
    { plugin, version },
    err,
  );
}

/**
 * Turns a project profile into a task graph over plugin descriptors and runs
 * it on a bounded worker pool.
 */
export class DependencyInstaller {
  private readonly concurrency: number;
  private readonly retry: RetrySettings;
  private readonly taskTimeoutMs: number;
  private readonly runner: CommandRunner;
  private readonly logger: Logger;
  private readonly env: NodeJS.ProcessEnv;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly locks: KeyedMutex;

  constructor(
    private readonly registry: PluginRegistry,
    private readonly options: InstallerOptions,
  ) {
    this.concurrency = Math.max(1, options.concurrency ?? 4);
    this.retry = options.retry ?? DEFAULT_RETRY;
    this.taskTimeoutMs = options.taskTimeoutMs ?? 0;
    this.runner = options.runner ?? execRunner;
    this.logger = options.logger ?? silentLogger;
    this.env = options.env ?? process.env;
    this.sleep = options.sleep ?? ((ms) => delay(ms));
    this.locks = options.locks ?? new KeyedMutex();
  }

  /**
   * Resolve every language (failures propagate) and tool (unresolvable ones
   * are skipped), then pull in declared dependencies at their default versions.
   */
  plan(profile: ProjectProfile): InstallPlan {
    const chosen = new Map<string, PlannedTask>();
    const skipped: SkippedRequirement[] = [];

    const add = (provider: LanguageProvider, requested: string | undefined, by: string) => {
      const existing = chosen.get(provider.name);
      if (existing) {
        existing.requestedBy.push(by);
        return;
      }
      chosen.set(provider.name, {
        plugin: provider.name,
        version: targetVersion(provider, requested),
        dependsOn: [...provider.dependsOn],
        requestedBy: [by],
      });
    };

    for (const [language, detection] of Object.entries(profile.languages)) {
      add(this.registry.resolve(language, detection.version), detection.version, language);
    }

    for (const tool of profile.tools) {
      try {
        add(this.registry.resolve(tool.name, tool.version), tool.version, tool.name);
      } catch (err: unknown) {
        if (!(err instanceof DevenvError)) throw err;
        skipped.push({ name: tool.name, reason: err.message });
      }
    }

    const queue = [...chosen.values()];
    while (queue.length > 0) {
      const task = queue.shift();
      if (!task) break;
      for (const dep of task.dependsOn) {
        if (chosen.has(dep)) continue;
        const provider = this.registry.lookup(dep);
        add(provider, undefined, task.plugin);
        const added = chosen.get(dep);
        if (added) queue.push(added);
      }
    }

    const tasks = dependencyOrder(this.registry, chosen.keys()).flatMap((name) => {
      const task = chosen.get(name);
      return task ? [task] : [];
    });
    return { tasks, skipped };
  }

  async run(plan: InstallPlan, opts: InstallRunOptions = {}): Promise<InstallReport> {
    const tasks = new Map<string, InstallTask>(
      plan.tasks.map((t) => [
        t.plugin,
        {
          plugin: t.plugin,
          version: t.version,
          dependsOn: t.dependsOn,
          status: "pending",
          attempts: 0,
          usedFallback: false,
          cached: false,
        },
      ]),
    );
    const running = new Map<string, Promise<void>>();
    const warnings: string[] = [];

    const depState = (task: InstallTask) => task.dependsOn.map((d) => tasks.get(d));

    for (;;) {
      for (const task of tasks.values()) {
        if (task.status !== "pending" || task.blockedBy) continue;
        const broken = depState(task).find((d) => d && (d.status === "failed" || d.blockedBy));
        if (broken) {
          task.blockedBy = broken.plugin;
          this.logger.warn(`${task.plugin}: not started, dependency ${broken.plugin} failed`);
          opts.onTaskUpdate?.(task);
        }
      }

      if (!opts.signal?.aborted) {
        for (const task of tasks.values()) {
          if (running.size >= this.concurrency) break;
          if (task.status !== "pending" || task.blockedBy || running.has(task.plugin)) continue;
          if (!depState(task).every((d) => d?.status === "succeeded")) continue;

          const work = this.execute(task, tasks, opts).finally(() => running.delete(task.plugin));
          running.set(task.plugin, work);
        }
      }

      if (running.size === 0) break;
      await Promise.race(running.values());
    }

    const all = [...tasks.values()];
    const cancelled = opts.signal?.aborted === true && all.some((t) => t.status === "pending" && !t.blockedBy);
    if (cancelled) this.logger.warn("Setup interrupted: remaining tasks were not started");

    const ok = !cancelled && all.every((t) => t.status === "succeeded");
    if (ok && opts.installDependencies && opts.projectPath) {
      warnings.push(...(await this.installProjectDependencies(all, opts)));
    }

    return { tasks: all, skipped: plan.skipped, cancelled, warnings, ok };
  }

  private advance(task: InstallTask, to: TaskStatus, opts: InstallRunOptions): void {
    if (!TRANSITIONS[task.status].includes(to)) {
      throw new DevenvError("Internal", `Task ${task.plugin} cannot move from ${task.status} to ${to}`);
    }
    task.status = to;
    opts.onTaskUpdate?.(task);
  }

  private contextBase(opts: InstallRunOptions): ContextBase {
    return {
      registry: this.registry,
      cacheDir: this.options.cacheDir,
      runner: this.runner,
      logger: this.logger,
      env: this.env,
      timeoutMs: this.taskTimeoutMs || undefined,
      projectPath: opts.projectPath,
    };
  }

  /** Environment with every (already succeeded) transitive dependency activated. */
  private async dependencyEnv(
    task: InstallTask,
    tasks: Map<string, InstallTask>,
    base: ContextBase,
  ): Promise<NodeJS.ProcessEnv> {
    const deps: Record<string, string> = {};
    const stack = [...task.dependsOn];
    while (stack.length > 0) {
      const name = stack.pop();
      if (!name || deps[name]) continue;
      const dep = tasks.get(name);
      if (!dep) continue;
      deps[name] = dep.version;
      stack.push(...dep.dependsOn);
    }
    if (Object.keys(deps).length === 0) return base.env;
    return withActivation(base.env, await composeActivation(base, deps));
  }

  private async execute(
    task: InstallTask,
    tasks: Map<string, InstallTask>,
    opts: InstallRunOptions,
  ): Promise<void> {
    const { plugin, version } = task;
    const provider = this.registry.lookup(plugin);
    const base = this.contextBase(opts);
    const installDir = installDirFor(this.options.cacheDir, plugin, version);

    try {
      // One writer per cache key, across every run sharing these locks
      await this.locks.run(`${plugin}@${version}`, async () => {
        const ctx = contextFor(base, plugin, version, await this.dependencyEnv(task, tasks, base));

        if (existsSync(join(installDir, COMPLETE_MARKER))) {
          task.cached = true;
          this.advance(task, "running", opts);
          if (this.options.autoUpdate) {
            await provider.update(ctx).catch((err: unknown) => {
              this.logger.warn(`${plugin}@${version} update failed: ${errorMessage(err)}`);
            });
          }
          this.logger.info(`${plugin}@${version} already installed`);
          this.advance(task, "succeeded", opts);
          return;
        }

        await this.installWithRetry(task, provider, ctx, opts);
      });
    } catch (err: unknown) {
      // Anything escaping the retry loop (activation of dependencies, the marker write)
      task.lastError = errorMessage(err);
      if (task.status === "pending") this.advance(task, "running", opts);
      if (task.status === "running") this.advance(task, "failed", opts);
      this.logger.error(`${plugin}@${version} failed: ${task.lastError}`);
    }
  }

  private async installWithRetry(
    task: InstallTask,
    provider: LanguageProvider,
    ctx: ReturnType<typeof contextFor>,
    opts: InstallRunOptions,
  ): Promise<void> {
    const { plugin, version } = task;
    const timeout = () =>
      new InstallFailedError(
        `${plugin}@${version} install timed out after ${this.taskTimeoutMs}ms`,
        true,
        { plugin, version },
      );

    for (;;) {
      task.attempts += 1;
      this.advance(task, "running", opts);
      this.logger.info(`Installing ${plugin}@${version} (attempt ${task.attempts})`);

      try {
        await withTimeout(provider.setup(ctx), this.taskTimeoutMs, timeout);
        await this.markComplete(ctx.installDir, version);
        this.advance(task, "succeeded", opts);
        this.logger.info(`${plugin}@${version} installed`);
        return;
      } catch (err: unknown) {
        const failure = classify(err, plugin, version);
        task.lastError = failure.message;

        if (failure.transient) {
          if (task.attempts < this.retry.maxAttempts) {
            const wait = backoffDelay(task.attempts, this.retry);
            this.logger.warn(`${failure.message}; retrying in ${wait}ms`);
            this.advance(task, "retrying", opts);
            await this.sleep(wait);
            continue;
          }
          this.logger.error(`${plugin}@${version} gave up after ${task.attempts} attempts`);
          this.advance(task, "failed", opts);
          return;
        }

        if (provider.fallbackSetup) {
          this.logger.warn(`${failure.message}; trying fallback`);
          task.usedFallback = true;
          try {
            await withTimeout(provider.fallbackSetup(ctx), this.taskTimeoutMs, timeout);
            await this.markComplete(ctx.installDir, version);
            this.advance(task, "succeeded", opts);
            return;
          } catch (fallbackErr: unknown) {
            task.lastError = classify(fallbackErr, plugin, version).message;
          }
        }

        this.logger.error(`${plugin}@${version} failed: ${task.lastError}`);
        this.advance(task, "failed", opts);
        return;
      }
    }
  }

  private async markComplete(installDir: string, version: string): Promise<void> {
    await mkdir(installDir, { recursive: true });
    await writeFile(
      join(installDir, COMPLETE_MARKER),
      `${version}\n${new Date().toISOString()}\n`,
      "utf-8",
    );
  }

  /**
   * Leaf plugins (nothing in the run depends on them) install the project's
   * dependencies, so yarn runs instead of npm when both are present. A
   * declared `install` script replaces them all.
   */
  private async installProjectDependencies(
    tasks: InstallTask[],
    opts: InstallRunOptions,
  ): Promise<string[]> {
    const warnings: string[] = [];
    const base = this.contextBase(opts);
    const versions = Object.fromEntries(tasks.map((t) => [t.plugin, t.version]));
    const env = withActivation(this.env, await composeActivation(base, versions));

    const script = opts.scripts?.install;
    if (script) {
      const result = await runShell(this.runner, script, { cwd: opts.projectPath, env });
      if (result.code !== 0) warnings.push(`install script exited with code ${result.code}`);
      return warnings;
    }

    const dependedOn = new Set(tasks.flatMap((t) => t.dependsOn));
    for (const task of tasks) {
      if (dependedOn.has(task.plugin)) continue;
      const provider = this.registry.lookup(task.plugin);
      try {
        await provider.installDependencies(contextFor(base, task.plugin, task.version, env));
      } catch (err: unknown) {
        const message = `${task.plugin}: dependency install failed: ${errorMessage(err)}`;
        this.logger.warn(message);
        warnings.push(message);
      }
    }
    return warnings;
  }
}
