import {
  ActivationFailedError,
  ConfigurationError,
  EnvironmentNotFoundError,
  InvalidTransitionError,
  NameConflictError,
  SwitchInProgressError,
  errorMessage,
} from "./errors.js";
import type { CommandRunner } from "./exec.js";
import type { DependencyInstaller, InstallReport, InstallRunOptions } from "./installer.js";
import type { Logger } from "./log.js";
import {
  activationVariables,
  composeActivation,
  contextFor,
  dependencyOrder,
  type ContextBase,
} from "./providers/activation.js";
import type { PluginRegistry } from "./providers/registry.js";
import type { EnvironmentStore } from "./state.js";
import type {
  Environment,
  EnvironmentStatus,
  HealthRecord,
  ProjectProfile,
  SetupSummary,
} from "./types.js";

const NAME_PATTERN = /^[a-z0-9][a-z0-9._-]*$/;

/** Where activation variables are applied. process.env by default. */
export type VariableTarget = Record<string, string | undefined>;

export interface StateMachineOptions {
  store: EnvironmentStore;
  registry: PluginRegistry;
  installer: DependencyInstaller;
  cacheDir: string;
  runner: CommandRunner;
  logger: Logger;
  target?: VariableTarget;
}

export interface SetupOptions {
  signal?: AbortSignal;
  installDependencies?: boolean;
  onTaskUpdate?: InstallRunOptions["onTaskUpdate"];
}

export interface SetupResult {
  environment: Environment;
  report: InstallReport;
}

function summarize(report: InstallReport): SetupSummary {
  const named = (pred: (t: InstallReport["tasks"][number]) => boolean) =>
    report.tasks.filter(pred).map((t) => `${t.plugin}@${t.version}`);
  return {
    finishedAt: new Date().toISOString(),
    cancelled: report.cancelled,
    succeeded: named((t) => t.status === "succeeded"),
    failed: named((t) => t.status === "failed"),
    pending: named((t) => t.status !== "succeeded" && t.status !== "failed"),
  };
}

/**
 * Owns every environment and the active pointer. All status changes go
 * through here; the switch section admits one caller at a time.
 */
export class EnvironmentStateMachine {
  private readonly environments = new Map<string, Environment>();
  private activeName: string | undefined;
  private switching = false;
  /** Values the target held before devenv first overwrote each key. */
  private readonly baseline = new Map<string, string | undefined>();
  private readonly target: VariableTarget;

  private constructor(private readonly options: StateMachineOptions) {
    this.target = options.target ?? process.env;
  }

  /**
   * Load persisted environments. The pointer is authoritative: a descriptor
   * marked active that the pointer does not name is treated as inactive.
   */
  static load(options: StateMachineOptions): EnvironmentStateMachine {
    const machine = new EnvironmentStateMachine(options);
    const pointer = options.store.readActive();
    for (const env of options.store.loadAll()) {
      if (env.status === "active" && env.name !== pointer) env.status = "inactive";
      machine.environments.set(env.name, env);
    }
    if (pointer && machine.environments.get(pointer)?.status === "active") {
      machine.activeName = pointer;
    }
    return machine;
  }

  get(name: string): Environment {
    const env = this.environments.get(name);
    if (!env) throw new EnvironmentNotFoundError(name);
    return env;
  }

  list(): Environment[] {
    return [...this.environments.values()].sort((a, b) => a.name.localeCompare(b.name));
  }

  active(): Environment | undefined {
    return this.activeName ? this.environments.get(this.activeName) : undefined;
  }

  isSwitching(): boolean {
    return this.switching;
  }

  create(
    name: string,
    projectPath: string,
    init: Partial<Pick<Environment, "languages" | "tools" | "frameworks" | "scripts">> = {},
  ): Environment {
    if (!NAME_PATTERN.test(name)) {
      throw new ConfigurationError(
        `Invalid environment name "${name}": use lowercase letters, digits, '.', '_' or '-'`,
        { environment: name },
      );
    }
    if (this.environments.has(name)) throw new NameConflictError(name);

    const env: Environment = {
      name,
      status: "uninitialized",
      projectPath,
      languages: { ...init.languages },
      tools: [...(init.tools ?? [])],
      frameworks: { ...init.frameworks },
      scripts: { ...init.scripts },
      plugins: {},
      variables: {},
      createdAt: new Date().toISOString(),
    };
    this.options.store.save(env);
    this.environments.set(name, env);
    this.options.logger.debug(`Created environment ${name}`);
    return env;
  }

  /**
   * Install everything the profile needs. All tasks succeeding activates
   * the environment; any failure, blocked task or interrupt leaves it
   * degraded with the partial result recorded.
   */
  async setup(name: string, profile: ProjectProfile, opts: SetupOptions = {}): Promise<SetupResult> {
    const env = this.get(name);
    if (env.status === "active") {
      throw new InvalidTransitionError(name, env.status, "set up", "switch to another environment first");
    }
    if (env.status === "creating") {
      throw new InvalidTransitionError(name, env.status, "set up", "a setup is already running");
    }

    const { installer, logger } = this.options;
    const plan = installer.plan(profile);

    env.languages = Object.fromEntries(
      Object.entries(profile.languages).map(([lang, d]) => [lang, d.version ?? "*"]),
    );
    env.tools = profile.tools.map((t) => t.name);
    env.frameworks = Object.fromEntries(profile.frameworks.map((f) => [f.name, f.language]));
    env.scripts = { ...profile.scripts };
    env.projectPath = profile.root;
    this.transition(env, "creating");

    let report: InstallReport;
    try {
      report = await installer.run(plan, {
        signal: opts.signal,
        projectPath: profile.root,
        installDependencies: opts.installDependencies,
        scripts: profile.scripts,
        onTaskUpdate: opts.onTaskUpdate,
      });
    } catch (err: unknown) {
      this.transition(env, "degraded");
      throw err;
    }

    env.plugins = Object.fromEntries(
      report.tasks.filter((t) => t.status === "succeeded").map((t) => [t.plugin, t.version]),
    );
    env.lastSetup = summarize(report);

    if (!report.ok) {
      this.transition(env, "degraded");
      const { failed, pending } = env.lastSetup;
      logger.warn(
        `Environment ${name} is degraded: ${failed.length} failed, ${pending.length} not installed`,
      );
      return { environment: env, report };
    }

    this.transition(env, "inactive");
    await this.switch(name);
    return { environment: env, report };
  }

  /**
   * Deactivate the current environment and activate `name` as one step. If
   * activation fails the previous environment is restored and stays active.
   */
  async switch(name: string): Promise<Environment> {
    if (this.switching) throw new SwitchInProgressError(name);
    this.switching = true;
    try {
      return await this.performSwitch(name);
    } finally {
      this.switching = false;
    }
  }

  /** Deactivate the active environment, if any. Uses the switch section. */
  async deactivate(): Promise<Environment | undefined> {
    const current = this.active();
    if (!current) return undefined;
    if (this.switching) throw new SwitchInProgressError(current.name);
    this.switching = true;
    try {
      await this.deactivateCurrent(current);
      return current;
    } finally {
      this.switching = false;
    }
  }

  /** Delete an environment. Holds the switch section so no switch can target it meanwhile. */
  async remove(name: string): Promise<Environment> {
    const env = this.get(name);
    if (env.status === "creating") {
      throw new InvalidTransitionError(name, env.status, "remove", "wait for setup to finish");
    }
    if (this.switching) throw new SwitchInProgressError(name);
    this.switching = true;
    try {
      if (this.activeName === name) await this.deactivateCurrent(env);
      this.options.store.delete(name);
      this.environments.delete(name);
    } finally {
      this.switching = false;
    }
    env.status = "removed";
    this.options.logger.info(`Removed environment ${name}`);
    return env;
  }

  recordHealth(name: string, record: HealthRecord): Environment {
    const env = this.get(name);
    env.health = record;
    this.options.store.save(env);
    return env;
  }

  private async performSwitch(name: string): Promise<Environment> {
    const target = this.get(name);
    const previous = this.active();
    if (previous?.name === name) return previous;

    if (target.status !== "inactive") {
      const hint =
        target.status === "degraded"
          ? `re-run "devenv setup" to repair it`
          : `run "devenv setup" first`;
      throw new ActivationFailedError(
        name,
        `Cannot activate "${name}" while it is ${target.status}; ${hint}`,
      );
    }

    // Pointer and statuses only move after the old hooks succeed
    if (previous) {
      await this.runDeactivationHooks(previous);
      this.revert(previous.variables);
    }

    let applied: Record<string, string> | undefined;
    try {
      const activation = await composeActivation(this.contextBase(target), target.plugins);
      applied = activationVariables(activation, this.target.PATH);
      this.apply(applied);

      const now = new Date().toISOString();
      this.options.store.save({ ...target, status: "active", variables: applied, activatedAt: now });
      if (previous) this.options.store.save({ ...previous, status: "inactive" });
      this.options.store.writeActive(name);

      target.variables = applied;
      target.activatedAt = now;
    } catch (err: unknown) {
      if (applied) this.revert(applied);
      if (previous) {
        this.apply(previous.variables);
        this.options.store.save(previous);
        this.options.store.writeActive(previous.name);
      }
      this.options.store.save(target);
      throw new ActivationFailedError(
        name,
        `Activation of "${name}" failed: ${errorMessage(err)}` +
          (previous ? `; "${previous.name}" is still active` : ""),
        err,
      );
    }

    if (previous) previous.status = "inactive";
    target.status = "active";
    this.activeName = name;
    this.options.logger.info(
      previous ? `Switched from ${previous.name} to ${name}` : `Activated ${name}`,
    );
    return target;
  }

  private async deactivateCurrent(current: Environment): Promise<void> {
    await this.runDeactivationHooks(current);
    this.revert(current.variables);
    this.activeName = undefined;
    this.options.store.writeActive(undefined);
    this.transition(current, "inactive");
  }

  private async runDeactivationHooks(env: Environment): Promise<void> {
    const base = this.contextBase(env);
    const names = dependencyOrder(this.options.registry, Object.keys(env.plugins)).reverse();
    for (const plugin of names) {
      if (!this.options.registry.has(plugin)) continue;
      const provider = this.options.registry.lookup(plugin);
      if (!provider.deactivate) continue;
      try {
        await provider.deactivate(contextFor(base, plugin, env.plugins[plugin]));
      } catch (err: unknown) {
        throw new ActivationFailedError(
          env.name,
          `Deactivation hook for ${plugin} in "${env.name}" failed: ${errorMessage(err)}`,
          err,
        );
      }
    }
  }

  private apply(vars: Record<string, string>): void {
    for (const [key, value] of Object.entries(vars)) {
      if (!this.baseline.has(key)) this.baseline.set(key, this.target[key]);
      this.target[key] = value;
    }
  }

  /** Restore keys devenv overwrote. Keys it never set are left alone. */
  private revert(vars: Record<string, string>): void {
    for (const key of Object.keys(vars)) {
      if (!this.baseline.has(key)) continue;
      const original = this.baseline.get(key);
      if (original === undefined) delete this.target[key];
      else this.target[key] = original;
      this.baseline.delete(key);
    }
  }

  private transition(env: Environment, to: EnvironmentStatus): void {
    this.options.logger.debug(`${env.name}: ${env.status} -> ${to}`);
    env.status = to;
    this.options.store.save(env);
  }

  private contextBase(env: Environment): ContextBase {
    return {
      registry: this.options.registry,
      cacheDir: this.options.cacheDir,
      runner: this.options.runner,
      logger: this.options.logger,
      env: { ...this.target },
      projectPath: env.projectPath,
    };
  }
}
