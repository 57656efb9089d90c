import { existsSync, writeFileSync } from "node:fs";
import { basename, join, resolve } from "node:path";
import { stringify } from "yaml";
import {
  PROJECT_CONFIG_FILE,
  loadProjectConfig,
  parseYamlText,
  type Settings,
} from "./config.js";
import { ProjectDetector, applyProjectConfig, freezeProfile } from "./detector.js";
import { NameConflictError, attempt, type Result } from "./errors.js";
import { execRunner, type CommandRunner } from "./exec.js";
import { HealthMonitor } from "./health.js";
import { DependencyInstaller } from "./installer.js";
import { createLogger, type Logger } from "./log.js";
import { createRegistry, loadScriptProviders, type LanguageProvider } from "./providers/index.js";
import type { PluginRegistry } from "./providers/registry.js";
import { SharedDescriptorSchema, type ProjectConfig, type SharedDescriptor } from "./schema.js";
import {
  EnvironmentStateMachine,
  type SetupOptions,
  type SetupResult,
  type VariableTarget,
} from "./state-machine.js";
import { EnvironmentStore } from "./state.js";
import type { Environment, HealthRecord, ProjectProfile } from "./types.js";

export interface EngineSetupOptions extends SetupOptions {
  /** Environment name; defaults to the project directory's name. */
  name?: string;
}

export interface ImportOptions {
  name?: string;
  projectPath: string;
}

export interface PluginSummary {
  name: string;
  kind: LanguageProvider["kind"];
  provides: readonly string[];
  versions: string;
  defaultVersion: string;
  dependsOn: readonly string[];
  fallback: boolean;
}

/** Derive an environment name from a directory name. */
export function environmentNameFor(dir: string): string {
  const name = basename(resolve(dir))
    .toLowerCase()
    .replace(/[^a-z0-9._-]+/g, "-")
    .replace(/^[^a-z0-9]+/, "");
  return name || "default";
}

/** Profile equivalent to what an environment was last set up with. */
export function profileFromEnvironment(env: Environment): ProjectProfile {
  const source = "environment";
  return freezeProfile({
    root: env.projectPath,
    languages: Object.fromEntries(
      Object.entries(env.languages).map(([name, version]) => [
        name,
        version === "*" ? { confidence: 1, source } : { version, confidence: 1, source },
      ]),
    ),
    frameworks: Object.entries(env.frameworks).map(([name, language]) => ({
      name,
      language,
      confidence: 1,
      source,
    })),
    tools: env.tools.map((name) => ({ name, confidence: 1, source })),
    scripts: { ...env.scripts },
  });
}

/**
 * Facade the command interface talks to. Every operation returns a Result
 * and never throws.
 */
export class OrchestrationEngine {
  constructor(
    readonly registry: PluginRegistry,
    private readonly detector: ProjectDetector,
    private readonly machine: EnvironmentStateMachine,
    private readonly monitor: HealthMonitor,
    private readonly store: EnvironmentStore,
    private readonly logger: Logger,
  ) {}

  detect(path: string): Promise<Result<ProjectProfile>> {
    return attempt(() => this.profileFor(path));
  }

  /**
   * Detect the project, record what was found in devenv.yaml when the
   * project has none, then create and set up its environment.
   */
  init(path: string, opts: EngineSetupOptions = {}): Promise<Result<SetupResult>> {
    return attempt(async () => {
      const profile = await this.profileFor(path);
      const configPath = join(profile.root, PROJECT_CONFIG_FILE);
      if (!existsSync(configPath)) {
        const name = opts.name ?? environmentNameFor(profile.root);
        writeFileSync(configPath, stringify(projectConfigFrom(name, profile)), "utf-8");
        this.logger.info(`Wrote ${configPath}`);
      }
      return this.runSetup(profile, opts);
    });
  }

  setup(profile: ProjectProfile, opts: EngineSetupOptions = {}): Promise<Result<SetupResult>> {
    return attempt(() => this.runSetup(profile, opts));
  }

  /** Re-run setup for a stored environment from its recorded requirements. */
  repair(name: string, opts: SetupOptions = {}): Promise<Result<SetupResult>> {
    return attempt(() =>
      this.machine.setup(name, profileFromEnvironment(this.machine.get(name)), opts),
    );
  }

  switch(name: string): Promise<Result<Environment>> {
    return attempt(() => this.machine.switch(name));
  }

  deactivate(): Promise<Result<Environment | undefined>> {
    return attempt(() => this.machine.deactivate());
  }

  /** Check health and record it on the environment. */
  status(name: string): Promise<Result<HealthRecord>> {
    return attempt(async () => {
      const record = await this.monitor.check(this.machine.get(name));
      this.machine.recordHealth(name, record);
      return record;
    });
  }

  remove(name: string): Promise<Result<Environment>> {
    return attempt(() => this.machine.remove(name));
  }

  share(name: string): Promise<Result<string>> {
    return attempt(() => {
      const env = this.machine.get(name);
      const descriptor: SharedDescriptor = {
        schema_version: 1,
        name: env.name,
        languages: env.languages,
        tools: env.tools,
        frameworks: env.frameworks,
        scripts: env.scripts,
      };
      return stringify(descriptor);
    });
  }

  import(bytes: string, opts: ImportOptions): Promise<Result<Environment>> {
    return attempt(() => {
      const shared = parseYamlText(bytes, SharedDescriptorSchema, "shared descriptor");
      return this.machine.create(opts.name ?? shared.name, resolve(opts.projectPath), {
        languages: shared.languages,
        tools: shared.tools,
        frameworks: shared.frameworks,
        scripts: shared.scripts,
      });
    });
  }

  list(): Promise<Result<{ environments: Environment[]; active?: string }>> {
    return attempt(() => ({
      environments: this.machine.list(),
      active: this.machine.active()?.name,
    }));
  }

  plugins(): Promise<Result<PluginSummary[]>> {
    return attempt(() =>
      this.registry.list().map((p) => ({
        name: p.name,
        kind: p.kind,
        provides: p.provides,
        versions: p.versions,
        defaultVersion: p.defaultVersion,
        dependsOn: p.dependsOn,
        fallback: typeof p.fallbackSetup === "function",
      })),
    );
  }

  /** Write the environment's activation script; returns its path. */
  writeActivationScript(name: string, content: string): Promise<Result<string>> {
    return attempt(() => this.store.writeActivationScript(name, content));
  }

  private async profileFor(path: string): Promise<ProjectProfile> {
    const root = resolve(path);
    const detected = await this.detector.detect(root);
    return applyProjectConfig(detected, await loadProjectConfig(root));
  }

  /**
   * Name precedence: the explicit option, then `name` in devenv.yaml, then
   * the directory name. An existing environment is only reused for the
   * project it was created for.
   */
  private async runSetup(profile: ProjectProfile, opts: EngineSetupOptions): Promise<SetupResult> {
    const config = await loadProjectConfig(profile.root);
    const name = opts.name ?? config?.name ?? environmentNameFor(profile.root);
    const existing = this.machine.list().find((env) => env.name === name);
    if (!existing) {
      this.machine.create(name, profile.root);
    } else if (resolve(existing.projectPath) !== resolve(profile.root)) {
      throw new NameConflictError(name, existing.projectPath);
    }
    return this.machine.setup(name, profile, opts);
  }
}

function projectConfigFrom(name: string, profile: ProjectProfile): ProjectConfig {
  const config: ProjectConfig = {
    name,
    languages: Object.fromEntries(
      Object.entries(profile.languages).map(([lang, d]) => [lang, d.version ?? "*"]),
    ),
  };
  if (profile.tools.length > 0) config.tools = profile.tools.map((t) => t.name);
  return config;
}

export interface EngineOverrides {
  runner?: CommandRunner;
  logger?: Logger;
  target?: VariableTarget;
  env?: NodeJS.ProcessEnv;
  sleep?: (ms: number) => Promise<void>;
  providers?: LanguageProvider[];
}

/** Wire every component from settings: built-in and script plugins, store, installer, monitor. */
export async function createEngine(
  settings: Settings,
  overrides: EngineOverrides = {},
): Promise<OrchestrationEngine> {
  const logger = overrides.logger ?? createLogger(settings.logLevel);
  const runner = overrides.runner ?? execRunner;
  const registry = createRegistry([
    ...(overrides.providers ?? []),
    ...(await loadScriptProviders(settings.pluginsDir)),
  ]);

  const installer = new DependencyInstaller(registry, {
    cacheDir: settings.cacheDir,
    concurrency: settings.concurrency,
    retry: settings.retry,
    taskTimeoutMs: settings.taskTimeoutMs,
    autoUpdate: settings.autoUpdate,
    runner,
    logger,
    env: overrides.env,
    sleep: overrides.sleep,
  });
  const store = new EnvironmentStore(settings.environmentsDir);
  const machine = EnvironmentStateMachine.load({
    store,
    registry,
    installer,
    cacheDir: settings.cacheDir,
    runner,
    logger,
    target: overrides.target,
  });
  const monitor = new HealthMonitor(registry, {
    cacheDir: settings.cacheDir,
    concurrency: settings.concurrency,
    probeTimeoutMs: settings.probeTimeoutMs,
    runner,
    logger,
    env: overrides.env,
  });

  return new OrchestrationEngine(
    registry,
    new ProjectDetector(settings.minConfidence),
    machine,
    monitor,
    store,
    logger,
  );
}
