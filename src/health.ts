import semver from "semver";
import { mapWithConcurrency, withTimeout } from "./concurrency.js";
import { DevenvError, errorMessage } from "./errors.js";
import { execRunner, type CommandRunner } from "./exec.js";
import { targetVersion } from "./installer.js";
import { silentLogger, type Logger } from "./log.js";
import {
  composeActivation,
  contextFor,
  withActivation,
  type ContextBase,
} from "./providers/activation.js";
import { normalizeRange, type PluginRegistry } from "./providers/registry.js";
import type { ProbeResult } from "./providers/types.js";
import type { Environment, HealthIssue, HealthRecord, HealthStatus } from "./types.js";

export const STATUS_SCORE: Record<HealthStatus, number> = {
  healthy: 100,
  degraded: 60,
  unhealthy: 0,
};

const SEVERITY: Record<HealthStatus, number> = { healthy: 0, degraded: 1, unhealthy: 2 };

export function worstStatus(statuses: Iterable<HealthStatus>): HealthStatus {
  let worst: HealthStatus = "healthy";
  for (const status of statuses) {
    if (SEVERITY[status] > SEVERITY[worst]) worst = status;
  }
  return worst;
}

/** Outcome of probing one language or tool. */
export interface ProbeOutcome {
  language: string;
  plugin?: string;
  status: HealthStatus;
  score: number;
  issues: HealthIssue[];
}

function recommendationFor(issue: HealthIssue, declared: string | undefined): string {
  switch (issue.kind) {
    case "plugin-missing":
      return `Register a plugin that provides ${issue.language} in the plugins directory`;
    case "probe-failed":
      return `Re-run "devenv setup" to reinstall ${issue.plugin ?? issue.language}`;
    case "version-drift":
      return `Re-run "devenv setup" to install ${issue.language} ${declared ?? ""}`.trimEnd();
    case "reported":
      return `Inspect ${issue.plugin ?? issue.language}: ${issue.message}`;
  }
}

/**
 * Fold probe outcomes into a record. Status is the worst outcome, score the
 * lowest; no outcomes is a healthy 100.
 */
export function aggregate(
  outcomes: readonly ProbeOutcome[],
  declared: Readonly<Record<string, string>> = {},
  checkedAt = new Date().toISOString(),
): HealthRecord {
  const issues = outcomes
    .flatMap((o) => o.issues)
    .sort(
      (a, b) =>
        a.language.localeCompare(b.language) || (a.plugin ?? "").localeCompare(b.plugin ?? ""),
    );
  const recommendations = [
    ...new Set(issues.map((i) => recommendationFor(i, declared[i.language]))),
  ];
  return {
    status: worstStatus(outcomes.map((o) => o.status)),
    score: outcomes.reduce((min, o) => Math.min(min, o.score), 100),
    issues,
    recommendations,
    checkedAt,
  };
}

export interface HealthMonitorOptions {
  cacheDir: string;
  concurrency?: number;
  probeTimeoutMs?: number;
  runner?: CommandRunner;
  logger?: Logger;
  env?: NodeJS.ProcessEnv;
}

export class HealthMonitor {
  private readonly runner: CommandRunner;
  private readonly logger: Logger;

  constructor(
    private readonly registry: PluginRegistry,
    private readonly options: HealthMonitorOptions,
  ) {
    this.runner = options.runner ?? execRunner;
    this.logger = options.logger ?? silentLogger;
  }

  /** Probe every language and tool of the environment. Never throws on a probe. */
  async check(env: Environment): Promise<HealthRecord> {
    const base: ContextBase = {
      registry: this.registry,
      cacheDir: this.options.cacheDir,
      runner: this.runner,
      logger: this.logger,
      env: await this.probeEnv(env),
      timeoutMs: this.options.probeTimeoutMs,
      projectPath: env.projectPath,
    };

    const targets: { name: string; declared?: string; optional: boolean }[] = [
      ...Object.entries(env.languages).map(([name, declared]) => ({
        name,
        declared,
        optional: false,
      })),
      ...env.tools
        .filter((tool) => !(tool in env.languages))
        .map((name) => ({ name, optional: true })),
    ];

    const outcomes = await mapWithConcurrency(targets, this.options.concurrency ?? 4, (t) =>
      this.probe(base, env, t.name, t.declared, t.optional),
    );
    const record = aggregate(
      outcomes.flatMap((o) => (o ? [o] : [])),
      env.languages,
    );
    this.logger.debug(`${env.name}: ${record.status} (${record.score})`);
    return record;
  }

  /** The environment's own activation, so probes find its installs. */
  private async probeEnv(env: Environment): Promise<NodeJS.ProcessEnv> {
    const base = this.options.env ?? process.env;
    const known = Object.fromEntries(
      Object.entries(env.plugins).filter(([name]) => this.registry.has(name)),
    );
    try {
      const activation = await composeActivation(
        {
          registry: this.registry,
          cacheDir: this.options.cacheDir,
          runner: this.runner,
          logger: this.logger,
          env: base,
        },
        known,
      );
      return withActivation(base, activation);
    } catch (err: unknown) {
      this.logger.warn(`Probing ${env.name} without its activation: ${errorMessage(err)}`);
      return base;
    }
  }

  private async probe(
    base: ContextBase,
    env: Environment,
    language: string,
    declared: string | undefined,
    optional: boolean,
  ): Promise<ProbeOutcome | undefined> {
    let plugin: string;
    let version: string;
    try {
      const provider = this.registry.resolve(language, declared);
      plugin = provider.name;
      version = env.plugins[plugin] ?? targetVersion(provider, declared);
    } catch (err: unknown) {
      if (!(err instanceof DevenvError)) throw err;
      // Tools without a plugin were skipped at setup and are not probed
      if (optional) return undefined;
      return {
        language,
        status: "unhealthy",
        score: 0,
        issues: [
          { language, kind: "plugin-missing", severity: "unhealthy", message: err.message },
        ],
      };
    }

    const provider = this.registry.lookup(plugin);
    let result: ProbeResult;
    try {
      result = await withTimeout(
        provider.checkHealth(contextFor(base, plugin, version)),
        this.options.probeTimeoutMs ?? 0,
        () => new Error(`${plugin} health probe timed out after ${this.options.probeTimeoutMs}ms`),
      );
    } catch (err: unknown) {
      return {
        language,
        plugin,
        status: "unhealthy",
        score: 0,
        issues: [
          {
            language,
            plugin,
            kind: "probe-failed",
            severity: "unhealthy",
            message: errorMessage(err),
          },
        ],
      };
    }

    const issues: HealthIssue[] = [];
    let status = result.status;
    let score = result.score ?? STATUS_SCORE[result.status];

    if (result.status !== "healthy") {
      issues.push({
        language,
        plugin,
        kind: "reported",
        severity: result.status,
        message: result.message ?? `${plugin} reported ${result.status}`,
      });
    }

    const installed = result.installedVersion && semver.coerce(result.installedVersion);
    const range = normalizeRange(declared);
    if (installed && range !== "*" && !semver.satisfies(installed, range)) {
      issues.push({
        language,
        plugin,
        kind: "version-drift",
        severity: "degraded",
        message: `${language} ${installed.version} is installed but ${declared} is declared`,
      });
      status = worstStatus([status, "degraded"]);
      score = Math.min(score, STATUS_SCORE.degraded);
    }

    return { language, plugin, status, score, issues };
  }
}
