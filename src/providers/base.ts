import { join } from "node:path";
import { InstallFailedError } from "../errors.js";
import { runShell, type CommandResult } from "../exec.js";
import type {
  Activation,
  LanguageProvider,
  ProbeResult,
  ProviderContext,
  ProviderKind,
} from "./types.js";

// curl: couldn't resolve host, couldn't connect, timeout, SSL connect, empty reply, recv failure
const TRANSIENT_EXIT_CODES = new Set([6, 7, 28, 35, 52, 56]);
const TRANSIENT_OUTPUT =
  /timed? ?out|ETIMEDOUT|ECONNRESET|ECONNREFUSED|ENOTFOUND|EAI_AGAIN|could not resolve host|connection (refused|reset)|temporary failure|network is unreachable|503 service unavailable/i;

export function isTransientResult(result: CommandResult): boolean {
  return (
    result.timedOut ||
    TRANSIENT_EXIT_CODES.has(result.code) ||
    TRANSIENT_OUTPUT.test(result.stderr)
  );
}

export function failureFrom(
  result: CommandResult,
  step: string,
  plugin: string,
  version: string,
): InstallFailedError {
  const detail = result.timedOut
    ? "timed out"
    : `exited with code ${result.code}` + (result.stderr ? `: ${lastLine(result.stderr)}` : "");
  return new InstallFailedError(
    `${plugin}@${version} ${step} ${detail}`,
    isTransientResult(result),
    { plugin, version, step },
  );
}

function lastLine(text: string): string {
  const lines = text.trim().split("\n");
  return lines[lines.length - 1] ?? "";
}

export function parseVersion(output: string): string | undefined {
  return output.match(/(\d+\.\d+(?:\.\d+)?)/)?.[1];
}

export function platformTriple(): { os: string; arch: string } {
  const os = process.platform === "darwin" ? "darwin" : "linux";
  const arch = process.arch === "arm64" ? "arm64" : "x64";
  return { os, arch };
}

/**
 * Base for providers whose procedures are shell snippets run through the
 * CommandRunner. Subclasses supply the scripts; the base class turns exit
 * codes into classified install failures and version output into probes.
 */
export abstract class ShellProvider implements LanguageProvider {
  abstract readonly name: string;
  abstract readonly kind: ProviderKind;
  abstract readonly provides: readonly string[];
  abstract readonly versions: string;
  abstract readonly defaultVersion: string;
  readonly dependsOn: readonly string[] = [];

  protected abstract installScript(ctx: ProviderContext): string;

  /** Command whose output contains the installed version. */
  protected abstract versionScript(ctx: ProviderContext): string;

  protected updateScript(_ctx: ProviderContext): string | undefined {
    return undefined;
  }

  protected dependenciesScript(_ctx: ProviderContext): string | undefined {
    return undefined;
  }

  protected variables(_ctx: ProviderContext): Record<string, string> {
    return {};
  }

  protected binDirs(ctx: ProviderContext): string[] {
    return [join(ctx.installDir, "bin")];
  }

  async setup(ctx: ProviderContext): Promise<void> {
    await this.exec(ctx, this.installScript(ctx), "install");
  }

  async update(ctx: ProviderContext): Promise<void> {
    const script = this.updateScript(ctx);
    if (script) await this.exec(ctx, script, "update");
  }

  async installDependencies(ctx: ProviderContext): Promise<void> {
    const script = this.dependenciesScript(ctx);
    if (script) await this.exec(ctx, script, "dependency install", ctx.projectPath);
  }

  async checkHealth(ctx: ProviderContext): Promise<ProbeResult> {
    const result = await runShell(ctx.runner, this.versionScript(ctx), {
      env: ctx.env,
      timeoutMs: ctx.timeoutMs,
    });
    if (result.code !== 0) {
      return {
        status: "unhealthy",
        message: result.timedOut
          ? `${this.name} version check timed out`
          : `${this.name} not runnable (exit ${result.code})`,
      };
    }
    const installedVersion = parseVersion(result.stdout + result.stderr);
    if (!installedVersion) {
      return { status: "degraded", message: `Could not read ${this.name} version` };
    }
    return { status: "healthy", installedVersion };
  }

  async activate(ctx: ProviderContext): Promise<Activation> {
    return {
      variables: {
        [`DEVENV_${this.name.toUpperCase().replace(/[^A-Z0-9]/g, "_")}_VERSION`]: ctx.version,
        ...this.variables(ctx),
      },
      path: this.binDirs(ctx),
    };
  }

  protected async exec(
    ctx: ProviderContext,
    script: string,
    step: string,
    cwd?: string,
  ): Promise<void> {
    ctx.logger.debug(`${this.name}@${ctx.version} ${step}: ${script}`);
    const result = await runShell(ctx.runner, script, {
      cwd,
      env: ctx.env,
      timeoutMs: ctx.timeoutMs,
    });
    if (result.code !== 0) throw failureFrom(result, step, this.name, ctx.version);
  }
}
