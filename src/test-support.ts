import { mkdtempSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { InstallFailedError } from "./errors.js";
import type { CommandResult, CommandRunner, RunOptions } from "./exec.js";
import type {
  Activation,
  LanguageProvider,
  ProbeResult,
  ProviderContext,
  ProviderKind,
} from "./providers/types.js";

export function tempDir(prefix = "devenv-test-"): string {
  return mkdtempSync(join(tmpdir(), prefix));
}

export function deferred<T = void>() {
  let resolve: (value: T) => void = () => {};
  let reject: (err: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

export const tick = () => new Promise<void>((resolve) => setImmediate(resolve));

export function transient(plugin: string): InstallFailedError {
  return new InstallFailedError(`${plugin} download timed out`, true, { plugin });
}

export function permanent(plugin: string): InstallFailedError {
  return new InstallFailedError(`${plugin} checksum mismatch`, false, { plugin });
}

export interface FakeProviderInit {
  name: string;
  kind?: ProviderKind;
  provides?: string[];
  versions?: string;
  defaultVersion?: string;
  dependsOn?: string[];
  setup?: (ctx: ProviderContext) => Promise<void>;
  fallback?: (ctx: ProviderContext) => Promise<void>;
  probe?: (ctx: ProviderContext) => Promise<ProbeResult>;
  activate?: (ctx: ProviderContext) => Promise<Activation>;
  deactivate?: (ctx: ProviderContext) => Promise<void>;
  installDependencies?: (ctx: ProviderContext) => Promise<void>;
}

/** In-memory provider; every call is appended to `journal`. */
export class FakeProvider implements LanguageProvider {
  readonly name: string;
  readonly kind: ProviderKind;
  readonly provides: readonly string[];
  readonly versions: string;
  readonly defaultVersion: string;
  readonly dependsOn: readonly string[];
  readonly fallbackSetup?: (ctx: ProviderContext) => Promise<void>;
  readonly deactivate?: (ctx: ProviderContext) => Promise<void>;
  readonly calls: string[] = [];

  constructor(
    private readonly init: FakeProviderInit,
    readonly journal: string[] = [],
  ) {
    this.name = init.name;
    this.kind = init.kind ?? "language";
    this.provides = init.provides ?? [init.name];
    this.versions = init.versions ?? "*";
    this.defaultVersion = init.defaultVersion ?? "1.0.0";
    this.dependsOn = init.dependsOn ?? [];

    const fallback = init.fallback;
    if (fallback) {
      this.fallbackSetup = async (ctx) => {
        this.record("fallback", ctx);
        await fallback(ctx);
      };
    }
    const deactivate = init.deactivate;
    if (deactivate) {
      this.deactivate = async (ctx) => {
        this.record("deactivate", ctx);
        await deactivate(ctx);
      };
    }
  }

  async setup(ctx: ProviderContext): Promise<void> {
    this.record("start", ctx);
    try {
      await this.init.setup?.(ctx);
    } finally {
      this.journal.push(`end:${this.name}`);
    }
  }

  async update(ctx: ProviderContext): Promise<void> {
    this.record("update", ctx);
  }

  async installDependencies(ctx: ProviderContext): Promise<void> {
    this.record("deps", ctx);
    await this.init.installDependencies?.(ctx);
  }

  async checkHealth(ctx: ProviderContext): Promise<ProbeResult> {
    this.record("probe", ctx);
    return this.init.probe
      ? this.init.probe(ctx)
      : { status: "healthy", installedVersion: ctx.version };
  }

  async activate(ctx: ProviderContext): Promise<Activation> {
    this.record("activate", ctx);
    if (this.init.activate) return this.init.activate(ctx);
    return {
      variables: { [`${this.name.toUpperCase()}_HOME`]: ctx.installDir },
      path: [join(ctx.installDir, "bin")],
    };
  }

  private record(call: string, ctx: ProviderContext): void {
    this.calls.push(`${call}@${ctx.version}`);
    this.journal.push(`${call}:${this.name}`);
  }
}

/** CommandRunner answering from a handler; every invocation is recorded. */
export class FakeRunner implements CommandRunner {
  readonly invocations: { command: string; args: string[]; opts?: RunOptions }[] = [];

  constructor(
    private readonly handler: (
      command: string,
      args: string[],
      opts?: RunOptions,
    ) => Partial<CommandResult> = () => ({}),
  ) {}

  async run(command: string, args: string[], opts?: RunOptions): Promise<CommandResult> {
    this.invocations.push({ command, args, opts });
    return { code: 0, stdout: "", stderr: "", timedOut: false, ...this.handler(command, args, opts) };
  }

  /** The `sh -c` scripts run so far. */
  scripts(): string[] {
    return this.invocations.map((i) => i.args[1] ?? "");
  }
}
