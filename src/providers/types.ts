import type { CommandRunner } from "../exec.js";
import type { Logger } from "../log.js";
import type { HealthStatus } from "../types.js";

export type ProviderKind = "language" | "tool" | "manager";

export interface ProviderContext {
  /** Concrete version being installed or probed. */
  version: string;
  /** Cache directory owned by this plugin@version. */
  installDir: string;
  runner: CommandRunner;
  /** Process environment with every dependency's activation applied. */
  env: NodeJS.ProcessEnv;
  logger: Logger;
  projectPath?: string;
  timeoutMs?: number;
}

export interface ProbeResult {
  status: HealthStatus;
  installedVersion?: string;
  /** 0-100; derived from status when omitted. */
  score?: number;
  message?: string;
}

export interface Activation {
  variables: Record<string, string>;
  /** Directories to prepend to PATH, highest precedence first. */
  path: string[];
}

/**
 * The capability set every language or tool provider implements. A
 * registered provider doubles as its plugin descriptor: the readonly fields
 * are the descriptor data, the methods its procedures.
 */
export interface LanguageProvider {
  readonly name: string;
  readonly kind: ProviderKind;
  /** Languages or tools this provider satisfies. */
  readonly provides: readonly string[];
  /** Semver range of versions it can install. */
  readonly versions: string;
  readonly defaultVersion: string;
  /** Plugin names that must be installed first. */
  readonly dependsOn: readonly string[];

  setup(ctx: ProviderContext): Promise<void>;
  fallbackSetup?(ctx: ProviderContext): Promise<void>;
  update(ctx: ProviderContext): Promise<void>;
  installDependencies(ctx: ProviderContext): Promise<void>;
  checkHealth(ctx: ProviderContext): Promise<ProbeResult>;
  activate(ctx: ProviderContext): Promise<Activation>;
  deactivate?(ctx: ProviderContext): Promise<void>;
}
