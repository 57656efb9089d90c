export type ErrorKind =
  | "ConfigurationError"
  | "DetectionAmbiguous"
  | "PluginNotFound"
  | "VersionUnsupported"
  | "DuplicateName"
  | "DependencyCycle"
  | "InstallFailed"
  | "ActivationFailed"
  | "SwitchInProgress"
  | "HealthCheckIssue"
  | "NameConflict"
  | "EnvironmentNotFound"
  | "InvalidTransition"
  | "Internal";

export type ErrorContext = Record<string, string | number | boolean | undefined>;

/** Machine-readable shape handed across the engine boundary. */
export interface ErrorInfo {
  kind: ErrorKind;
  message: string;
  context: ErrorContext;
}

export type Result<T> = { ok: true; value: T } | { ok: false; error: ErrorInfo };

export class DevenvError extends Error {
  constructor(
    public readonly kind: ErrorKind,
    message: string,
    public readonly context: ErrorContext = {},
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = kind;
  }

  toInfo(): ErrorInfo {
    return { kind: this.kind, message: this.message, context: { ...this.context } };
  }
}

export class ConfigurationError extends DevenvError {
  constructor(message: string, context: ErrorContext = {}, cause?: unknown) {
    super("ConfigurationError", message, context, cause);
  }
}

export class DetectionAmbiguousError extends DevenvError {
  constructor(
    public readonly language: string,
    public readonly sources: string[],
  ) {
    super(
      "DetectionAmbiguous",
      `Conflicting ${language} versions detected in ${sources.join(" and ")}`,
      { language, sources: sources.join(",") },
    );
  }
}

export class PluginNotFoundError extends DevenvError {
  constructor(public readonly plugin: string) {
    super("PluginNotFound", `No plugin registered for "${plugin}"`, { plugin });
  }
}

export class VersionUnsupportedError extends DevenvError {
  constructor(
    public readonly language: string,
    public readonly requested: string,
    supported: string[],
  ) {
    super(
      "VersionUnsupported",
      `No plugin for ${language} supports version "${requested}" (supported: ${supported.join(", ")})`,
      { language, version: requested },
    );
  }
}

export class DuplicateNameError extends DevenvError {
  constructor(public readonly plugin: string) {
    super(
      "DuplicateName",
      `Plugin "${plugin}" is already registered with a different capability set`,
      { plugin },
    );
  }
}

export class DependencyCycleError extends DevenvError {
  constructor(public readonly cycle: string[]) {
    super("DependencyCycle", `Plugin dependency cycle: ${cycle.join(" -> ")}`, {
      plugin: cycle[0],
    });
  }
}

export class InstallFailedError extends DevenvError {
  constructor(
    message: string,
    public readonly transient: boolean,
    context: ErrorContext = {},
    cause?: unknown,
  ) {
    super("InstallFailed", message, { ...context, transient }, cause);
  }
}

export class ActivationFailedError extends DevenvError {
  constructor(environment: string, message: string, cause?: unknown) {
    super("ActivationFailed", message, { environment }, cause);
  }
}

export class SwitchInProgressError extends DevenvError {
  constructor(requested: string) {
    super(
      "SwitchInProgress",
      `Cannot switch to "${requested}": another switch is in progress`,
      { environment: requested },
    );
  }
}

export class NameConflictError extends DevenvError {
  constructor(environment: string, projectPath?: string) {
    super(
      "NameConflict",
      projectPath
        ? `Environment "${environment}" already exists for ${projectPath}; pick another name with --name`
        : `Environment "${environment}" already exists`,
      projectPath ? { environment, projectPath } : { environment },
    );
  }
}

export class EnvironmentNotFoundError extends DevenvError {
  constructor(environment: string) {
    super("EnvironmentNotFound", `Environment "${environment}" not found`, { environment });
  }
}

export class InvalidTransitionError extends DevenvError {
  constructor(environment: string, from: string, operation: string, hint?: string) {
    super(
      "InvalidTransition",
      `Cannot ${operation} environment "${environment}" while it is ${from}` +
        (hint ? ` (${hint})` : ""),
      { environment, status: from, operation },
    );
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Normalise anything thrown into the boundary shape. */
export function toErrorInfo(err: unknown): ErrorInfo {
  if (err instanceof DevenvError) return err.toInfo();
  return { kind: "Internal", message: errorMessage(err), context: {} };
}

export async function attempt<T>(fn: () => Promise<T> | T): Promise<Result<T>> {
  try {
    return { ok: true, value: await fn() };
  } catch (err: unknown) {
    return { ok: false, error: toErrorInfo(err) };
  }
}

const EXIT_CODES: Record<ErrorKind, number> = {
  ConfigurationError: 2,
  DetectionAmbiguous: 2,
  PluginNotFound: 3,
  EnvironmentNotFound: 3,
  VersionUnsupported: 3,
  InstallFailed: 4,
  ActivationFailed: 5,
  InvalidTransition: 5,
  SwitchInProgress: 6,
  DuplicateName: 1,
  DependencyCycle: 1,
  HealthCheckIssue: 1,
  NameConflict: 1,
  Internal: 1,
};

export function exitCodeFor(kind: ErrorKind): number {
  return EXIT_CODES[kind];
}
