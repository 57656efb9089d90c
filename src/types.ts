export interface LanguageDetection {
  version?: string;
  confidence: number;
  /** Signature file the entry was resolved from. */
  source: string;
}

export interface FrameworkDetection {
  name: string;
  language: string;
  confidence: number;
  source: string;
}

export interface ToolDetection {
  name: string;
  version?: string;
  confidence: number;
  source: string;
}

export interface ProjectProfile {
  readonly root: string;
  readonly languages: Readonly<Record<string, LanguageDetection>>;
  readonly frameworks: readonly FrameworkDetection[];
  readonly tools: readonly ToolDetection[];
  readonly scripts: Readonly<Record<string, string>>;
}

export type EnvironmentStatus =
  | "uninitialized"
  | "creating"
  | "active"
  | "inactive"
  | "degraded"
  | "removed";

export type HealthStatus = "healthy" | "degraded" | "unhealthy";

export type HealthIssueKind = "probe-failed" | "plugin-missing" | "version-drift" | "reported";

export interface HealthIssue {
  language: string;
  plugin?: string;
  kind: HealthIssueKind;
  severity: Exclude<HealthStatus, "healthy">;
  message: string;
}

export interface HealthRecord {
  readonly status: HealthStatus;
  readonly score: number;
  readonly issues: readonly HealthIssue[];
  readonly recommendations: readonly string[];
  readonly checkedAt: string;
}

export interface SetupSummary {
  finishedAt: string;
  cancelled: boolean;
  succeeded: string[];
  failed: string[];
  pending: string[];
}

export interface Environment {
  name: string;
  status: EnvironmentStatus;
  projectPath: string;
  /** Declared language -> version (or range) the environment was set up for. */
  languages: Record<string, string>;
  tools: string[];
  /** Framework -> the language it builds on. */
  frameworks: Record<string, string>;
  scripts: Record<string, string>;
  /** Plugin name -> installed version. */
  plugins: Record<string, string>;
  /** Variables applied on the last activation. */
  variables: Record<string, string>;
  createdAt: string;
  activatedAt?: string;
  health?: HealthRecord;
  lastSetup?: SetupSummary;
}

export type TaskStatus = "pending" | "running" | "succeeded" | "failed" | "retrying";

export interface InstallTask {
  readonly plugin: string;
  readonly version: string;
  readonly dependsOn: readonly string[];
  status: TaskStatus;
  attempts: number;
  lastError?: string;
  usedFallback: boolean;
  cached: boolean;
  /** Set when a dependency failed, so the task was never started. */
  blockedBy?: string;
}
