import chalk from "chalk";
import { createInterface } from "node:readline";
import { loadSettings } from "../config.js";
import { createEngine, type OrchestrationEngine } from "../engine.js";
import { exitCodeFor, toErrorInfo, type ErrorInfo, type Result } from "../errors.js";
import type { HealthRecord, InstallTask } from "../types.js";
import type { InstallReport } from "../installer.js";

export async function openEngine(): Promise<OrchestrationEngine> {
  try {
    return await createEngine(await loadSettings());
  } catch (err: unknown) {
    return fail(toErrorInfo(err));
  }
}

export function fail(error: ErrorInfo): never {
  console.error(chalk.red(`\n${error.message}\n`));
  process.exit(exitCodeFor(error.kind));
}

/** Value of an ok result; prints the error and exits otherwise. */
export function unwrap<T>(result: Result<T>): T {
  if (!result.ok) return fail(result.error);
  return result.value;
}

export async function confirm(message: string): Promise<boolean> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  return new Promise((resolve) => {
    rl.question(`${message} [y/N] `, (answer) => {
      rl.close();
      resolve(answer.trim().toLowerCase() === "y");
    });
  });
}

export type StopSignalHandler = {
  signal: AbortSignal;
  cleanup: () => void;
};

/** Abort on the first SIGINT/SIGTERM so running installs finish but nothing new starts. */
export function createStopSignalHandler(
  opts: { onSignal?: (signal: NodeJS.Signals) => void } = {},
): StopSignalHandler {
  const controller = new AbortController();
  let cleaned = false;

  const cleanup = (): void => {
    if (cleaned) return;
    cleaned = true;
    process.off("SIGINT", onSigint);
    process.off("SIGTERM", onSigterm);
  };

  const handleSignal = (signal: NodeJS.Signals): void => {
    try {
      opts.onSignal?.(signal);
    } finally {
      if (!controller.signal.aborted) controller.abort(signal);
      cleanup();
    }
  };

  const onSigint = (): void => handleSignal("SIGINT");
  const onSigterm = (): void => handleSignal("SIGTERM");

  process.once("SIGINT", onSigint);
  process.once("SIGTERM", onSigterm);

  return { signal: controller.signal, cleanup };
}

export function taskLine(task: Readonly<InstallTask>): string {
  const icon =
    task.status === "succeeded"
      ? chalk.green("OK")
      : task.status === "failed"
        ? chalk.red("FAIL")
        : task.blockedBy
          ? chalk.yellow("BLOCKED")
          : chalk.dim("SKIP");
  const notes = [
    task.cached ? "cached" : undefined,
    task.usedFallback ? "fallback" : undefined,
    task.attempts > 1 ? `${task.attempts} attempts` : undefined,
    task.blockedBy ? `needs ${task.blockedBy}` : undefined,
    task.status === "failed" ? task.lastError : undefined,
  ].filter(Boolean);
  const detail = notes.length > 0 ? chalk.dim(` (${notes.join(", ")})`) : "";
  return `  ${icon}  ${task.plugin}@${task.version}${detail}`;
}

export function printReport(report: InstallReport): void {
  console.log(chalk.bold("\nInstall results:"));
  for (const task of report.tasks) console.log(taskLine(task));
  for (const skipped of report.skipped) {
    console.log(`  ${chalk.dim("SKIP")}  ${skipped.name}${chalk.dim(` (${skipped.reason})`)}`);
  }
  for (const warning of report.warnings) console.log(chalk.yellow(`  ${warning}`));
  if (report.cancelled) console.log(chalk.yellow("\nInterrupted: remaining tasks were not started."));
}

export function printHealth(name: string, record: HealthRecord): void {
  const color =
    record.status === "healthy"
      ? chalk.green
      : record.status === "degraded"
        ? chalk.yellow
        : chalk.red;
  console.log(`\n${chalk.bold(name)}  ${color(record.status)}  score ${record.score}`);
  for (const issue of record.issues) {
    const where = issue.plugin ? `${issue.language} (${issue.plugin})` : issue.language;
    console.log(`  ${color("-")} ${where}: ${issue.message}`);
  }
  if (record.recommendations.length > 0) {
    console.log(chalk.bold("\nRecommendations:"));
    for (const rec of record.recommendations) console.log(chalk.dim(`  ${rec}`));
  }
  console.log();
}
