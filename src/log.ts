import chalk from "chalk";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

const RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const STYLE: Record<Exclude<LogLevel, "silent">, (s: string) => string> = {
  debug: chalk.gray,
  info: chalk.cyan,
  warn: chalk.yellow,
  error: chalk.red,
};

/** Leveled logger writing to stderr; stdout stays free for command output. */
export function createLogger(
  level: LogLevel,
  sink: (line: string) => void = (line) => process.stderr.write(line + "\n"),
): Logger {
  const emit = (at: Exclude<LogLevel, "silent">, message: string) => {
    if (RANK[at] < RANK[level]) return;
    // Timestamps only help when tracing concurrent installs
    const stamp = level === "debug" ? chalk.dim(new Date().toISOString()) + " " : "";
    sink(`${stamp}${STYLE[at](at.padEnd(5))} ${message}`);
  };
  return {
    debug: (m) => emit("debug", m),
    info: (m) => emit("info", m),
    warn: (m) => emit("warn", m),
    error: (m) => emit("error", m),
  };
}

export const silentLogger: Logger = createLogger("silent", () => {});
