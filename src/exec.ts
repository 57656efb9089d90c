import { execFile } from "node:child_process";

export interface CommandResult {
  code: number;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}

export interface RunOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  timeoutMs?: number;
}

/**
 * Capability to run an external command. Installers and health probes go
 * through this instead of spawning processes themselves, so tests can
 * substitute a scripted runner.
 */
export interface CommandRunner {
  run(command: string, args: string[], opts?: RunOptions): Promise<CommandResult>;
}

const MAX_BUFFER = 16 * 1024 * 1024;

/** Runs commands with execFile. Never rejects: failures come back as exit codes. */
export const execRunner: CommandRunner = {
  run(command, args, opts = {}) {
    return new Promise((resolve) => {
      execFile(
        command,
        args,
        {
          cwd: opts.cwd,
          env: opts.env ?? process.env,
          timeout: opts.timeoutMs ?? 0,
          maxBuffer: MAX_BUFFER,
          encoding: "utf-8",
        },
        (error, stdout, stderr) => {
          if (!error) {
            resolve({ code: 0, stdout, stderr, timedOut: false });
            return;
          }
          const timedOut = error.killed === true && error.signal === "SIGTERM";
          // String codes are spawn errors such as ENOENT
          const code = typeof error.code === "number" ? error.code : 127;
          resolve({
            code,
            stdout,
            stderr: stderr || error.message,
            timedOut,
          });
        },
      );
    });
  },
};

/** Run a shell snippet through `sh -c`. */
export function runShell(
  runner: CommandRunner,
  script: string,
  opts?: RunOptions,
): Promise<CommandResult> {
  return runner.run("sh", ["-c", script], opts);
}
