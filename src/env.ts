import { readFileSync, writeFileSync, existsSync, mkdirSync } from "node:fs";
import { dirname, join } from "node:path";
import { homedir } from "node:os";

const BEGIN_TAG = "# --- devenv ---";
const END_TAG = "# --- end devenv ---";

export type ShellName = "bash" | "zsh" | "fish";

export interface ShellInfo {
  name: ShellName;
  profilePath: string;
}

/** Detect the user's shell and return the profile path to write to. */
export function detectShell(
  env: NodeJS.ProcessEnv = process.env,
  home: string = homedir(),
): ShellInfo {
  const shell = env.SHELL ?? "";

  if (shell.endsWith("/fish")) {
    return { name: "fish", profilePath: join(home, ".config", "fish", "config.fish") };
  }

  if (shell.endsWith("/bash")) {
    // Prefer .bashrc for interactive sessions
    return { name: "bash", profilePath: join(home, ".bashrc") };
  }

  // Default to zsh (macOS default, common on Linux)
  return { name: "zsh", profilePath: join(home, ".zshrc") };
}

function quote(value: string, shell: ShellName): string {
  if (shell === "fish") return `'${value.replace(/\\/g, "\\\\").replace(/'/g, "\\'")}'`;
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

/** One export line per variable, keys sorted. */
export function renderExports(vars: Record<string, string>, shell: ShellName): string[] {
  return Object.keys(vars)
    .sort()
    .map((key) => {
      // fish takes PATH as a list
      if (shell === "fish" && key === "PATH") {
        return `set -gx PATH ${vars[key].split(":").map((p) => quote(p, shell)).join(" ")}`;
      }
      return shell === "fish"
        ? `set -gx ${key} ${quote(vars[key], shell)}`
        : `export ${key}=${quote(vars[key], shell)}`;
    });
}

/** Standalone script a shell can source to enter the environment. */
export function renderActivationScript(
  envName: string,
  vars: Record<string, string>,
  shell: ShellName = "bash",
): string {
  return [`# devenv environment: ${envName}`, ...renderExports(vars, shell)].join("\n") + "\n";
}

function formatEnvBlock(envName: string, vars: Record<string, string>, shell: ShellName): string {
  return [BEGIN_TAG, `# environment: ${envName}`, ...renderExports(vars, shell), END_TAG].join(
    "\n",
  );
}

export function hasEnvBlock(profilePath: string): boolean {
  if (!existsSync(profilePath)) return false;
  return readFileSync(profilePath, "utf-8").includes(BEGIN_TAG);
}

/**
 * Write the active environment's variables to the shell profile. Replaces an
 * existing block; returns which of the two happened.
 */
export function writeEnvBlock(
  envName: string,
  vars: Record<string, string>,
  shell: ShellInfo,
): "added" | "replaced" {
  const block = formatEnvBlock(envName, vars, shell.name);
  const profilePath = shell.profilePath;

  if (!existsSync(profilePath)) {
    mkdirSync(dirname(profilePath), { recursive: true });
    writeFileSync(profilePath, block + "\n", "utf-8");
    return "added";
  }

  const replacing = hasEnvBlock(profilePath);
  const content = readFileSync(profilePath, "utf-8");
  writeFileSync(
    profilePath,
    replacing
      ? content.replace(blockPattern(), block)
      : content.trimEnd() + "\n\n" + block + "\n",
    "utf-8",
  );
  return replacing ? "replaced" : "added";
}

/** Remove the devenv block from the shell profile. Returns whether one was there. */
export function removeEnvBlock(profilePath: string): boolean {
  if (!existsSync(profilePath)) return false;

  let content = readFileSync(profilePath, "utf-8");
  if (!content.includes(BEGIN_TAG)) return false;

  content = content.replace(
    new RegExp("\\n?" + blockPattern().source + "\\n?", "m"),
    "\n",
  );
  // Clean up trailing whitespace
  content = content.replace(/\n{3,}/g, "\n\n").trimEnd() + "\n";

  writeFileSync(profilePath, content, "utf-8");
  return true;
}

function blockPattern(): RegExp {
  return new RegExp(escapeRegExp(BEGIN_TAG) + "[\\s\\S]*?" + escapeRegExp(END_TAG), "m");
}

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
