import { delimiter, join } from "node:path";
import type { CommandRunner } from "../exec.js";
import type { Logger } from "../log.js";
import type { PluginRegistry } from "./registry.js";
import type { Activation, ProviderContext } from "./types.js";

export const COMPLETE_MARKER = ".devenv-complete";

export function installDirFor(cacheDir: string, plugin: string, version: string): string {
  return join(cacheDir, plugin, version);
}

export interface ContextBase {
  registry: PluginRegistry;
  cacheDir: string;
  runner: CommandRunner;
  logger: Logger;
  env: NodeJS.ProcessEnv;
  timeoutMs?: number;
  projectPath?: string;
}

export function contextFor(
  base: ContextBase,
  plugin: string,
  version: string,
  env: NodeJS.ProcessEnv = base.env,
): ProviderContext {
  return {
    version,
    installDir: installDirFor(base.cacheDir, plugin, version),
    runner: base.runner,
    env,
    logger: base.logger,
    projectPath: base.projectPath,
    timeoutMs: base.timeoutMs,
  };
}

/** Order plugin names so every dependency precedes its dependents; ties by name. */
export function dependencyOrder(registry: PluginRegistry, names: Iterable<string>): string[] {
  const wanted = new Set(names);
  const ordered: string[] = [];
  const visited = new Set<string>();

  const visit = (name: string) => {
    if (visited.has(name)) return;
    visited.add(name);
    const deps = registry.has(name) ? registry.dependenciesOf(name) : [];
    for (const dep of [...deps].sort()) {
      if (wanted.has(dep)) visit(dep);
    }
    ordered.push(name);
  };

  for (const name of [...wanted].sort()) visit(name);
  return ordered;
}

/**
 * Merge the activations of `plugins` (name -> version). Dependents come
 * later in dependency order, so their variables win and their PATH entries
 * sit in front.
 */
export async function composeActivation(
  base: ContextBase,
  plugins: Record<string, string>,
): Promise<Activation> {
  const variables: Record<string, string> = {};
  let path: string[] = [];
  for (const name of dependencyOrder(base.registry, Object.keys(plugins))) {
    const provider = base.registry.lookup(name);
    const activation = await provider.activate(contextFor(base, name, plugins[name]));
    Object.assign(variables, activation.variables);
    path = [...activation.path, ...path];
  }
  return { variables, path };
}

/** Variables as they would be exported: PATH entries folded into PATH. */
export function activationVariables(
  activation: Activation,
  basePath: string | undefined,
): Record<string, string> {
  const vars = { ...activation.variables };
  if (activation.path.length > 0) {
    vars.PATH = [...activation.path, ...(basePath ? [basePath] : [])].join(delimiter);
  }
  return vars;
}

export function withActivation(env: NodeJS.ProcessEnv, activation: Activation): NodeJS.ProcessEnv {
  return { ...env, ...activationVariables(activation, env.PATH) };
}
