import semver from "semver";
import {
  DependencyCycleError,
  DuplicateNameError,
  PluginNotFoundError,
  VersionUnsupportedError,
} from "../errors.js";
import type { LanguageProvider } from "./types.js";

/**
 * Turn whatever a project wrote ("v20", "3.11", ">=3.10", "lts/iron")
 * into a semver range. Unparseable requests match anything.
 */
export function normalizeRange(requested: string | undefined): string {
  if (!requested) return "*";
  const trimmed = requested.trim().replace(/^v(?=\d)/, "");
  const range = semver.validRange(trimmed);
  if (range) return range;
  return semver.coerce(trimmed)?.version ?? "*";
}

function capabilities(p: LanguageProvider): string {
  return JSON.stringify({
    kind: p.kind,
    provides: [...p.provides].sort(),
    versions: p.versions,
    defaultVersion: p.defaultVersion,
    dependsOn: [...p.dependsOn].sort(),
    fallback: typeof p.fallbackSetup === "function",
  });
}

/**
 * Plugin descriptors keyed by name. Registration is synchronous, so writes
 * never interleave with each other or with lookups.
 */
export class PluginRegistry {
  private readonly plugins = new Map<string, LanguageProvider>();

  register(provider: LanguageProvider): void {
    const existing = this.plugins.get(provider.name);
    if (existing) {
      if (capabilities(existing) === capabilities(provider)) return;
      throw new DuplicateNameError(provider.name);
    }

    const cycle = this.findCycle(provider);
    if (cycle) throw new DependencyCycleError(cycle);

    this.plugins.set(provider.name, provider);
  }

  has(name: string): boolean {
    return this.plugins.has(name);
  }

  lookup(name: string): LanguageProvider {
    const provider = this.plugins.get(name);
    if (!provider) throw new PluginNotFoundError(name);
    return provider;
  }

  /**
   * Pick the provider for a language or tool. An exact name match is
   * preferred, then registration order.
   */
  resolve(language: string, versionRange?: string): LanguageProvider {
    const candidates = [...this.plugins.values()]
      .filter((p) => p.provides.includes(language))
      .sort((a, b) => Number(b.name === language) - Number(a.name === language));
    if (candidates.length === 0) throw new PluginNotFoundError(language);

    const range = normalizeRange(versionRange);
    const match = candidates.find((p) => semver.intersects(p.versions, range));
    if (!match) {
      throw new VersionUnsupportedError(
        language,
        versionRange ?? "*",
        candidates.map((p) => `${p.name} ${p.versions}`),
      );
    }
    return match;
  }

  dependenciesOf(name: string): readonly string[] {
    return this.lookup(name).dependsOn;
  }

  list(): LanguageProvider[] {
    return [...this.plugins.values()];
  }

  /** Walk dependency edges from the candidate looking for a path back to it. */
  private findCycle(candidate: LanguageProvider): string[] | undefined {
    const edges = (name: string): readonly string[] =>
      name === candidate.name ? candidate.dependsOn : (this.plugins.get(name)?.dependsOn ?? []);

    const visiting = new Set<string>();
    const walk = (name: string, path: string[]): string[] | undefined => {
      for (const dep of edges(name)) {
        if (dep === candidate.name) return [...path, dep];
        if (visiting.has(dep)) continue;
        visiting.add(dep);
        const found = walk(dep, [...path, dep]);
        if (found) return found;
      }
      return undefined;
    };
    return walk(candidate.name, [candidate.name]);
  }
}
