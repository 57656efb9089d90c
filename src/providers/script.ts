import { readdir, readFile } from "node:fs/promises";
import { extname, join } from "node:path";
import { parseYamlText, isNotFound } from "../config.js";
import { ConfigurationError } from "../errors.js";
import { ScriptPluginSchema, type ScriptPluginManifest } from "../schema.js";
import { ShellProvider } from "./base.js";
import type { ProviderContext, ProviderKind } from "./types.js";

const MANIFEST_EXTENSIONS = new Set([".yaml", ".yml", ".json"]);

function render(template: string, ctx: ProviderContext): string {
  return template
    .replaceAll("{version}", ctx.version)
    .replaceAll("{install_dir}", ctx.installDir);
}

/** Provider declared by a manifest in the plugins directory. */
export class ScriptProvider extends ShellProvider {
  readonly name: string;
  readonly kind: ProviderKind;
  readonly provides: readonly string[];
  readonly versions: string;
  readonly defaultVersion: string;
  readonly dependsOn: readonly string[] = [];
  readonly fallbackSetup?: (ctx: ProviderContext) => Promise<void>;
  readonly deactivate?: (ctx: ProviderContext) => Promise<void>;

  constructor(private readonly manifest: ScriptPluginManifest) {
    super();
    this.name = manifest.name;
    this.kind = manifest.kind;
    this.provides = manifest.provides ?? [manifest.name];
    this.versions = manifest.versions;
    this.defaultVersion = manifest.default_version;
    this.dependsOn = manifest.depends_on;

    const fallback = manifest.fallback;
    if (fallback) {
      this.fallbackSetup = (ctx) => this.exec(ctx, render(fallback, ctx), "fallback install");
    }
    const deactivate = manifest.deactivate;
    if (deactivate) {
      this.deactivate = (ctx) => this.exec(ctx, render(deactivate, ctx), "deactivate");
    }
  }

  protected installScript(ctx: ProviderContext): string {
    return render(this.manifest.install, ctx);
  }

  protected updateScript(ctx: ProviderContext): string | undefined {
    return this.manifest.update && render(this.manifest.update, ctx);
  }

  protected dependenciesScript(ctx: ProviderContext): string | undefined {
    return this.manifest.install_dependencies && render(this.manifest.install_dependencies, ctx);
  }

  protected versionScript(ctx: ProviderContext): string {
    return render(this.manifest.check, ctx);
  }

  protected variables(ctx: ProviderContext): Record<string, string> {
    return Object.fromEntries(
      Object.entries(this.manifest.env).map(([key, value]) => [key, render(value, ctx)]),
    );
  }

  protected binDirs(ctx: ProviderContext): string[] {
    return this.manifest.path.map((entry) => render(entry, ctx));
  }
}

/** Load every manifest in `dir`, sorted by file name. A missing directory yields none. */
export async function loadScriptProviders(dir: string): Promise<ScriptProvider[]> {
  let entries: string[];
  try {
    entries = await readdir(dir);
  } catch (err: unknown) {
    if (isNotFound(err)) return [];
    throw new ConfigurationError(`Cannot read plugins directory ${dir}`, { path: dir }, err);
  }

  const providers: ScriptProvider[] = [];
  for (const entry of entries.sort()) {
    if (!MANIFEST_EXTENSIONS.has(extname(entry))) continue;
    const path = join(dir, entry);
    // JSON is valid YAML, so one parser covers both
    const manifest = parseYamlText(await readFile(path, "utf-8"), ScriptPluginSchema, path);
    providers.push(new ScriptProvider(manifest));
  }
  return providers;
}
