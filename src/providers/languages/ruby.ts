import { join } from "node:path";
import { ShellProvider } from "../base.js";
import type { ProviderContext } from "../types.js";

export class RubyProvider extends ShellProvider {
  name = "ruby";
  kind = "language" as const;
  provides = ["ruby", "bundler"];
  versions = ">=2.7.0";
  defaultVersion = "3.3.4";

  protected installScript(ctx: ProviderContext): string {
    return `ruby-build ${ctx.version} "${ctx.installDir}"`;
  }

  protected updateScript(ctx: ProviderContext): string {
    return `"${ctx.installDir}/bin/gem" update --system`;
  }

  protected dependenciesScript(ctx: ProviderContext): string {
    return `if [ -f Gemfile ]; then "${ctx.installDir}/bin/bundle" install; fi`;
  }

  protected versionScript(ctx: ProviderContext): string {
    return `"${ctx.installDir}/bin/ruby" --version`;
  }

  protected variables(ctx: ProviderContext): Record<string, string> {
    return { GEM_HOME: join(ctx.installDir, "gems") };
  }

  protected binDirs(ctx: ProviderContext): string[] {
    return [join(ctx.installDir, "bin"), join(ctx.installDir, "gems", "bin")];
  }
}
