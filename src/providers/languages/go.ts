import { ShellProvider, platformTriple } from "../base.js";
import type { ProviderContext } from "../types.js";

export class GoProvider extends ShellProvider {
  name = "go";
  kind = "language" as const;
  provides = ["go"];
  versions = ">=1.16.0";
  defaultVersion = "1.22.5";

  protected installScript(ctx: ProviderContext): string {
    const { os, arch } = platformTriple();
    const goArch = arch === "x64" ? "amd64" : arch;
    return `mkdir -p "${ctx.installDir}" &&
curl -fsSL https://go.dev/dl/go${ctx.version}.${os}-${goArch}.tar.gz | tar -xz -C "${ctx.installDir}" --strip-components=1`;
  }

  protected dependenciesScript(): string {
    return `go mod download`;
  }

  protected versionScript(ctx: ProviderContext): string {
    return `"${ctx.installDir}/bin/go" version`;
  }

  protected variables(ctx: ProviderContext): Record<string, string> {
    return { GOROOT: ctx.installDir };
  }
}
