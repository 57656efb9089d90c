import { ShellProvider } from "../base.js";
import type { ProviderContext } from "../types.js";

export class PnpmProvider extends ShellProvider {
  name = "pnpm";
  kind = "tool" as const;
  provides = ["pnpm"];
  versions = ">=6.0.0";
  defaultVersion = "9.4.0";
  dependsOn = ["node"];

  protected installScript(ctx: ProviderContext): string {
    return `npm install --global --prefix "${ctx.installDir}" pnpm@${ctx.version}`;
  }

  protected updateScript(ctx: ProviderContext): string {
    return `npm install --global --prefix "${ctx.installDir}" pnpm@${ctx.version.split(".")[0]}`;
  }

  protected dependenciesScript(): string {
    return `pnpm install --frozen-lockfile`;
  }

  protected versionScript(ctx: ProviderContext): string {
    return `"${ctx.installDir}/bin/pnpm" --version`;
  }
}
