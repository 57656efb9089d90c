import { ShellProvider } from "../base.js";
import type { ProviderContext } from "../types.js";

export class YarnProvider extends ShellProvider {
  name = "yarn";
  kind = "tool" as const;
  provides = ["yarn"];
  versions = ">=1.0.0";
  defaultVersion = "1.22.22";
  dependsOn = ["node"];

  protected installScript(ctx: ProviderContext): string {
    return `npm install --global --prefix "${ctx.installDir}" yarn@${ctx.version}`;
  }

  protected dependenciesScript(): string {
    return `yarn install --frozen-lockfile`;
  }

  protected versionScript(ctx: ProviderContext): string {
    return `"${ctx.installDir}/bin/yarn" --version`;
  }
}
