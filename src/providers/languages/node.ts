import { ShellProvider, platformTriple } from "../base.js";
import type { ProviderContext } from "../types.js";

export class NodeProvider extends ShellProvider {
  name = "node";
  kind = "language" as const;
  provides = ["node", "npm", "javascript", "typescript"];
  versions = ">=14.0.0";
  defaultVersion = "20.10.0";

  protected installScript(ctx: ProviderContext): string {
    const { os, arch } = platformTriple();
    const dist = `node-v${ctx.version}-${os}-${arch}`;
    return `mkdir -p "${ctx.installDir}" &&
curl -fsSL https://nodejs.org/dist/v${ctx.version}/${dist}.tar.gz | tar -xz -C "${ctx.installDir}" --strip-components=1`;
  }

  // Reuse a copy nvm already has, when the download path is unavailable
  async fallbackSetup(ctx: ProviderContext): Promise<void> {
    await this.exec(
      ctx,
      `. "\${NVM_DIR:-$HOME/.nvm}/nvm.sh" && nvm install ${ctx.version} &&
mkdir -p "${ctx.installDir}" &&
cp -R "\${NVM_DIR:-$HOME/.nvm}/versions/node/v${ctx.version}/." "${ctx.installDir}"`,
      "fallback install",
    );
  }

  protected updateScript(ctx: ProviderContext): string {
    return `"${ctx.installDir}/bin/npm" install --global --prefix "${ctx.installDir}" npm@latest`;
  }

  protected dependenciesScript(): string {
    return `if [ -f package-lock.json ]; then npm ci; else npm install; fi`;
  }

  protected versionScript(ctx: ProviderContext): string {
    return `"${ctx.installDir}/bin/node" --version`;
  }

  protected variables(ctx: ProviderContext): Record<string, string> {
    // Global installs land in the environment, not the user's prefix
    return { NPM_CONFIG_PREFIX: ctx.installDir };
  }
}
