import { ShellProvider } from "../base.js";
import type { ProviderContext } from "../types.js";

export class PythonProvider extends ShellProvider {
  name = "python";
  kind = "language" as const;
  provides = ["python"];
  versions = ">=3.7.0";
  defaultVersion = "3.12.4";

  protected installScript(ctx: ProviderContext): string {
    return `python-build ${ctx.version} "${ctx.installDir}"`;
  }

  // Build from the source tarball when python-build is missing or fails
  async fallbackSetup(ctx: ProviderContext): Promise<void> {
    await this.exec(
      ctx,
      `src="$(mktemp -d)" &&
curl -fsSL https://www.python.org/ftp/python/${ctx.version}/Python-${ctx.version}.tgz | tar -xz -C "$src" &&
cd "$src/Python-${ctx.version}" &&
./configure --prefix="${ctx.installDir}" >/dev/null &&
make -j4 >/dev/null && make install >/dev/null &&
rm -rf "$src"`,
      "fallback install",
    );
  }

  protected updateScript(ctx: ProviderContext): string {
    return `"${ctx.installDir}/bin/python3" -m pip install --upgrade pip`;
  }

  protected dependenciesScript(ctx: ProviderContext): string {
    return `if [ -f requirements.txt ]; then "${ctx.installDir}/bin/python3" -m pip install -r requirements.txt; fi`;
  }

  protected versionScript(ctx: ProviderContext): string {
    return `"${ctx.installDir}/bin/python3" --version`;
  }

  protected variables(): Record<string, string> {
    return { PYTHONNOUSERSITE: "1" };
  }
}
