import { ShellProvider } from "../base.js";
import type { ProviderContext } from "../types.js";

/** Poetry in its own virtualenv, built with the environment's python. */
export class PoetryProvider extends ShellProvider {
  name = "poetry";
  kind = "tool" as const;
  provides = ["poetry"];
  versions = ">=1.2.0";
  defaultVersion = "1.8.3";
  dependsOn = ["python"];

  protected installScript(ctx: ProviderContext): string {
    return `python3 -m venv "${ctx.installDir}" &&
"${ctx.installDir}/bin/pip" install --quiet "poetry==${ctx.version}"`;
  }

  protected dependenciesScript(): string {
    return `poetry install --no-interaction`;
  }

  protected versionScript(ctx: ProviderContext): string {
    return `"${ctx.installDir}/bin/poetry" --version`;
  }
}
