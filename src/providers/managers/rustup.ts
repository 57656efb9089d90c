import { join } from "node:path";
import { ShellProvider } from "../base.js";
import type { ProviderContext } from "../types.js";

export class RustupProvider extends ShellProvider {
  name = "rustup";
  kind = "manager" as const;
  provides = ["rustup"];
  versions = "*";
  defaultVersion = "1.27.1";

  protected installScript(ctx: ProviderContext): string {
    const { rustupHome, cargoHome } = homes(ctx);
    return `curl --proto '=https' --tlsv1.2 -sSf https://sh.rustup.rs |
RUSTUP_HOME="${rustupHome}" CARGO_HOME="${cargoHome}" sh -s -- -y --no-modify-path --default-toolchain none`;
  }

  protected updateScript(): string {
    return `rustup self update`;
  }

  protected versionScript(ctx: ProviderContext): string {
    return `"${homes(ctx).cargoHome}/bin/rustup" --version`;
  }

  protected variables(ctx: ProviderContext): Record<string, string> {
    const { rustupHome, cargoHome } = homes(ctx);
    return { RUSTUP_HOME: rustupHome, CARGO_HOME: cargoHome };
  }

  protected binDirs(ctx: ProviderContext): string[] {
    return [join(homes(ctx).cargoHome, "bin")];
  }
}

function homes(ctx: ProviderContext) {
  return {
    rustupHome: join(ctx.installDir, "rustup"),
    cargoHome: join(ctx.installDir, "cargo"),
  };
}
