import { ShellProvider } from "../base.js";
import type { ProviderContext } from "../types.js";

/** Rust toolchains, installed through the rustup plugin. */
export class RustProvider extends ShellProvider {
  name = "rust";
  kind = "language" as const;
  provides = ["rust", "cargo"];
  versions = ">=1.56.0";
  defaultVersion = "1.79.0";
  dependsOn = ["rustup"];

  protected installScript(ctx: ProviderContext): string {
    return `rustup toolchain install ${ctx.version} --profile minimal`;
  }

  protected updateScript(ctx: ProviderContext): string {
    return `rustup update ${ctx.version}`;
  }

  protected dependenciesScript(): string {
    return `cargo fetch`;
  }

  protected versionScript(): string {
    return `rustc --version`;
  }

  protected variables(ctx: ProviderContext): Record<string, string> {
    return { RUSTUP_TOOLCHAIN: ctx.version };
  }

  // Toolchains live under RUSTUP_HOME; the rustup plugin puts its proxies on PATH
  protected binDirs(): string[] {
    return [];
  }
}
