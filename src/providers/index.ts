import { NodeProvider } from "./languages/node.js";
import { PythonProvider } from "./languages/python.js";
import { GoProvider } from "./languages/go.js";
import { RubyProvider } from "./languages/ruby.js";
import { RustProvider } from "./languages/rust.js";
import { RustupProvider } from "./managers/rustup.js";
import { YarnProvider } from "./package-managers/yarn.js";
import { PnpmProvider } from "./package-managers/pnpm.js";
import { PoetryProvider } from "./package-managers/poetry.js";
import { PluginRegistry } from "./registry.js";
import type { LanguageProvider } from "./types.js";

export { PluginRegistry, normalizeRange } from "./registry.js";
export { ScriptProvider, loadScriptProviders } from "./script.js";
export { ShellProvider } from "./base.js";
export type { Activation, LanguageProvider, ProbeResult, ProviderContext } from "./types.js";

export function builtinProviders(): LanguageProvider[] {
  return [
    new NodeProvider(),
    new PythonProvider(),
    new GoProvider(),
    new RubyProvider(),
    new RustupProvider(),
    new RustProvider(),
    new YarnProvider(),
    new PnpmProvider(),
    new PoetryProvider(),
  ];
}

/** Registry holding the built-in providers followed by any extra ones. */
export function createRegistry(extra: LanguageProvider[] = []): PluginRegistry {
  const registry = new PluginRegistry();
  for (const provider of [...builtinProviders(), ...extra]) {
    registry.register(provider);
  }
  return registry;
}
