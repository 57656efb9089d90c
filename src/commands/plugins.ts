import chalk from "chalk";
import { openEngine, unwrap } from "./shared.js";

export async function pluginsCommand(opts: { json?: boolean }) {
  const engine = await openEngine();
  const plugins = unwrap(await engine.plugins());

  if (opts.json) {
    console.log(JSON.stringify(plugins, null, 2));
    return;
  }

  console.log();
  for (const p of plugins) {
    const deps = p.dependsOn.length > 0 ? chalk.dim(` needs ${p.dependsOn.join(", ")}`) : "";
    const fallback = p.fallback ? chalk.dim(" +fallback") : "";
    console.log(
      `  ${chalk.bold(p.name)} ${chalk.dim(p.kind)}  ${p.versions} (default ${p.defaultVersion})${deps}${fallback}`,
    );
    console.log(chalk.dim(`    provides ${p.provides.join(", ")}`));
  }
  console.log();
}
