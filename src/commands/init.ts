import chalk from "chalk";
import { openEngine } from "./shared.js";
import { runSetup, type SetupCommandOptions } from "./setup.js";

export async function initCommand(dir: string, opts: Omit<SetupCommandOptions, "env">) {
  const engine = await openEngine();
  console.log(chalk.bold(`\nInitialising devenv in ${dir}`));
  await runSetup((signal) =>
    engine.init(dir, { name: opts.name, signal, installDependencies: opts.deps !== false }),
  );
}
