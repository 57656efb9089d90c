import chalk from "chalk";
import { detectShell, removeEnvBlock } from "../env.js";
import { confirm, openEngine, unwrap } from "./shared.js";

export async function removeCommand(name: string, opts: { yes?: boolean }) {
  const engine = await openEngine();
  const { environments, active } = unwrap(await engine.list());
  if (!environments.some((e) => e.name === name)) {
    console.log(chalk.red(`\nEnvironment "${name}" not found.\n`));
    console.log(chalk.dim("Run 'devenv list' to see environments."));
    process.exit(3);
  }

  if (!opts.yes) {
    const note = name === active ? " It is active and will be deactivated." : "";
    if (!(await confirm(`Remove environment ${name}?${note}`))) {
      console.log(chalk.dim("Aborted."));
      return;
    }
  }

  unwrap(await engine.remove(name));
  if (name === active) {
    const shell = detectShell();
    if (removeEnvBlock(shell.profilePath)) console.log(chalk.dim(`Updated ${shell.profilePath}`));
  }
  console.log(chalk.green(`\nRemoved ${name}.`));
  console.log(chalk.dim("Installed runtimes stay in the cache for other environments.\n"));
}
