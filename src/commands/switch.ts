import chalk from "chalk";
import {
  detectShell,
  removeEnvBlock,
  renderActivationScript,
  renderExports,
  writeEnvBlock,
} from "../env.js";
import { openEngine, unwrap } from "./shared.js";

export async function switchCommand(name: string, opts: { print?: boolean; profile?: boolean }) {
  const engine = await openEngine();
  const env = unwrap(await engine.switch(name));
  const shell = detectShell();

  const script = unwrap(
    await engine.writeActivationScript(name, renderActivationScript(name, env.variables)),
  );

  if (opts.print) {
    // For eval "$(devenv switch <name> --print)"
    console.log(renderExports(env.variables, shell.name).join("\n"));
    return;
  }

  if (opts.profile !== false) {
    const outcome = writeEnvBlock(name, env.variables, shell);
    console.log(
      chalk.dim(
        outcome === "replaced"
          ? `Replaced the devenv block in ${shell.profilePath}`
          : `Added a devenv block to ${shell.profilePath}`,
      ),
    );
  }
  console.log(chalk.green(`\nSwitched to ${name}.`));
  console.log(chalk.dim(`Load it in this shell with: . ${script}\n`));
}

export async function deactivateCommand() {
  const engine = await openEngine();
  const env = unwrap(await engine.deactivate());
  if (!env) {
    console.log(chalk.dim("\nNo environment is active.\n"));
    return;
  }
  const shell = detectShell();
  if (removeEnvBlock(shell.profilePath)) console.log(chalk.dim(`Updated ${shell.profilePath}`));
  console.log(chalk.green(`\nDeactivated ${env.name}.\n`));
}
