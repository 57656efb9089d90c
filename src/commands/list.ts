import chalk from "chalk";
import { openEngine, unwrap } from "./shared.js";

export async function listCommand() {
  const engine = await openEngine();
  const { environments, active } = unwrap(await engine.list());

  if (environments.length === 0) {
    console.log(chalk.dim("\nNo environments.\n"));
    return;
  }

  console.log();
  for (const env of environments) {
    const marker = env.name === active ? chalk.green("*") : " ";
    const languages = Object.entries(env.languages)
      .map(([lang, version]) => (version === "*" ? lang : `${lang} ${version}`))
      .join(", ");
    const health = env.health ? chalk.dim(` health ${env.health.status} (${env.health.score})`) : "";
    console.log(`${marker} ${chalk.bold(env.name)}  ${env.status}  ${chalk.dim(languages)}${health}`);
    console.log(chalk.dim(`    ${env.projectPath}`));
  }
  console.log();
}
