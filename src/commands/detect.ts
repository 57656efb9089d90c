import chalk from "chalk";
import { openEngine, unwrap } from "./shared.js";

export async function detectCommand(dir: string, opts: { json?: boolean }) {
  const engine = await openEngine();
  const profile = unwrap(await engine.detect(dir));

  if (opts.json) {
    console.log(JSON.stringify(profile, null, 2));
    return;
  }

  console.log(chalk.bold(`\n${profile.root}`));
  const languages = Object.entries(profile.languages);
  if (languages.length === 0 && profile.tools.length === 0) {
    console.log(chalk.dim("  Nothing recognised.\n"));
    return;
  }

  for (const [name, d] of languages) {
    const version = d.version ? chalk.cyan(d.version) : chalk.dim("any version");
    console.log(`  ${chalk.green(name)} ${version} ${chalk.dim(`from ${d.source}`)}`);
  }
  for (const f of profile.frameworks) {
    console.log(`  ${chalk.blue(f.name)} ${chalk.dim(`(${f.language}) from ${f.source}`)}`);
  }
  for (const t of profile.tools) {
    const version = t.version ? ` ${t.version}` : "";
    console.log(`  ${chalk.magenta(t.name)}${version} ${chalk.dim(`from ${t.source}`)}`);
  }
  console.log();
}
