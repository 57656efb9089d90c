import chalk from "chalk";
import { openEngine, printHealth, unwrap } from "./shared.js";

export async function statusCommand(name: string | undefined, opts: { json?: boolean }) {
  const engine = await openEngine();
  const { environments, active } = unwrap(await engine.list());
  const target = name ?? active;

  if (!target) {
    console.log(chalk.dim("\nNo environment is active. Name one: devenv status <name>\n"));
    if (environments.length === 0) console.log(chalk.dim("Create one with: devenv init\n"));
    return;
  }

  const record = unwrap(await engine.status(target));
  if (opts.json) {
    console.log(JSON.stringify(record, null, 2));
  } else {
    printHealth(target, record);
  }
  if (record.status === "unhealthy") process.exitCode = 1;
}
