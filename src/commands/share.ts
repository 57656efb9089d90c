import chalk from "chalk";
import { readFile, writeFile } from "node:fs/promises";
import { errorMessage } from "../errors.js";
import { fail, openEngine, unwrap } from "./shared.js";

export async function shareCommand(name: string, opts: { output?: string }) {
  const engine = await openEngine();
  const descriptor = unwrap(await engine.share(name));

  if (!opts.output) {
    process.stdout.write(descriptor);
    return;
  }
  await writeFile(opts.output, descriptor, "utf-8");
  console.log(chalk.green(`\nWrote ${opts.output}`));
  console.log(chalk.dim(`Teammates can run: devenv import ${opts.output}\n`));
}

export async function importCommand(file: string, opts: { name?: string; project?: string }) {
  const engine = await openEngine();
  let bytes: string;
  try {
    bytes = await readFile(file, "utf-8");
  } catch (err: unknown) {
    return fail({
      kind: "ConfigurationError",
      message: `Cannot read ${file}: ${errorMessage(err)}`,
      context: { path: file },
    });
  }

  const env = unwrap(
    await engine.import(bytes, { name: opts.name, projectPath: opts.project ?? "." }),
  );
  console.log(chalk.green(`\nImported ${env.name}.`));
  console.log(chalk.dim(`Install it with: devenv setup --env ${env.name}\n`));
}
