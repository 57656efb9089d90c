import chalk from "chalk";
import type { Result } from "../errors.js";
import type { SetupResult } from "../state-machine.js";
import { createStopSignalHandler, openEngine, printReport, taskLine, unwrap } from "./shared.js";

export interface SetupCommandOptions {
  name?: string;
  env?: string;
  deps?: boolean;
}

/** Run a setup under a stop handler and print the outcome. */
export async function runSetup(
  start: (signal: AbortSignal) => Promise<Result<SetupResult>>,
): Promise<void> {
  const stop = createStopSignalHandler({
    onSignal: () => console.log(chalk.yellow("\nStopping: waiting for running installs to finish...")),
  });
  let result: Result<SetupResult>;
  try {
    result = await start(stop.signal);
  } finally {
    stop.cleanup();
  }

  const { environment, report } = unwrap(result);
  printReport(report);

  if (environment.status === "active") {
    console.log(chalk.green(`\n${environment.name} is set up and active.`));
    console.log(chalk.dim(`Run 'devenv switch ${environment.name}' in a new shell to load it.\n`));
    return;
  }
  console.log(chalk.yellow(`\n${environment.name} is ${environment.status}.`));
  console.log(chalk.dim(`Fix the failures above and run 'devenv setup --env ${environment.name}'.\n`));
  process.exitCode = 4;
}

export async function setupCommand(dir: string, opts: SetupCommandOptions) {
  const engine = await openEngine();
  const installDependencies = opts.deps !== false;
  const onTaskUpdate = (task: Parameters<typeof taskLine>[0]) => {
    if (task.status === "running") console.log(chalk.dim(`  ... ${task.plugin}@${task.version}`));
  };

  const envName = opts.env;
  if (envName) {
    await runSetup((signal) =>
      engine.repair(envName, { signal, installDependencies, onTaskUpdate }),
    );
    return;
  }

  const profile = unwrap(await engine.detect(dir));
  if (Object.keys(profile.languages).length === 0) {
    console.log(chalk.yellow("\nNo languages detected; declare them in devenv.yaml.\n"));
    process.exitCode = 1;
    return;
  }
  await runSetup((signal) =>
    engine.setup(profile, { name: opts.name, signal, installDependencies, onTaskUpdate }),
  );
}
