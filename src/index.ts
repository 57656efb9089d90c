#!/usr/bin/env node
import { Command } from "commander";
import { detectCommand } from "./commands/detect.js";
import { initCommand } from "./commands/init.js";
import { setupCommand } from "./commands/setup.js";
import { switchCommand, deactivateCommand } from "./commands/switch.js";
import { statusCommand } from "./commands/status.js";
import { listCommand } from "./commands/list.js";
import { removeCommand } from "./commands/remove.js";
import { shareCommand, importCommand } from "./commands/share.js";
import { pluginsCommand } from "./commands/plugins.js";

const program = new Command();

program
  .name("devenv")
  .description("Per-project development environments")
  .version("0.1.0");

program
  .command("detect [dir]")
  .description("Show the languages, frameworks and tools a project needs")
  .option("--json", "Output the profile as JSON")
  .action((dir, opts) => detectCommand(dir ?? ".", opts));

program
  .command("init [dir]")
  .description("Detect a project, write devenv.yaml and set up its environment")
  .option("-n, --name <name>", "Environment name (defaults to the directory name)")
  .option("--no-deps", "Skip installing project dependencies")
  .action((dir, opts) => initCommand(dir ?? ".", opts));

program
  .command("setup [dir]")
  .description("Install everything a project's environment needs and activate it")
  .option("-n, --name <name>", "Environment name (defaults to the directory name)")
  .option("-e, --env <name>", "Re-run setup for a stored or imported environment")
  .option("--no-deps", "Skip installing project dependencies")
  .action((dir, opts) => setupCommand(dir ?? ".", opts));

program
  .command("switch <name>")
  .description("Deactivate the current environment and activate another")
  .option("--print", "Print export lines for eval instead of updating the shell profile")
  .option("--no-profile", "Do not update the shell profile")
  .action(switchCommand);

program
  .command("deactivate")
  .description("Deactivate the active environment")
  .action(deactivateCommand);

program
  .command("status [name]")
  .description("Check the health of an environment (the active one by default)")
  .option("--json", "Output the health record as JSON")
  .action(statusCommand);

program
  .command("list")
  .description("List environments")
  .action(listCommand);

program
  .command("remove <name>")
  .description("Remove an environment")
  .option("-y, --yes", "Skip confirmation prompt")
  .action(removeCommand);

program
  .command("share <name>")
  .description("Export an environment descriptor for teammates")
  .option("-o, --output <file>", "Write to a file instead of stdout")
  .action(shareCommand);

program
  .command("import <file>")
  .description("Create an environment from a shared descriptor")
  .option("-n, --name <name>", "Environment name (defaults to the shared name)")
  .option("-p, --project <dir>", "Project directory the environment belongs to", ".")
  .action(importCommand);

program
  .command("plugins")
  .description("List registered plugins")
  .option("--json", "Output as JSON")
  .action(pluginsCommand);

program.parse();
