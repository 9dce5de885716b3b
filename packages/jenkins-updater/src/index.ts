/**
 * Jenkins updater CLI
 *
 * Main entry point for the jenkins-updater command-line interface.
 * Updates a Docker Compose hosted Jenkins controller to the latest LTS
 * release or rebuilds its plugins, with backups, health checks and rollback.
 */

import { Command } from "commander";
import chalk from "chalk";

import { update } from "./commands/update.js";
import { plugins } from "./commands/plugins.js";
import { status } from "./commands/status.js";
import { doctor } from "./commands/doctor.js";
import { UpdaterError, errorMessage, errorStderr } from "./errors.js";
import { assertPrerequisites, getCliVersion, printCommands } from "./utils.js";
import type { PluginsOptions, UpdateOptions } from "./types.js";

const program = new Command();

program
  .name("jenkins-updater")
  .description("🔧 Safe LTS and plugin updates for a Docker Compose Jenkins controller")
  .version(getCliVersion(), "-v, --version", "Output the current version");

// update command
program
  .command("update")
  .description("Update Jenkins to the latest LTS release, rolling back if it fails to start")
  .argument("[directory]", "Project directory", ".")
  .option("--target <version>", "Update to a specific MAJOR.MINOR.PATCH version")
  .option("--dry-run", "Show the update plan without making changes")
  .option("--max-attempts <n>", "Health check attempts before rolling back")
  .option("--interval <seconds>", "Seconds between health check attempts")
  .option("--startup-delay <seconds>", "Seconds to wait before the first health check")
  .option("--strict-backup", "Abort if the data volume cannot be backed up")
  .option("--skip-data-backup", "Do not archive the data volume")
  .action(async (directory: string, options: UpdateOptions) => {
    await assertPrerequisites();
    await update(directory, options);
  });

// plugins command
program
  .command("plugins")
  .description("Rebuild Jenkins so every plugin in plugins.txt is at its latest version")
  .argument("[directory]", "Project directory", ".")
  .option("-y, --yes", "Skip the confirmation prompt")
  .option("--force", "Rebuild even when the update center reports no plugin updates")
  .option("--strict-backup", "Abort if the data volume cannot be backed up")
  .option("--skip-data-backup", "Do not archive the data volume")
  .action(async (directory: string, options: PluginsOptions) => {
    await assertPrerequisites();
    await plugins(directory, options);
  });

// status command
program
  .command("status")
  .description("Show service status, health and running version")
  .argument("[directory]", "Project directory", ".")
  .action(async (directory: string) => {
    await status(directory);
  });

// doctor command
program
  .command("doctor")
  .description("Run diagnostics and show system info")
  .argument("[directory]", "Project directory", ".")
  .action(async (directory: string) => {
    await doctor(directory);
  });

try {
  await program.parseAsync(process.argv);
} catch (error: unknown) {
  console.error(chalk.red("\n❌ Error:"), errorMessage(error));

  const stderr = errorStderr(error);
  if (stderr) {
    console.error(chalk.gray("\nDetails:"));
    console.error(chalk.gray(stderr));
  }

  if (error instanceof UpdaterError) {
    printCommands("💡 To recover:", error.remediation);
  }

  console.error(chalk.yellow("\n💡 Try running:"), chalk.cyan("jenkins-updater doctor"));

  process.exit(1);
}
