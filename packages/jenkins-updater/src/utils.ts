/**
 * Utility functions for the Jenkins updater CLI
 */

import { execa } from "execa";
import fs from "fs-extra";
import path from "path";
import { fileURLToPath } from "url";
import which from "which";
import chalk from "chalk";
import type { Prerequisites, RetryPolicy } from "./types.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

export interface CommandResult {
  stdout: string;
  stderr: string;
}

export interface CommandOptions {
  cwd?: string;
  /** Stream output to the terminal instead of capturing it */
  inherit?: boolean;
}

/**
 * Runs an external command; rejects when it exits non-zero.
 */
export type CommandRunner = (
  file: string,
  args: string[],
  options?: CommandOptions
) => Promise<CommandResult>;

/**
 * Execute a command with execa
 */
export const execAsync: CommandRunner = async (file, args, options = {}) => {
  if (options.inherit) {
    await execa(file, args, { cwd: options.cwd, stdio: "inherit" });
    return { stdout: "", stderr: "" };
  }

  const { stdout, stderr } = await execa(file, args, { cwd: options.cwd });
  return { stdout, stderr };
};

/**
 * Check system prerequisites
 */
export async function checkPrerequisites(
  run: CommandRunner = execAsync
): Promise<Prerequisites> {
  const prereqs: Prerequisites = {
    docker: { installed: false },
    node: { installed: true, satisfies: false },
    platform: { name: process.platform },
  };

  const dockerPath = await which("docker", { nothrow: true });
  prereqs.docker.installed = dockerPath !== null;

  if (dockerPath) {
    const docker = await run("docker", ["--version"]).catch(() => null);
    const match = docker?.stdout.match(/Docker version ([\d.]+)/);
    if (match) {
      prereqs.docker.version = match[1];
    }

    // Compose v2 ships as a docker plugin
    const compose = await run("docker", ["compose", "version"]).catch(() => null);
    const composeMatch = compose?.stdout.match(/version v?([\d.]+)/);
    if (composeMatch) {
      prereqs.docker.composeVersion = composeMatch[1];
    }
  }

  const nodeVersion = process.version.replace("v", "");
  prereqs.node.version = nodeVersion;

  const majorVersion = parseInt(nodeVersion.split(".")[0], 10);
  prereqs.node.satisfies = majorVersion >= 20;

  return prereqs;
}

/**
 * Assert that Docker and Compose v2 are available, or exit with helpful error
 */
export async function assertPrerequisites(run: CommandRunner = execAsync): Promise<void> {
  const prereqs = await checkPrerequisites(run);

  const errors: string[] = [];

  if (!prereqs.docker.installed) {
    errors.push(
      "🐳 Docker is not installed.",
      "   Install from: https://docs.docker.com/get-docker/"
    );
  } else if (!prereqs.docker.composeVersion) {
    errors.push(
      "🐳 Docker Compose (v2) is not available.",
      "   Update Docker to get Compose v2: https://docs.docker.com/compose/install/"
    );
  }

  if (errors.length > 0) {
    console.error(chalk.red("\n❌ Prerequisites not met:\n"));
    errors.forEach((err) => console.error(chalk.yellow(err)));
    console.error("");
    process.exit(1);
  }
}

/**
 * Check if a directory holds a Jenkins controller deployment: the Dockerfile
 * plus the configured compose file, or one of the names compose looks for
 */
export function isJenkinsProject(
  dir: string,
  dockerfile = "Dockerfile",
  composeFile: string | null = null
): boolean {
  const composeFiles = composeFile
    ? [composeFile]
    : ["compose.yaml", "compose.yml", "docker-compose.yaml", "docker-compose.yml"];

  return (
    fs.existsSync(path.join(dir, dockerfile)) &&
    composeFiles.some((file) => fs.existsSync(path.join(dir, file)))
  );
}

/**
 * Read package.json version
 */
export function getCliVersion(): string {
  const packagePath = path.join(__dirname, "../package.json");
  const packageJson: { version?: string } = fs.readJsonSync(packagePath);
  return packageJson.version ?? "0.0.0";
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Poll a condition until it holds or the attempt budget is spent.
 *
 * Makes exactly `policy.maxAttempts` checks at most, sleeping
 * `policy.intervalMs` between consecutive checks (not after the last one).
 * A condition that throws counts as a failed attempt.
 */
export async function pollUntil(
  condition: () => Promise<boolean>,
  policy: RetryPolicy,
  options: {
    sleep?: (ms: number) => Promise<void>;
    onRetry?: (attempt: number, maxAttempts: number) => void;
  } = {}
): Promise<{ ok: boolean; attempts: number }> {
  const wait = options.sleep ?? sleep;

  for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
    const ok = await condition().catch(() => false);
    if (ok) {
      return { ok: true, attempts: attempt };
    }

    if (attempt < policy.maxAttempts) {
      options.onRetry?.(attempt, policy.maxAttempts);
      await wait(policy.intervalMs);
    }
  }

  return { ok: false, attempts: policy.maxAttempts };
}

/**
 * Local time as YYYYMMDD-HHMMSS, used to name backups
 */
export function formatTimestamp(date: Date = new Date()): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `-${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

/**
 * Print numbered shell commands for the operator to run by hand
 */
export function printCommands(title: string, commands: string[]): void {
  if (commands.length === 0) {
    return;
  }

  console.log(chalk.yellow(`\n${title}`));
  commands.forEach((command, index) => {
    console.log(chalk.gray(`  ${index + 1}.`), chalk.cyan(command));
  });
  console.log("");
}
