/**
 * doctor command - Run diagnostics
 */

import path from 'path';
import fs from 'fs-extra';
import chalk from 'chalk';
import { checkPrerequisites, getCliVersion, isJenkinsProject } from '../utils.js';
import { CONFIG_FILE, loadConfig } from '../utils/config.js';
import { DockerfileVersionStore } from '../utils/version-store.js';
import { errorMessage } from '../errors.js';
import type { CommandEnvironment } from './update.js';

export async function doctor(directory: string, env: CommandEnvironment = {}): Promise<void> {
  const dir = path.resolve(process.cwd(), directory);

  console.log(chalk.blue.bold('\n🩺 Jenkins Updater Diagnostics\n'));

  console.log(chalk.cyan('CLI Version:'), getCliVersion());

  // Prerequisites
  console.log(chalk.cyan('\n📋 Prerequisites:'));
  const prereqs = await checkPrerequisites(env.run);

  console.log(
    chalk.gray('  Node.js:'),
    prereqs.node.satisfies
      ? chalk.green(`✓ v${prereqs.node.version}`)
      : chalk.yellow(`⚠️  v${prereqs.node.version} (need v20+)`)
  );

  console.log(
    chalk.gray('  Docker:'),
    prereqs.docker.installed
      ? chalk.green(`✓ v${prereqs.docker.version ?? 'unknown'}`)
      : chalk.red('✗ Not installed')
  );

  if (prereqs.docker.composeVersion) {
    console.log(chalk.gray('  Docker Compose:'), chalk.green(`✓ v${prereqs.docker.composeVersion}`));
  } else if (prereqs.docker.installed) {
    console.log(chalk.gray('  Docker Compose:'), chalk.red('✗ Not available'));
  }

  console.log(chalk.gray('  Platform:'), prereqs.platform.name);

  // Project
  console.log(chalk.cyan('\n📂 Project:'));
  console.log(chalk.gray('  Directory:'), dir);

  const recommendations: string[] = [];
  let projectOk = false;

  try {
    const config = await loadConfig(dir);
    console.log(
      chalk.gray(`  ${CONFIG_FILE}:`),
      fs.existsSync(path.join(dir, CONFIG_FILE)) ? chalk.green('✓ Valid') : chalk.gray('– Using defaults')
    );

    projectOk = isJenkinsProject(dir, config.dockerfile, config.composeFile);
    console.log(
      chalk.gray('  Jenkins project:'),
      projectOk ? chalk.green('✓ Yes') : chalk.yellow('✗ No')
    );

    if (projectOk) {
      const store = new DockerfileVersionStore(dir, config.dockerfile, config.image);
      const pinned = await store.readCurrentVersion().catch((error: unknown) => {
        recommendations.push(errorMessage(error));
        return null;
      });
      console.log(
        chalk.gray('  Pinned image:'),
        pinned ? chalk.green(`✓ ${config.image}:${pinned}`) : chalk.red('✗ Not found')
      );

      const hasPlugins = fs.existsSync(path.join(dir, config.pluginsFile));
      console.log(
        chalk.gray(`  ${config.pluginsFile}:`),
        hasPlugins ? chalk.green('✓') : chalk.yellow('✗ Missing')
      );

      if (fs.existsSync(path.join(dir, config.lockFile))) {
        console.log(chalk.gray('  Update lock:'), chalk.yellow(`⚠️  ${config.lockFile} present`));
        recommendations.push(`Remove ${config.lockFile} if no update is running`);
      }
    }

    console.log(chalk.cyan('\n⚙️  Configuration:'));
    console.log(chalk.gray('  Jenkins URL:'), config.jenkinsUrl + config.healthPath);
    console.log(chalk.gray('  Version source:'), config.versionSource.type);
    console.log(
      chalk.gray('  Health check:'),
      `${config.health.maxAttempts} × ${config.health.intervalSeconds}s after ${config.health.startupDelaySeconds}s`
    );
    console.log(chalk.gray('  Data backup:'), `${config.dataVolume} → ${config.backupVolume} (${config.backup.dataVolume})`);
  } catch (error) {
    console.log(chalk.gray(`  ${CONFIG_FILE}:`), chalk.red(`✗ ${errorMessage(error)}`));
    recommendations.push(`Fix ${CONFIG_FILE}`);
  }

  // Recommendations
  console.log(chalk.cyan('\n💡 Recommendations:'));

  if (!prereqs.node.satisfies) {
    recommendations.push('Upgrade Node.js to v20 or higher');
  }

  if (!prereqs.docker.installed) {
    recommendations.push('Install Docker: https://docs.docker.com/get-docker/');
  } else if (!prereqs.docker.composeVersion) {
    recommendations.push('Update Docker to get Compose v2');
  }

  if (!projectOk) {
    recommendations.push('Run from a directory containing the Jenkins Dockerfile and compose file');
  }

  if (recommendations.length === 0) {
    console.log(chalk.green('  ✓ Everything looks good!'));
  } else {
    recommendations.forEach((rec) => console.log(chalk.yellow('  •'), rec));
  }

  console.log();
}
