/**
 * update command - Move the Jenkins controller to the latest LTS release
 *
 * Validates the project directory, loads configuration, takes the update lock
 * and hands over to the UpdateOrchestrator. Sets process.exitCode from the
 * outcome so the lock is released before the process ends.
 */

import path from 'path';
import fs from 'fs-extra';
import chalk from 'chalk';
import { execAsync, isJenkinsProject, sleep, type CommandRunner } from '../utils.js';
import { dataBackupOverride, loadConfig, parseNumberOption } from '../utils/config.js';
import { withUpdateLock } from '../utils/lock.js';
import { ComposeRuntime } from '../utils/compose.js';
import { BackupManager } from '../utils/backup.js';
import { JenkinsHealthProbe } from '../utils/health.js';
import { DockerfileVersionStore } from '../utils/version-store.js';
import { PinnedVersionSource, createVersionSource } from '../utils/version-source.js';
import { UpdateOrchestrator } from './update-orchestrator.js';
import type { UpdateOptions, UpdateOutcome } from '../types.js';

export interface CommandEnvironment {
  run?: CommandRunner;
  sleep?: (ms: number) => Promise<void>;
}

export async function update(
  directory: string,
  options: UpdateOptions,
  env: CommandEnvironment = {}
): Promise<UpdateOutcome | undefined> {
  const dir = path.resolve(process.cwd(), directory);

  const config = await loadConfig(dir, {
    maxAttempts: parseNumberOption(options.maxAttempts, '--max-attempts', { integer: true, min: 1 }),
    intervalSeconds: parseNumberOption(options.interval, '--interval'),
    startupDelaySeconds: parseNumberOption(options.startupDelay, '--startup-delay'),
    dataBackup: dataBackupOverride(options),
  });

  if (!isJenkinsProject(dir, config.dockerfile, config.composeFile)) {
    console.error(chalk.red('\n❌ Error: Not a Jenkins controller project'));
    console.log(
      chalk.gray('   Expected'),
      chalk.cyan(config.dockerfile),
      chalk.gray('and a compose file in'),
      chalk.cyan(dir)
    );
    process.exitCode = 1;
    return undefined;
  }

  const run = env.run ?? execAsync;
  const backups = new BackupManager({
    projectDir: dir,
    dataVolume: config.dataVolume,
    backupVolume: config.backupVolume,
    helperImage: config.helperImage,
    run,
  });

  const pluginsPath = path.join(dir, config.pluginsFile);
  const extraBackupFiles = (await fs.pathExists(pluginsPath))
    ? [{ source: pluginsPath, name: path.basename(pluginsPath) }]
    : [];

  const orchestrator = new UpdateOrchestrator(
    {
      source: options.target
        ? new PinnedVersionSource(options.target)
        : createVersionSource(config.versionSource, config.requestTimeoutMs),
      store: new DockerfileVersionStore(dir, config.dockerfile, config.image),
      runtime: new ComposeRuntime({
        projectDir: dir,
        service: config.service,
        composeFile: config.composeFile,
        run,
      }),
      backups,
      probe: new JenkinsHealthProbe({
        jenkinsUrl: config.jenkinsUrl,
        healthPath: config.healthPath,
        timeout: config.requestTimeoutMs,
      }),
      sleep: env.sleep ?? sleep,
    },
    {
      health: {
        maxAttempts: config.health.maxAttempts,
        intervalMs: config.health.intervalSeconds * 1000,
      },
      startupDelayMs: config.health.startupDelaySeconds * 1000,
      dataBackup: config.backup.dataVolume,
      extraBackupFiles,
      composeFile: config.composeFile,
      dryRun: options.dryRun,
    }
  );

  const outcome = await withUpdateLock(path.join(dir, config.lockFile), () => orchestrator.run());
  process.exitCode = outcome.exitCode;
  return outcome;
}
