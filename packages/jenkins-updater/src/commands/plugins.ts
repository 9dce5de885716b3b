/**
 * plugins command - Reinstall every plugin in plugins.txt at its latest version
 *
 * The image installs plugins from plugins.txt at build time, so a no-cache
 * rebuild picks up the newest release of each. There is no automatic
 * rollback: rebuilding from the old plugins.txt would fetch the same latest
 * versions again, so a failed run prints the manual steps instead.
 *
 * While Jenkins is up, the update center decides whether a rebuild is needed
 * at all, and is asked again afterwards for anything still outdated.
 */

import path from 'path';
import fs from 'fs-extra';
import chalk from 'chalk';
import prompts from 'prompts';
import { EXIT, errorMessage } from '../errors.js';
import { execAsync, isJenkinsProject, printCommands, sleep } from '../utils.js';
import { dataBackupOverride, loadConfig } from '../utils/config.js';
import { withUpdateLock } from '../utils/lock.js';
import { ComposeRuntime, composeCommand, type ServiceRuntime } from '../utils/compose.js';
import { BackupManager } from '../utils/backup.js';
import { JenkinsHealthProbe, waitForHealthy } from '../utils/health.js';
import type { CommandEnvironment } from './update.js';
import type { DataBackupPolicy, PluginUpdate, PluginsOptions, UpdaterConfig } from '../types.js';

export interface PluginRebuildDeps {
  runtime: ServiceRuntime;
  backups: BackupManager;
  probe: JenkinsHealthProbe;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Plugin ids listed in plugins.txt, skipping blanks and comments
 */
export function parsePluginsFile(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.replace(/#.*$/, '').trim())
    .filter(Boolean);
}

export async function rebuildPlugins(
  projectDir: string,
  config: UpdaterConfig,
  options: { yes?: boolean; force?: boolean; dataBackup: DataBackupPolicy },
  deps: PluginRebuildDeps
): Promise<number> {
  const { runtime, backups, probe } = deps;
  const pluginsPath = path.join(projectDir, config.pluginsFile);

  console.log(chalk.blue.bold('\n🔧 Jenkins Plugin Update (Rebuild Method)\n'));

  if (!(await fs.pathExists(pluginsPath))) {
    console.error(chalk.red(`❌ ${config.pluginsFile} not found`));
    return EXIT.FAILURE;
  }

  const plugins = parsePluginsFile(await fs.readFile(pluginsPath, 'utf-8'));
  console.log(chalk.blue(`📋 Current plugins in ${config.pluginsFile}:`));
  plugins.forEach((plugin) => console.log(chalk.gray(`   • ${plugin}`)));
  console.log('');

  const running = await runtime.isRunning().catch(() => false);

  if (running) {
    console.log(chalk.blue('🔍 Checking for plugin updates...'));
    const updates = await probe.fetchAvailableUpdates();

    if (updates === null) {
      console.log(chalk.yellow('⚠️  Could not fetch update information; rebuilding all plugins'));
    } else if (updates.length === 0 && !options.force) {
      console.log(chalk.green('✅ No plugin updates available'));
      return EXIT.SUCCESS;
    } else if (updates.length > 0) {
      console.log(chalk.yellow('📦 Available updates:'));
      printUpdates(updates);
    }
    console.log('');
  }

  if (!options.yes) {
    const { proceed } = await prompts({
      type: 'confirm',
      name: 'proceed',
      message: 'Update all plugins to latest versions?',
      initial: false,
    });

    if (!proceed) {
      console.log(chalk.yellow('📋 Update cancelled'));
      return EXIT.SUCCESS;
    }
  }

  // Archive the data volume only while Jenkins is up; a stopped controller
  // may never have been initialised.
  console.log(chalk.blue('💾 Creating backup...'));
  const backup = await backups.create({
    prefix: 'plugin-backup',
    archivePrefix: 'jenkins-plugins-backup',
    policy: running ? options.dataBackup : 'skip',
    files: [{ source: pluginsPath, name: `${path.basename(pluginsPath)}.backup` }],
  });

  if (backup.volumeArchive) {
    console.log(chalk.green(`✅ Data backup created: ${backup.volumeArchive}`));
  }
  backup.warnings.forEach((warning) => console.log(chalk.yellow(`⚠️  ${warning}`)));
  console.log(chalk.green(`✅ ${config.pluginsFile} backed up to ${path.basename(backup.directory)}/`));

  const backupCopy = path.join(backup.directory, `${path.basename(pluginsPath)}.backup`);
  const rollbackSteps = [
    composeCommand(config.composeFile, 'down'),
    `cp ${backupCopy} ${pluginsPath}`,
    ...(backup.volumeArchive ? backups.restoreCommands(backup.volumeArchive) : []),
    composeCommand(config.composeFile, 'build', '--no-cache'),
    composeCommand(config.composeFile, 'up', '-d'),
  ];

  try {
    console.log(chalk.blue('⏸️  Stopping Jenkins...'));
    await runtime.stop();

    console.log(chalk.blue('🔨 Rebuilding Jenkins with latest plugin versions...'));
    console.log(chalk.yellow(`   This will install the latest version of all plugins in ${config.pluginsFile}`));
    await runtime.build({ noCache: true });

    console.log(chalk.blue('🚀 Starting Jenkins with updated plugins...'));
    await runtime.start();
  } catch (error) {
    console.error(chalk.red(`❌ Plugin rebuild failed: ${errorMessage(error)}`));
    printCommands('🔄 To rollback:', rollbackSteps);
    return EXIT.FAILURE;
  }

  const health = await waitForHealthy(probe, {
    policy: {
      maxAttempts: config.health.maxAttempts,
      intervalMs: config.health.intervalSeconds * 1000,
    },
    startupDelayMs: config.plugins.startupDelaySeconds * 1000,
    sleep: deps.sleep ?? sleep,
  });

  if (!health.healthy) {
    console.error(chalk.red('❌ Jenkins failed to start properly after plugin update'));
    printCommands('🔄 To rollback:', rollbackSteps);
    return EXIT.FAILURE;
  }

  const version = (await probe.fetchVersion()) ?? 'unknown';
  const pluginCount = await probe.fetchPluginCount();

  console.log(chalk.green('🎉 Jenkins updated successfully!'));
  reportRemainingUpdates(await probe.fetchAvailableUpdates());
  console.log(chalk.gray(`   • Jenkins version: ${version}`));
  console.log(chalk.gray(`   • Installed plugins: ${pluginCount ?? 'unknown'}`));
  console.log(chalk.gray(`   • URL: ${config.jenkinsUrl}`));
  console.log(chalk.yellow('\n💡 Next steps:'));
  console.log(chalk.gray('   1. Login to Jenkins and verify all jobs work correctly'));
  console.log(chalk.gray('   2. Check that no security warnings remain in Jenkins UI'));
  console.log(chalk.gray(`   3. If issues occur, you can restore from backup in ${path.basename(backup.directory)}/\n`));

  return EXIT.SUCCESS;
}

function printUpdates(updates: PluginUpdate[]): void {
  updates.forEach(({ name, version }) => console.log(chalk.gray(`   • ${name} → ${version}`)));
}

function reportRemainingUpdates(updates: PluginUpdate[] | null): void {
  if (updates === null) {
    console.log(chalk.yellow('⚠️  Could not verify plugin updates'));
  } else if (updates.length === 0) {
    console.log(chalk.green('✅ All plugin updates completed'));
  } else {
    console.log(chalk.yellow(`⚠️  ${updates.length} plugin(s) still need updates:`));
    printUpdates(updates);
  }
}

function credentialsFromEnv(): { user: string; token: string } | undefined {
  const user = process.env.JENKINS_USER;
  const token = process.env.JENKINS_API_TOKEN;
  return user && token ? { user, token } : undefined;
}

export async function plugins(
  directory: string,
  options: PluginsOptions,
  env: CommandEnvironment = {}
): Promise<void> {
  const dir = path.resolve(process.cwd(), directory);
  const config = await loadConfig(dir, { dataBackup: dataBackupOverride(options) });

  if (!isJenkinsProject(dir, config.dockerfile, config.composeFile)) {
    console.error(chalk.red('\n❌ Error: Not a Jenkins controller project'));
    process.exitCode = 1;
    return;
  }

  const run = env.run ?? execAsync;
  const deps: PluginRebuildDeps = {
    runtime: new ComposeRuntime({
      projectDir: dir,
      service: config.service,
      composeFile: config.composeFile,
      run,
    }),
    backups: new BackupManager({
      projectDir: dir,
      dataVolume: config.dataVolume,
      backupVolume: config.backupVolume,
      helperImage: config.helperImage,
      run,
    }),
    probe: new JenkinsHealthProbe({
      jenkinsUrl: config.jenkinsUrl,
      healthPath: config.healthPath,
      timeout: config.requestTimeoutMs,
      credentials: credentialsFromEnv(),
    }),
    sleep: env.sleep,
  };

  process.exitCode = await withUpdateLock(path.join(dir, config.lockFile), () =>
    rebuildPlugins(dir, config, { yes: options.yes, force: options.force, dataBackup: config.backup.dataVolume }, deps)
  );
}
