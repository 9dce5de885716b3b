/**
 * Jenkins LTS update flow
 *
 * FETCH_TARGET → COMPARE → BACKUP → APPLY → RESTART → HEALTH_CHECK, then
 * either CLEANUP (healthy) or a single ROLLBACK (unhealthy). Nothing is
 * mutated before the target version has been fetched and validated, and the
 * run never ends with an update applied but unverified.
 */

import path from 'path';
import chalk from 'chalk';
import {
  ApplyError,
  EXIT,
  HealthCheckTimeout,
  RollbackError,
  errorMessage,
} from '../errors.js';
import { printCommands, sleep as defaultSleep } from '../utils.js';
import { composeCommand, type ServiceRuntime } from '../utils/compose.js';
import { needsUpdate, type VersionSource } from '../utils/version-source.js';
import { waitForHealthy, type HealthProbe } from '../utils/health.js';
import type { VersionStore } from '../utils/version-store.js';
import type { BackupFile, BackupManager } from '../utils/backup.js';
import type {
  BackupHandle,
  DataBackupPolicy,
  HealthStatus,
  RetryPolicy,
  UpdateOutcome,
} from '../types.js';

export interface UpdateOrchestratorDeps {
  source: VersionSource;
  store: VersionStore;
  runtime: ServiceRuntime;
  backups: BackupManager;
  probe: HealthProbe;
  sleep?: (ms: number) => Promise<void>;
}

export interface UpdateOrchestratorSettings {
  health: RetryPolicy;
  startupDelayMs: number;
  dataBackup: DataBackupPolicy;
  /** Copied into the backup directory alongside the Dockerfile */
  extraBackupFiles?: BackupFile[];
  composeFile: string | null;
  dryRun?: boolean;
}

export class UpdateOrchestrator {
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly deps: UpdateOrchestratorDeps,
    private readonly settings: UpdateOrchestratorSettings
  ) {
    this.sleep = deps.sleep ?? defaultSleep;
  }

  async run(): Promise<UpdateOutcome> {
    const { source, store } = this.deps;

    console.log(chalk.blue.bold('\n🚀 Jenkins LTS Update\n'));

    // FETCH_TARGET
    console.log(chalk.gray(`📡 Fetching latest Jenkins LTS version from ${source.description}...`));
    let targetVersion: string;
    try {
      targetVersion = await source.fetchLatest();
    } catch (error) {
      console.error(chalk.red(`❌ Failed to fetch latest LTS version: ${errorMessage(error)}`));
      return this.abort(error);
    }
    console.log(chalk.gray(`📦 Latest LTS version: ${targetVersion}`));

    // COMPARE
    let currentVersion: string;
    try {
      currentVersion = await store.readCurrentVersion();
    } catch (error) {
      console.error(chalk.red(`❌ Could not determine current version: ${errorMessage(error)}`));
      return this.abort(error);
    }
    console.log(chalk.gray(`📋 Current version: ${currentVersion}`));

    if (!needsUpdate(currentVersion, targetVersion)) {
      console.log(chalk.green(`\n✅ Already running latest LTS version: ${targetVersion}\n`));
      return { state: 'up-to-date', exitCode: EXIT.SUCCESS, currentVersion, targetVersion };
    }

    if (this.settings.dryRun) {
      this.printPlan(currentVersion, targetVersion);
      return { state: 'planned', exitCode: EXIT.SUCCESS, currentVersion, targetVersion };
    }

    // BACKUP
    let backup: BackupHandle;
    try {
      backup = await this.backup();
    } catch (error) {
      console.error(chalk.red(`❌ Backup failed: ${errorMessage(error)}`));
      await this.startAfterAbortedBackup();
      return { ...this.abort(error), currentVersion, targetVersion };
    }

    // APPLY + RESTART; a failure here goes straight to the health verdict
    const failure = await this.applyAndRestart(targetVersion);

    // HEALTH_CHECK
    const health = await this.healthCheck(failure);

    if (health.healthy) {
      await this.cleanup();
      await this.printSuccess(currentVersion, backup);
      return { state: 'updated', exitCode: EXIT.SUCCESS, currentVersion, targetVersion, backup };
    }

    const error = failure ?? new HealthCheckTimeout(health.attempts, this.deps.probe.url);
    console.error(chalk.red('\n❌ Jenkins failed to start properly after update'));

    // ROLLBACK
    const rollbackError = await this.rollback(backup);
    if (rollbackError) {
      return {
        state: 'rollback-failed',
        exitCode: EXIT.FAILURE,
        currentVersion,
        targetVersion,
        backup,
        error: rollbackError,
      };
    }

    console.log(chalk.yellow(`\n⚠️  Rolled back to ${currentVersion}. Please check the logs and try again.\n`));
    return { state: 'rolled-back', exitCode: EXIT.FAILURE, currentVersion, targetVersion, backup, error };
  }

  private abort(error: unknown): UpdateOutcome {
    return {
      state: 'aborted',
      exitCode: EXIT.FAILURE,
      error: error instanceof Error ? error : new Error(String(error)),
    };
  }

  private printPlan(currentVersion: string, targetVersion: string): void {
    console.log(chalk.blue('\n📋 Update Plan:\n'));
    console.log(chalk.gray(`   Current version: ${currentVersion}`));
    console.log(chalk.gray(`   Target version:  ${targetVersion}`));
    console.log(chalk.gray(`   Data backup:     ${this.settings.dataBackup}`));
    console.log('');
    console.log(chalk.gray('   Steps:'));
    console.log(chalk.gray('   1. Stop Jenkins and back up configuration and data'));
    console.log(chalk.gray(`   2. Pin ${path.basename(this.deps.store.path)} to ${targetVersion}`));
    console.log(chalk.gray('   3. Rebuild the image without cache'));
    console.log(chalk.gray('   4. Start Jenkins'));
    console.log(
      chalk.gray(
        `   5. Health check (${this.settings.health.maxAttempts} attempts, ${
          this.settings.health.intervalMs / 1000
        }s apart), rolling back on failure`
      )
    );
    console.log(chalk.blue('\n🔍 Dry run complete - no changes made\n'));
  }

  private async backup(): Promise<BackupHandle> {
    const { runtime, backups, store } = this.deps;

    console.log(chalk.gray('💾 Creating backup...'));
    console.log(chalk.gray('⏸️  Stopping Jenkins...'));
    await runtime.stop();

    const handle = await backups.create({
      prefix: 'backup',
      archivePrefix: 'jenkins-backup',
      policy: this.settings.dataBackup,
      files: [
        { source: store.path, name: path.basename(store.path) },
        ...(this.settings.extraBackupFiles ?? []),
      ],
    });

    console.log(chalk.green(`✅ Configuration backed up to ${path.basename(handle.directory)}/`));
    if (handle.volumeArchive) {
      console.log(chalk.green(`✅ Data backup created: ${handle.volumeArchive}`));
    }
    handle.warnings.forEach((warning) => console.log(chalk.yellow(`⚠️  ${warning}`)));

    return handle;
  }

  /**
   * A required data backup failed after the service was stopped; bring it
   * back on the untouched configuration.
   */
  private async startAfterAbortedBackup(): Promise<void> {
    console.log(chalk.gray('🚀 Starting Jenkins again on the unchanged configuration...'));
    try {
      await this.deps.runtime.start();
    } catch (error) {
      console.error(chalk.red(`❌ Could not restart Jenkins: ${errorMessage(error)}`));
      printCommands('To start it by hand:', [composeCommand(this.settings.composeFile, 'up', '-d')]);
    }
  }

  private async applyAndRestart(targetVersion: string): Promise<ApplyError | undefined> {
    const { store, runtime } = this.deps;
    const dockerfile = path.basename(store.path);

    console.log(chalk.gray(`📝 Updating ${dockerfile} to version ${targetVersion}...`));
    try {
      await store.writeVersion(targetVersion);
    } catch (error) {
      return this.applyFailed(`Could not update ${dockerfile}`, error);
    }

    console.log(chalk.gray('🔨 Rebuilding Docker image...'));
    try {
      await runtime.build({ noCache: true });
    } catch (error) {
      return this.applyFailed('Image rebuild failed', error);
    }

    console.log(chalk.gray('🚀 Starting Jenkins with new version...'));
    try {
      await runtime.stop();
      await runtime.start();
    } catch (error) {
      return this.applyFailed('Restart failed', error);
    }

    return undefined;
  }

  private applyFailed(message: string, cause: unknown): ApplyError {
    const error = new ApplyError(`${message}: ${errorMessage(cause)}`, { cause });
    console.error(chalk.red(`❌ ${error.message}`));
    return error;
  }

  private async healthCheck(failure: ApplyError | undefined): Promise<HealthStatus> {
    if (failure) {
      // Polling cannot turn a failed build or restart into a healthy service
      return { healthy: false, attempts: 0 };
    }

    console.log(chalk.gray('🔍 Performing health check...'));
    return waitForHealthy(this.deps.probe, {
      policy: this.settings.health,
      startupDelayMs: this.settings.startupDelayMs,
      sleep: this.sleep,
    });
  }

  private async cleanup(): Promise<void> {
    try {
      await this.deps.store.discardPrevious();
      console.log(chalk.gray('🧹 Cleanup completed'));
    } catch (error) {
      console.log(chalk.yellow(`⚠️  Could not remove rollback copy: ${errorMessage(error)}`));
    }
  }

  /**
   * Restore the pre-update Dockerfile, rebuild and restart. Runs once; the
   * restored service is not health-checked again.
   */
  private async rollback(backup: BackupHandle): Promise<RollbackError | undefined> {
    const { store, runtime } = this.deps;

    console.log(chalk.yellow('🔄 Rolling back to previous version...'));
    try {
      await store.restorePrevious();
      await runtime.build({ noCache: true });
      await runtime.stop();
      await runtime.start();
      return undefined;
    } catch (error) {
      const rollbackError = new RollbackError(`Rollback failed: ${errorMessage(error)}`, {
        cause: error,
        remediation: this.manualRecovery(backup),
      });
      console.error(chalk.red(`\n❌ ${rollbackError.message}`));
      printCommands('Recover manually:', rollbackError.remediation);
      return rollbackError;
    }
  }

  private manualRecovery(backup: BackupHandle): string[] {
    const { composeFile } = this.settings;
    const dockerfile = path.basename(this.deps.store.path);

    return [
      composeCommand(composeFile, 'down'),
      `cp ${path.join(backup.directory, dockerfile)} ${this.deps.store.path}`,
      ...(backup.volumeArchive ? this.deps.backups.restoreCommands(backup.volumeArchive) : []),
      composeCommand(composeFile, 'build', '--no-cache'),
      composeCommand(composeFile, 'up', '-d'),
    ];
  }

  private async printSuccess(previous: string, backup: BackupHandle): Promise<void> {
    const version = (await this.deps.probe.fetchVersion()) ?? 'unknown';

    console.log(chalk.green(`\n🎉 Successfully updated to Jenkins version: ${version}\n`));
    console.log(chalk.blue('🎯 Update Summary:'));
    console.log(chalk.gray(`   Previous: ${previous}`));
    console.log(chalk.gray(`   Current:  ${version}`));
    console.log(chalk.gray(`   Health:   ${this.deps.probe.url}`));
    console.log(chalk.gray(`   Backup:   ${backup.directory}`));

    if (backup.volumeArchive) {
      printCommands('💡 If you encounter issues, restore data from backup:', [
        composeCommand(this.settings.composeFile, 'down'),
        ...this.deps.backups.restoreCommands(backup.volumeArchive),
      ]);
    } else {
      console.log('');
    }
  }
}

