/**
 * Backups taken before a destructive step.
 *
 * Two independent parts: a timestamped directory in the project holding copies
 * of the configuration files, and a tar archive of the Jenkins data volume
 * written into a separate named volume by a throwaway container.
 */

import fs from 'fs-extra';
import path from 'path';
import { BackupError } from '../errors.js';
import { execAsync, formatTimestamp, type CommandRunner } from '../utils.js';
import type { BackupHandle, DataBackupPolicy } from '../types.js';

export interface BackupFile {
  /** Absolute source path */
  source: string;
  /** File name inside the backup directory */
  name: string;
}

export interface BackupRequest {
  /** Directory name prefix, e.g. "backup" or "plugin-backup" */
  prefix: string;
  files: BackupFile[];
  /** Archive name prefix inside the backup volume */
  archivePrefix: string;
  policy: DataBackupPolicy;
}

export interface BackupManagerOptions {
  projectDir: string;
  dataVolume: string;
  backupVolume: string;
  helperImage: string;
  run?: CommandRunner;
  now?: () => Date;
}

export class BackupManager {
  private readonly run: CommandRunner;
  private readonly now: () => Date;

  constructor(private readonly options: BackupManagerOptions) {
    this.run = options.run ?? execAsync;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Copy the files, then archive the data volume as the policy allows.
   *
   * With policy "warn" an archive failure is recorded on the handle; with
   * "required" it raises BackupError after the file copies are in place.
   */
  async create(request: BackupRequest): Promise<BackupHandle> {
    const id = formatTimestamp(this.now());
    const directory = path.join(this.options.projectDir, `${request.prefix}-${id}`);
    await fs.ensureDir(directory);

    const files: string[] = [];
    for (const file of request.files) {
      const destination = path.join(directory, file.name);
      await fs.copy(file.source, destination);
      files.push(destination);
    }

    const handle: BackupHandle = { id, directory, files, warnings: [] };

    if (request.policy === 'skip') {
      return handle;
    }

    const archive = `${request.archivePrefix}-${id}.tar.gz`;
    try {
      await this.archiveDataVolume(archive);
      handle.volumeArchive = archive;
    } catch (error) {
      const message = `Could not archive volume ${this.options.dataVolume}: ${
        error instanceof Error ? error.message : String(error)
      }`;

      if (request.policy === 'required') {
        throw new BackupError(message, { cause: error });
      }
      handle.warnings.push(message);
    }

    return handle;
  }

  /**
   * Commands that restore the data volume from an archive
   */
  restoreCommands(archive: string): string[] {
    const { dataVolume, backupVolume, helperImage } = this.options;
    return [
      `docker volume rm ${dataVolume}`,
      `docker volume create ${dataVolume}`,
      `docker run --rm -v ${backupVolume}:/backup -v ${dataVolume}:/restore ${helperImage} tar xzf /backup/${archive} -C /restore`,
    ];
  }

  private async archiveDataVolume(archive: string): Promise<void> {
    const { dataVolume, backupVolume, helperImage, projectDir } = this.options;

    await this.run('docker', ['volume', 'create', backupVolume], { cwd: projectDir });
    await this.run(
      'docker',
      [
        'run',
        '--rm',
        '-v',
        `${dataVolume}:/source:ro`,
        '-v',
        `${backupVolume}:/backup`,
        helperImage,
        'tar',
        'czf',
        `/backup/${archive}`,
        '-C',
        '/source',
        '.',
      ],
      { cwd: projectDir }
    );
  }
}
