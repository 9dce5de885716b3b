/**
 * Version store
 *
 * Owns the Dockerfile that pins the deployed Jenkins image. Callers read and
 * change the pinned version only through this interface, never through paths.
 */

import fs from 'fs-extra';
import path from 'path';

export interface VersionStore {
  /** Absolute path of the artifact, for backups and messages */
  readonly path: string;
  /** Tag on the image line; `latest` when untagged */
  readCurrentVersion(): Promise<string>;
  /** Keep the current artifact as a rollback sibling, then pin `version` */
  writeVersion(version: string): Promise<void>;
  /** Move the rollback sibling back over the artifact */
  restorePrevious(): Promise<void>;
  /** Remove the rollback sibling if present */
  discardPrevious(): Promise<void>;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export class DockerfileVersionStore implements VersionStore {
  readonly path: string;
  readonly previousPath: string;
  private readonly imageLine: RegExp;

  constructor(
    projectDir: string,
    dockerfile: string,
    private readonly image: string
  ) {
    this.path = path.resolve(projectDir, dockerfile);
    this.previousPath = `${this.path}.bak`;
    // FROM jenkins/jenkins:2.516.2 [AS name]
    this.imageLine = new RegExp(
      `^FROM[ \\t]+${escapeRegExp(image)}(?::([^\\s]+))?(?=[ \\t]|$).*$`,
      'm'
    );
  }

  async readCurrentVersion(): Promise<string> {
    const content = await fs.readFile(this.path, 'utf-8');
    const match = content.match(this.imageLine);

    if (!match) {
      throw new Error(`No "FROM ${this.image}" line found in ${path.basename(this.path)}`);
    }

    return (match[1] ?? 'latest').trim();
  }

  async writeVersion(version: string): Promise<void> {
    const content = await fs.readFile(this.path, 'utf-8');
    const match = content.match(this.imageLine);

    if (!match) {
      throw new Error(`No "FROM ${this.image}" line found in ${path.basename(this.path)}`);
    }

    await fs.copy(this.path, this.previousPath, { overwrite: true });

    // Only the first image line; a trailing "AS <stage>" survives
    const stage = match[0].match(/[ \t]+AS[ \t]+\S+\s*$/i)?.[0] ?? '';
    const updated = content.replace(this.imageLine, `FROM ${this.image}:${version}${stage}`);

    await fs.writeFile(this.path, updated, 'utf-8');
  }

  async restorePrevious(): Promise<void> {
    if (!(await fs.pathExists(this.previousPath))) {
      throw new Error(`Rollback copy ${path.basename(this.previousPath)} is missing`);
    }

    await fs.move(this.previousPath, this.path, { overwrite: true });
  }

  async discardPrevious(): Promise<void> {
    await fs.remove(this.previousPath);
  }
}
