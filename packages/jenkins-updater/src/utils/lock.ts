/**
 * Update lock
 *
 * At most one update may run against a project. The lock is a file created
 * with O_EXCL holding the owner's PID and a timestamp; it is removed on every
 * way out of the locked section, including SIGINT and SIGTERM.
 */

import fs from 'fs-extra';
import { LockError } from '../errors.js';

function isProcessAlive(pid: number): boolean {
  try {
    // Signal 0 only checks existence
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: exists but owned by someone else
    return error instanceof Error && 'code' in error && error.code === 'EPERM';
  }
}

/**
 * Remove a lock whose owner process is gone. Returns true if removed.
 */
async function removeStaleLock(lockPath: string): Promise<boolean> {
  let content: string;
  try {
    content = await fs.readFile(lockPath, 'utf-8');
  } catch {
    // Vanished between EEXIST and the read; caller retries
    return true;
  }

  const pid = parseInt(content.split('\n')[0], 10);
  if (Number.isInteger(pid) && pid > 0 && isProcessAlive(pid)) {
    return false;
  }

  await fs.remove(lockPath);
  return true;
}

async function acquire(lockPath: string): Promise<void> {
  for (let attempt = 0; attempt < 2; attempt++) {
    try {
      await fs.writeFile(lockPath, `${process.pid}\n${Date.now()}\n`, { flag: 'wx' });
      return;
    } catch (error) {
      if (!(error instanceof Error && 'code' in error && error.code === 'EEXIST')) {
        throw error;
      }
      if (!(await removeStaleLock(lockPath))) {
        break;
      }
    }
  }

  const owner = (await fs.readFile(lockPath, 'utf-8').catch(() => '')).split('\n')[0];
  throw new LockError(`Another update is already running${owner ? ` (pid ${owner})` : ''}`, {
    remediation: [`rm ${lockPath}   # only if no update is running`],
  });
}

/**
 * Run `fn` while holding the lock at `lockPath`
 */
export async function withUpdateLock<T>(lockPath: string, fn: () => Promise<T>): Promise<T> {
  await acquire(lockPath);

  const releaseSync = () => {
    if (!fs.existsSync(lockPath)) {
      return;
    }
    try {
      const owner = fs.readFileSync(lockPath, 'utf-8').split('\n')[0];
      if (owner === String(process.pid)) {
        fs.removeSync(lockPath);
      }
    } catch (error) {
      console.error(`Failed to release update lock ${lockPath}: ${String(error)}`);
    }
  };

  const onSignal = (signal: NodeJS.Signals) => {
    releaseSync();
    process.exit(signal === 'SIGINT' ? 130 : 143);
  };

  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  try {
    return await fn();
  } finally {
    process.removeListener('SIGINT', onSignal);
    process.removeListener('SIGTERM', onSignal);
    releaseSync();
  }
}
