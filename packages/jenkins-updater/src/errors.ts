/**
 * Error types raised by the updater.
 *
 * Each error can carry the shell commands an operator should run to recover,
 * which the CLI prints instead of a stack trace.
 */

export const EXIT = {
  SUCCESS: 0,
  FAILURE: 1,
} as const;

export class UpdaterError extends Error {
  readonly remediation: string[];

  constructor(message: string, options: { cause?: unknown; remediation?: string[] } = {}) {
    super(message, { cause: options.cause });
    this.name = new.target.name;
    this.remediation = options.remediation ?? [];
  }
}

/** jenkins-updater.json failed schema validation */
export class ConfigError extends UpdaterError {}

/** Target version could not be fetched, or was not MAJOR.MINOR.PATCH */
export class FetchError extends UpdaterError {}

/** Data volume archive failed while the backup policy requires it */
export class BackupError extends UpdaterError {}

/** Rewriting the Dockerfile or rebuilding the image failed */
export class ApplyError extends UpdaterError {}

export class HealthCheckTimeout extends UpdaterError {
  constructor(readonly attempts: number, url: string) {
    super(`${url} did not become healthy after ${attempts} attempts`);
  }
}

/** Restoring the previous Dockerfile or restarting on it failed */
export class RollbackError extends UpdaterError {}

/** Another update run holds the lock */
export class LockError extends UpdaterError {}

/**
 * Message of an unknown thrown value, for status lines.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * stderr captured by execa on a failed child process, if any.
 */
export function errorStderr(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'stderr' in error) {
    const { stderr } = error;
    if (typeof stderr === 'string' && stderr.trim()) {
      return stderr;
    }
  }
  return undefined;
}
