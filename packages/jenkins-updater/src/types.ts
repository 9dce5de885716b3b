/**
 * Shared types for the Jenkins updater CLI
 */

/** What to do when the data volume cannot be archived */
export type DataBackupPolicy = 'warn' | 'required' | 'skip';

export type VersionSourceConfig =
  | {
      type: 'text';
      /** Plain-text endpoint returning a single MAJOR.MINOR.PATCH line */
      url: string;
    }
  | {
      type: 'github-releases';
      /** owner/name of the repository whose releases list the versions */
      repo: string;
      /** Substring a release tag must contain to be considered */
      tagFilter: string;
      /** Prefix stripped from the tag before validation */
      tagPrefix: string;
    };

export interface UpdaterConfig {
  dockerfile: string;
  /** Compose file passed with -f; null uses the compose default lookup */
  composeFile: string | null;
  /** Compose service running the controller */
  service: string;
  /** Image named on the Dockerfile FROM line */
  image: string;
  pluginsFile: string;
  jenkinsUrl: string;
  /** Liveness path polled after a restart */
  healthPath: string;
  dataVolume: string;
  backupVolume: string;
  /** Throwaway image used to tar the data volume */
  helperImage: string;
  lockFile: string;
  versionSource: VersionSourceConfig;
  health: {
    maxAttempts: number;
    intervalSeconds: number;
    startupDelaySeconds: number;
  };
  plugins: {
    startupDelaySeconds: number;
  };
  backup: {
    dataVolume: DataBackupPolicy;
  };
  requestTimeoutMs: number;
}

/** Deep-partial shape accepted from jenkins-updater.json */
type GitHubReleasesSourceConfig = Extract<VersionSourceConfig, { type: 'github-releases' }>;

/** versionSource as written in jenkins-updater.json; tag settings have defaults */
export type VersionSourceConfigFile =
  | Extract<VersionSourceConfig, { type: 'text' }>
  | (Omit<GitHubReleasesSourceConfig, 'tagFilter' | 'tagPrefix'> &
      Partial<Pick<GitHubReleasesSourceConfig, 'tagFilter' | 'tagPrefix'>>);

export type UpdaterConfigFile = Partial<
  Omit<UpdaterConfig, 'versionSource' | 'health' | 'plugins' | 'backup'>
> & {
  versionSource?: VersionSourceConfigFile;
  health?: Partial<UpdaterConfig['health']>;
  plugins?: Partial<UpdaterConfig['plugins']>;
  backup?: Partial<UpdaterConfig['backup']>;
};

export interface UpdateOptions {
  target?: string;
  dryRun?: boolean;
  maxAttempts?: string;
  interval?: string;
  startupDelay?: string;
  strictBackup?: boolean;
  skipDataBackup?: boolean;
}

export interface PluginsOptions {
  yes?: boolean;
  /** Rebuild even when the update center lists no updates */
  force?: boolean;
  strictBackup?: boolean;
  skipDataBackup?: boolean;
}

/** An entry of the update center's list of available plugin updates */
export interface PluginUpdate {
  name: string;
  version: string;
}

export interface Prerequisites {
  docker: {
    installed: boolean;
    version?: string;
    composeVersion?: string;
  };
  node: {
    installed: boolean;
    version?: string;
    satisfies: boolean;
  };
  platform: {
    name: string;
  };
}

/** Bounded retry budget for a poll loop */
export interface RetryPolicy {
  maxAttempts: number;
  intervalMs: number;
}

export interface HealthStatus {
  healthy: boolean;
  /** Number of probes made, at most the policy's maxAttempts */
  attempts: number;
}

export interface BackupHandle {
  /** Timestamp id, e.g. 20251019-142530 */
  id: string;
  /** Absolute path of the timestamped backup directory */
  directory: string;
  /** Absolute paths of the files copied into the directory */
  files: string[];
  /** Archive name inside the backup volume, when the data volume was archived */
  volumeArchive?: string;
  /** Non-fatal problems met while taking the backup */
  warnings: string[];
}

export type UpdateState =
  | 'up-to-date'
  | 'planned'
  | 'updated'
  | 'rolled-back'
  | 'rollback-failed'
  | 'aborted';

export interface UpdateOutcome {
  state: UpdateState;
  exitCode: number;
  currentVersion?: string;
  targetVersion?: string;
  backup?: BackupHandle;
  error?: Error;
}
