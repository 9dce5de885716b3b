/**
 * Project configuration
 *
 * Defaults, overridden by an optional jenkins-updater.json in the project
 * directory (validated against schemas/updater-config.schema.json), overridden
 * in turn by command-line flags.
 */

import fs from 'fs-extra';
import path from 'path';
import Ajv from 'ajv';
import addFormats from 'ajv-formats';
import { ConfigError } from '../errors.js';
import type {
  DataBackupPolicy,
  UpdaterConfig,
  UpdaterConfigFile,
  VersionSourceConfig,
  VersionSourceConfigFile,
} from '../types.js';
import configSchema from '../schemas/updater-config.schema.json' with { type: 'json' };

export const CONFIG_FILE = 'jenkins-updater.json';

export const DEFAULT_CONFIG: UpdaterConfig = {
  dockerfile: 'Dockerfile',
  composeFile: null,
  service: 'jenkins',
  image: 'jenkins/jenkins',
  pluginsFile: 'plugins.txt',
  jenkinsUrl: 'http://localhost:8080',
  healthPath: '/login',
  dataVolume: 'jenkins_home',
  backupVolume: 'jenkins_backup',
  helperImage: 'alpine',
  lockFile: '.jenkins-updater.lock',
  versionSource: {
    type: 'text',
    url: 'https://updates.jenkins.io/stable/latestCore.txt',
  },
  health: {
    maxAttempts: 12,
    intervalSeconds: 10,
    startupDelaySeconds: 30,
  },
  plugins: {
    startupDelaySeconds: 45,
  },
  backup: {
    dataVolume: 'warn',
  },
  requestTimeoutMs: 10000,
};

/** Tag settings of a github-releases source the file leaves out */
const GITHUB_RELEASES_DEFAULTS = {
  tagFilter: 'lts',
  tagPrefix: 'jenkins-',
};

const ajv = new Ajv({ strict: false, allErrors: true });
addFormats(ajv);
const validateConfig = ajv.compile<UpdaterConfigFile>(configSchema);

export interface ConfigOverrides {
  maxAttempts?: number;
  intervalSeconds?: number;
  startupDelaySeconds?: number;
  dataBackup?: DataBackupPolicy;
}

/**
 * Load the effective configuration for a project directory
 */
export async function loadConfig(
  projectDir: string,
  overrides: ConfigOverrides = {}
): Promise<UpdaterConfig> {
  const file = await readConfigFile(projectDir);

  const config: UpdaterConfig = {
    ...DEFAULT_CONFIG,
    ...file,
    versionSource: resolveVersionSource(file.versionSource),
    health: { ...DEFAULT_CONFIG.health, ...file.health },
    plugins: { ...DEFAULT_CONFIG.plugins, ...file.plugins },
    backup: { ...DEFAULT_CONFIG.backup, ...file.backup },
  };

  if (overrides.maxAttempts !== undefined) {
    config.health.maxAttempts = overrides.maxAttempts;
  }
  if (overrides.intervalSeconds !== undefined) {
    config.health.intervalSeconds = overrides.intervalSeconds;
  }
  if (overrides.startupDelaySeconds !== undefined) {
    config.health.startupDelaySeconds = overrides.startupDelaySeconds;
  }
  if (overrides.dataBackup !== undefined) {
    config.backup.dataVolume = overrides.dataBackup;
  }

  return config;
}

function resolveVersionSource(source: VersionSourceConfigFile | undefined): VersionSourceConfig {
  if (!source) {
    return DEFAULT_CONFIG.versionSource;
  }
  if (source.type === 'github-releases') {
    return { ...GITHUB_RELEASES_DEFAULTS, ...source };
  }
  return source;
}

async function readConfigFile(projectDir: string): Promise<UpdaterConfigFile> {
  const configPath = path.join(projectDir, CONFIG_FILE);

  if (!(await fs.pathExists(configPath))) {
    return {};
  }

  let raw: unknown;
  try {
    raw = await fs.readJson(configPath);
  } catch (error) {
    throw new ConfigError(`Could not parse ${CONFIG_FILE}: ${error instanceof Error ? error.message : String(error)}`, {
      cause: error,
    });
  }

  if (!validateConfig(raw)) {
    const details = (validateConfig.errors ?? [])
      .map((e) => `${e.instancePath || '/'} ${e.message ?? 'is invalid'}`)
      .join('; ');
    throw new ConfigError(`Invalid ${CONFIG_FILE}: ${details}`);
  }

  return raw;
}

/**
 * Parse a numeric command-line flag
 */
export function parseNumberOption(
  value: string | undefined,
  flag: string,
  { integer = false, min = 0 }: { integer?: boolean; min?: number } = {}
): number | undefined {
  if (value === undefined) {
    return undefined;
  }

  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < min || (integer && !Number.isInteger(parsed))) {
    throw new ConfigError(
      `Invalid value for ${flag}: "${value}" (expected ${integer ? 'an integer' : 'a number'} >= ${min})`
    );
  }

  return parsed;
}

/**
 * Data-volume backup policy from the --strict-backup / --skip-data-backup flags
 */
export function dataBackupOverride(options: {
  strictBackup?: boolean;
  skipDataBackup?: boolean;
}): DataBackupPolicy | undefined {
  if (options.strictBackup && options.skipDataBackup) {
    throw new ConfigError('--strict-backup and --skip-data-backup cannot be combined');
  }
  if (options.strictBackup) {
    return 'required';
  }
  if (options.skipDataBackup) {
    return 'skip';
  }
  return undefined;
}
