/**
 * Jenkins liveness and metadata probes
 */

import ora from 'ora';
import { pollUntil, sleep as defaultSleep } from '../utils.js';
import type { HealthStatus, PluginUpdate, RetryPolicy } from '../types.js';

export interface HealthProbe {
  /** URL polled for liveness, for messages */
  readonly url: string;
  isHealthy(): Promise<boolean>;
  /** Version from the metadata endpoint; null when unavailable */
  fetchVersion(): Promise<string | null>;
}

export interface JenkinsProbeOptions {
  jenkinsUrl: string;
  healthPath: string;
  timeout?: number;
  /** Basic auth for endpoints that need a login */
  credentials?: { user: string; token: string };
}

function isPluginUpdate(value: unknown): value is PluginUpdate {
  return (
    typeof value === 'object' &&
    value !== null &&
    'name' in value &&
    typeof value.name === 'string' &&
    'version' in value &&
    typeof value.version === 'string'
  );
}

export class JenkinsHealthProbe implements HealthProbe {
  readonly url: string;
  private readonly baseUrl: string;
  private readonly timeout: number;

  constructor(private readonly options: JenkinsProbeOptions) {
    this.baseUrl = options.jenkinsUrl.replace(/\/+$/, '');
    this.url = `${this.baseUrl}${options.healthPath}`;
    this.timeout = options.timeout ?? 10000;
  }

  /**
   * Any response fetch treats as ok (2xx after redirects) counts as alive
   */
  async isHealthy(): Promise<boolean> {
    try {
      const response = await this.get(this.url);
      // Only the status matters; free the connection before the next poll
      await response.body?.cancel();
      return response.ok;
    } catch {
      return false;
    }
  }

  async fetchVersion(): Promise<string | null> {
    const body = await this.getJson(`${this.baseUrl}/api/json`);
    if (typeof body === 'object' && body !== null && 'version' in body) {
      return typeof body.version === 'string' ? body.version : null;
    }
    return null;
  }

  /**
   * Installed plugin count; needs credentials on a secured controller
   */
  async fetchPluginCount(): Promise<number | null> {
    const body = await this.getJson(`${this.baseUrl}/pluginManager/api/json?depth=1`);
    if (typeof body === 'object' && body !== null && 'plugins' in body && Array.isArray(body.plugins)) {
      return body.plugins.length;
    }
    return null;
  }

  /**
   * Plugin updates the update center offers; null when it cannot be read
   */
  async fetchAvailableUpdates(): Promise<PluginUpdate[] | null> {
    const body = await this.getJson(`${this.baseUrl}/updateCenter/api/json?depth=1`);
    if (typeof body !== 'object' || body === null || !('updates' in body) || !Array.isArray(body.updates)) {
      return null;
    }

    const updates: unknown[] = body.updates;
    return updates.filter(isPluginUpdate).map(({ name, version }) => ({ name, version }));
  }

  private async getJson(url: string): Promise<unknown> {
    try {
      const response = await this.get(url);
      if (!response.ok) {
        return null;
      }
      const body: unknown = await response.json();
      return body;
    } catch {
      return null;
    }
  }

  private async get(url: string): Promise<Response> {
    const headers: Record<string, string> = {};
    if (this.options.credentials) {
      const { user, token } = this.options.credentials;
      headers.Authorization = `Basic ${Buffer.from(`${user}:${token}`).toString('base64')}`;
    }

    return fetch(url, {
      headers,
      redirect: 'follow',
      signal: AbortSignal.timeout(this.timeout),
    });
  }
}

export interface WaitForHealthyOptions {
  policy: RetryPolicy;
  /** Grace period before the first probe */
  startupDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Wait for Jenkins to answer on its liveness URL within a fixed attempt budget
 */
export async function waitForHealthy(
  probe: HealthProbe,
  options: WaitForHealthyOptions
): Promise<HealthStatus> {
  const { policy, startupDelayMs = 0, sleep = defaultSleep } = options;
  const spinner = ora('Waiting for Jenkins to start...').start();

  if (startupDelayMs > 0) {
    spinner.text = `Waiting ${Math.round(startupDelayMs / 1000)}s for Jenkins to start...`;
    await sleep(startupDelayMs);
  }

  spinner.text = `Checking ${probe.url} (1/${policy.maxAttempts})`;

  const result = await pollUntil(() => probe.isHealthy(), policy, {
    sleep,
    onRetry: (attempt, maxAttempts) => {
      spinner.text = `Jenkins not ready yet, retrying in ${Math.round(
        policy.intervalMs / 1000
      )} seconds... (${attempt + 1}/${maxAttempts})`;
    },
  });

  if (result.ok) {
    spinner.succeed('Jenkins is healthy!');
  } else {
    spinner.fail(`Jenkins did not become healthy after ${result.attempts} attempts`);
  }

  return { healthy: result.ok, attempts: result.attempts };
}
