/**
 * Version sources
 *
 * Resolve the Jenkins version an update should move to. A fetched value is
 * only ever returned when it is a concrete MAJOR.MINOR.PATCH string; anything
 * else is a FetchError, raised before the orchestrator touches any state.
 */

import { FetchError } from '../errors.js';
import type { VersionSourceConfig } from '../types.js';

const VERSION_PATTERN = /^[0-9]+\.[0-9]+\.[0-9]+$/;

export interface VersionSource {
  /** Human-readable origin, for status lines */
  readonly description: string;
  fetchLatest(): Promise<string>;
}

/**
 * Trim surrounding whitespace and line breaks
 */
export function normalizeVersion(value: string): string {
  return value.trim();
}

export function isConcreteVersion(value: string): boolean {
  return VERSION_PATTERN.test(normalizeVersion(value));
}

/**
 * Whether a deployment pinned to `current` needs to move to `target`.
 *
 * Plain string comparison: the source is trusted to return the newest
 * release, so ordering never matters. An alias such as `lts` is never equal
 * to a concrete target, which forces one update that pins the version.
 */
export function needsUpdate(current: string, target: string): boolean {
  const from = normalizeVersion(current);
  const to = normalizeVersion(target);

  if (!isConcreteVersion(from)) {
    return true;
  }

  return from !== to;
}

/**
 * Validate an operator- or network-supplied version
 */
export function parseVersion(raw: string, origin: string): string {
  const version = normalizeVersion(raw);
  if (!VERSION_PATTERN.test(version)) {
    throw new FetchError(
      `Invalid version format from ${origin}: "${version.slice(0, 64)}" (expected MAJOR.MINOR.PATCH)`
    );
  }
  return version;
}

/**
 * GET a URL and read its body, all within one timeout
 */
async function fetchText(url: string, accept: string, timeout: number): Promise<string> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeout);

  try {
    const response = await fetch(url, {
      signal: controller.signal,
      headers: { Accept: accept },
    });

    if (!response.ok) {
      throw new FetchError(`Failed to fetch ${url}: ${response.status} ${response.statusText}`);
    }

    return await response.text();
  } catch (error) {
    if (error instanceof FetchError) {
      throw error;
    }
    if (error instanceof Error && error.name === 'AbortError') {
      throw new FetchError(`Timeout fetching ${url}`, { cause: error });
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new FetchError(`Failed to fetch ${url}: ${message}`, { cause: error });
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Plain-text endpoint returning one version line
 */
export class PlainTextVersionSource implements VersionSource {
  constructor(
    private readonly url: string,
    private readonly timeout = 10000
  ) {}

  get description(): string {
    return this.url;
  }

  async fetchLatest(): Promise<string> {
    return parseVersion(await fetchText(this.url, 'text/plain', this.timeout), this.url);
  }
}

interface GitHubRelease {
  tag_name: string;
}

function isGitHubRelease(value: unknown): value is GitHubRelease {
  return (
    typeof value === 'object' &&
    value !== null &&
    'tag_name' in value &&
    typeof value.tag_name === 'string'
  );
}

/**
 * Newest GitHub release whose tag contains a filter string
 */
export class GitHubReleasesVersionSource implements VersionSource {
  constructor(
    private readonly repo: string,
    private readonly tagFilter: string,
    private readonly tagPrefix: string,
    private readonly timeout = 10000
  ) {}

  get description(): string {
    return `github.com/${this.repo} releases`;
  }

  async fetchLatest(): Promise<string> {
    const url = `https://api.github.com/repos/${this.repo}/releases`;
    const body = await fetchText(url, 'application/vnd.github+json', this.timeout);

    let releases: unknown;
    try {
      releases = JSON.parse(body);
    } catch (error) {
      throw new FetchError(`Malformed release list from ${url}`, { cause: error });
    }

    if (!Array.isArray(releases)) {
      throw new FetchError(`Malformed release list from ${url}`);
    }

    const release = releases
      .filter(isGitHubRelease)
      .find((r) => r.tag_name.includes(this.tagFilter));

    if (!release) {
      throw new FetchError(`No release tagged "${this.tagFilter}" found in ${this.repo}`);
    }

    const tag = release.tag_name.startsWith(this.tagPrefix)
      ? release.tag_name.slice(this.tagPrefix.length)
      : release.tag_name;

    return parseVersion(tag, url);
  }
}

/**
 * A fixed target given on the command line
 */
export class PinnedVersionSource implements VersionSource {
  readonly description = 'command line';

  constructor(private readonly version: string) {}

  async fetchLatest(): Promise<string> {
    return parseVersion(this.version, this.description);
  }
}

export function createVersionSource(config: VersionSourceConfig, timeout: number): VersionSource {
  switch (config.type) {
    case 'text':
      return new PlainTextVersionSource(config.url, timeout);
    case 'github-releases':
      return new GitHubReleasesVersionSource(config.repo, config.tagFilter, config.tagPrefix, timeout);
  }
}
