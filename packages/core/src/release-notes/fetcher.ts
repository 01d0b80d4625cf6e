import { Logger, capitalize, errorMessage } from '@pacup/shared';
import { Release, providerFor } from './providers';

export interface ReleaseNotesOptions {
  timeoutMs?: number;
  userAgent?: string;
  logger?: Logger;
}

const DEFAULT_TIMEOUT_MS = 30_000;

/**
 * Tag as compared against a pacscript version: `v1.2.3` and `V1.2.3` both give `1.2.3`.
 */
export function normalizeTag(tag: string): string {
  return capitalize(tag).replace(/V/g, '');
}

/**
 * Notes of every release published after `currentVersion`, keyed by tag.
 * Releases are expected newest first, as the forge APIs list them.
 */
export function collectNewerReleases(
  releases: readonly Release[],
  currentVersion: string,
): Map<string, string> {
  const notes = new Map<string, string>();
  const currentIndex = releases.findIndex((release) => normalizeTag(release.tag) === currentVersion);
  if (currentIndex === -1) {
    return notes;
  }
  for (const release of releases.slice(0, currentIndex)) {
    if (release.tag) {
      notes.set(release.tag, release.body);
    }
  }
  return notes;
}

/**
 * Fetches the release notes between `currentVersion` and the newest release of the
 * project `downloadUrl` points into. Never throws: anything unexpected gives no notes.
 */
export async function fetchReleaseNotes(
  downloadUrl: string,
  currentVersion: string,
  options: ReleaseNotesOptions = {},
): Promise<Map<string, string>> {
  const log = options.logger;

  let url: URL;
  try {
    url = new URL(downloadUrl);
  } catch {
    log?.debug(`No release notes: "${downloadUrl}" is not a URL`);
    return new Map();
  }

  const provider = providerFor(url);
  const apiUrl = provider?.apiUrl(url);
  if (!provider || !apiUrl) {
    log?.debug(`No release notes provider for ${url.host}`);
    return new Map();
  }
  log?.info(`Fetching release notes from ${apiUrl}`);

  let body: unknown;
  try {
    const response = await fetch(apiUrl, {
      headers: {
        Accept: 'application/json',
        'User-Agent': options.userAgent ?? 'pacup',
      },
      signal: AbortSignal.timeout(options.timeoutMs ?? DEFAULT_TIMEOUT_MS),
    });
    if (!response.ok) {
      log?.debug(`Release notes request answered ${response.status}`);
      return new Map();
    }
    body = await response.json();
  } catch (error) {
    log?.debug(`Release notes request failed: ${errorMessage(error)}`);
    return new Map();
  }

  const releases = provider.parseReleases(body);
  if (!releases) {
    log?.debug(`Unexpected ${provider.name} releases body`);
    return new Map();
  }
  return collectNewerReleases(releases, currentVersion);
}
