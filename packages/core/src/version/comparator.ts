import { SemVer, compareIdentifiers } from 'semver';
import { InvalidVersionError } from '@pacup/shared';
import { Latest, VersionStatus } from './types';

const VERSION_PATTERN =
  /^[vV]?(\d+(?:\.\d+)*)(?:[-_.]?([A-Za-z][0-9A-Za-z._-]*|\d+))?(?:\+[0-9A-Za-z.]+)?$/;

const TAG_ALIASES: Record<string, string> = {
  alpha: 'a',
  beta: 'b',
  c: 'rc',
  pre: 'rc',
  preview: 'rc',
};

const POST_TAGS = new Set(['post', 'rev', 'r']);

export interface ParsedVersion {
  release: string[];
  /** Pre-release identifiers, e.g. `['rc', '1']`. */
  pre?: string[];
  /** Post-release number. */
  post?: string;
}

export function parseVersion(version: string): ParsedVersion {
  const match = VERSION_PATTERN.exec(version.trim());
  if (!match) {
    throw new InvalidVersionError(version);
  }
  const release = match[1].split('.');
  const tag = match[2];
  if (tag === undefined) {
    return { release };
  }

  const tokens = tag
    .toLowerCase()
    .split(/[._-]|(?<=[a-z])(?=\d)|(?<=\d)(?=[a-z])/)
    .filter(Boolean)
    .map((token) => TAG_ALIASES[token] ?? token);

  if (/^\d+$/.test(tag)) {
    return { release, post: tag };
  }
  if (POST_TAGS.has(tokens[0])) {
    return { release, post: tokens[1] ?? '0' };
  }
  return { release, pre: tokens };
}

function compareRelease(a: string[], b: string[]): number {
  const length = Math.max(a.length, b.length);
  for (let i = 0; i < length; i++) {
    const result = compareIdentifiers(a[i] ?? '0', b[i] ?? '0');
    if (result !== 0) return result;
  }
  return 0;
}

function phase(version: ParsedVersion): number {
  if (version.pre) return -1;
  if (version.post !== undefined) return 1;
  return 0;
}

/**
 * Orders two version strings. Throws `InvalidVersionError` for strings that do not parse.
 */
export function compareVersions(left: string, right: string): -1 | 0 | 1 {
  const a = parseVersion(left);
  const b = parseVersion(right);

  let result = compareRelease(a.release, b.release);
  if (result === 0) {
    result = Math.sign(phase(a) - phase(b));
  }
  if (result === 0 && a.pre && b.pre) {
    const preA = new SemVer(`0.0.0-${a.pre.join('.')}`, { loose: true });
    const preB = new SemVer(`0.0.0-${b.pre.join('.')}`, { loose: true });
    result = preA.comparePre(preB);
  }
  if (result === 0 && a.post !== undefined && b.post !== undefined) {
    result = compareIdentifiers(a.post, b.post);
  }
  return result < 0 ? -1 : result > 0 ? 1 : 0;
}

/**
 * Classifies the current version against the resolved upstream one.
 * A failed resolution is `UNKNOWN` without looking at either string.
 */
export function versionStatus(current: string, latest: Latest): VersionStatus {
  if (latest.kind === 'failed') {
    return VersionStatus.UNKNOWN;
  }
  const order = compareVersions(current, latest.version);
  if (order < 0) return VersionStatus.OUTDATED;
  if (order === 0) return VersionStatus.UPDATED;
  return VersionStatus.NEWER;
}
