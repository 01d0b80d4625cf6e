import pLimit, { type LimitFunction } from 'p-limit';
import { z } from 'zod';
import {
  DEFAULT_REPO_DENYLIST,
  DEFAULT_REPOLOGY_CONCURRENCY,
  Logger,
  errorMessage,
} from '@pacup/shared';
import { Latest, ResolutionFailure, failed, resolved } from './types';

export type Limiter = LimitFunction;

/** One package entry of a Repology project, as returned by `/project/{name}`. */
export type RepologyRecord = z.infer<typeof RepologyRecordSchema>;

const RepologyRecordSchema = z
  .object({
    repo: z.string(),
    version: z.string(),
  })
  .passthrough();

const RepologyProjectSchema = z.array(RepologyRecordSchema);

/** What a resolution looked at, reported when debug output is on. */
export interface ResolutionEvent {
  project: string;
  criteria: ReadonlyMap<string, string>;
  filtrate: readonly RepologyRecord[];
  selected: string;
}

export interface ResolutionObserver {
  onResolution(event: ResolutionEvent): void;
}

export interface ResolveOptions {
  apiUrl?: string;
  denylist?: readonly string[];
  timeoutMs?: number;
  userAgent?: string;
  observer?: ResolutionObserver;
  logger?: Logger;
}

const DEFAULT_API_URL = 'https://repology.org/api/v1';
const DEFAULT_TIMEOUT_MS = 30_000;

export function createLimiter(concurrency = DEFAULT_REPOLOGY_CONCURRENCY): Limiter {
  return pLimit(concurrency);
}

/**
 * The filters applied after the project lookup: every entry but `project`,
 * plus `status: newest` unless the pacscript filters on status itself.
 */
export function remainingCriteria(
  filterCriteria: ReadonlyMap<string, string>,
): Array<[string, string]> {
  const remaining = [...filterCriteria].filter(([key]) => key !== 'project');
  if (!filterCriteria.has('status')) {
    remaining.push(['status', 'newest']);
  }
  return remaining;
}

/**
 * Narrows the project's records by each criterion in turn. A criterion that
 * matches nothing is skipped instead of emptying the set.
 */
export function filterRecords(
  records: readonly RepologyRecord[],
  criteria: ReadonlyArray<[string, string]>,
  denylist: readonly string[],
): RepologyRecord[] {
  const denied = new Set(denylist);
  let working = [...records];
  for (const [key, value] of criteria) {
    const subset = working.filter(
      (record) =>
        !denied.has(record.repo) && record[key] !== undefined && String(record[key]) === value,
    );
    if (subset.length > 0) {
      working = subset;
    }
  }
  return working;
}

/**
 * Picks the most frequent version, preferring the one seen first on ties.
 * Denylisted repos do not vote unless nothing else is left.
 */
export function selectVersion(
  records: readonly RepologyRecord[],
  denylist: readonly string[],
): string | undefined {
  const denied = new Set(denylist);
  const allowed = records.filter((record) => !denied.has(record.repo));
  const voters = allowed.length > 0 ? allowed : records;

  const counts = new Map<string, number>();
  for (const { version } of voters) {
    counts.set(version, (counts.get(version) ?? 0) + 1);
  }

  let best: string | undefined;
  let bestCount = 0;
  // Map iteration follows insertion order, so strict > keeps the first on ties.
  for (const [version, count] of counts) {
    if (count > bestCount) {
      best = version;
      bestCount = count;
    }
  }
  return best;
}

/**
 * Looks the pacscript's project up on Repology and returns the version most
 * repositories agree on after filtering.
 */
export function resolveLatest(
  filterCriteria: ReadonlyMap<string, string>,
  limiter: Limiter,
  showDebugOutput: boolean,
  options: ResolveOptions = {},
): Promise<Latest> {
  return limiter(() => resolveInSlot(filterCriteria, showDebugOutput, options));
}

async function resolveInSlot(
  filterCriteria: ReadonlyMap<string, string>,
  showDebugOutput: boolean,
  options: ResolveOptions,
): Promise<Latest> {
  const log = options.logger;

  if (filterCriteria.size === 0) {
    return failed(ResolutionFailure.NO_FILTERS);
  }
  const project = filterCriteria.get('project');
  if (project === undefined) {
    return failed(ResolutionFailure.NO_PROJECT_FILTER);
  }

  const apiUrl = (options.apiUrl ?? DEFAULT_API_URL).replace(/\/+$/, '');
  const url = `${apiUrl}/project/${encodeURIComponent(project)}`;
  log?.info(`Getting project info for ${project} from repology`);

  let response: Response;
  try {
    response = await fetch(url, {
      headers: {
        Accept: 'application/json',
        'User-Agent': options.userAgent ?? 'pacup',
      },
      signal: AbortSignal.timeout(options.timeoutMs ?? DEFAULT_TIMEOUT_MS),
    });
  } catch (error) {
    log?.warn(`Repology request for ${project} failed: ${errorMessage(error)}`);
    return failed(ResolutionFailure.REQUEST_ERROR);
  }

  if (!response.ok) {
    log?.warn(`Repology answered ${response.status} for ${project}`);
    return failed(ResolutionFailure.HTTP_STATUS_ERROR);
  }

  let body: unknown;
  try {
    body = await response.json();
  } catch (error) {
    log?.warn(`Repology sent an unreadable body for ${project}: ${errorMessage(error)}`);
    return failed(ResolutionFailure.REQUEST_ERROR);
  }

  const parsed = RepologyProjectSchema.safeParse(body);
  if (!parsed.success) {
    log?.warn(`Repology sent an unexpected body for ${project}`);
    return failed(ResolutionFailure.REQUEST_ERROR);
  }
  if (parsed.data.length === 0) {
    return failed(ResolutionFailure.NOT_FOUND);
  }

  const denylist = options.denylist ?? DEFAULT_REPO_DENYLIST;
  const filtrate = filterRecords(parsed.data, remainingCriteria(filterCriteria), denylist);
  const selected = selectVersion(filtrate, denylist);
  if (selected === undefined) {
    return failed(ResolutionFailure.NOT_FOUND);
  }
  log?.debug(`Selected ${selected} for ${project} from ${filtrate.length} records`);

  if (showDebugOutput) {
    options.observer?.onResolution({ project, criteria: filterCriteria, filtrate, selected });
  }
  return resolved(selected);
}
