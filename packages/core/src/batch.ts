import { versionStatus } from './version/comparator';
import { VersionStatus } from './version/types';
import { createLimiter } from './version/resolver';
import { LoadContext, loadPacscript } from './pacscript/load';
import type { Pacscript } from './pacscript/types';

export type ParseOutcome =
  | { ok: true; pacscript: Pacscript }
  | { ok: false; path: string; error: unknown };

export interface StatusGroups {
  outdated: Pacscript[];
  updated: Pacscript[];
  newer: Pacscript[];
  unknown: Pacscript[];
  failed: Array<{ path: string; error: unknown }>;
}

export type BatchContext = Omit<LoadContext, 'limiter'> & {
  limiter?: LoadContext['limiter'];
  concurrency?: number;
};

/**
 * Loads every pacscript concurrently with one shared Repology limiter.
 * Outcomes keep the input order; a failing pacscript never affects the others.
 */
export async function parsePacscripts(
  paths: readonly string[],
  ctx: BatchContext = {},
): Promise<ParseOutcome[]> {
  const limiter = ctx.limiter ?? createLimiter(ctx.concurrency);
  const settled = await Promise.allSettled(
    paths.map((filePath) => loadPacscript(filePath, { ...ctx, limiter })),
  );
  return settled.map((result, i) =>
    result.status === 'fulfilled'
      ? { ok: true, pacscript: result.value }
      : { ok: false, path: paths[i], error: result.reason },
  );
}

export function groupByStatus(outcomes: readonly ParseOutcome[]): StatusGroups {
  const groups: StatusGroups = { outdated: [], updated: [], newer: [], unknown: [], failed: [] };
  for (const outcome of outcomes) {
    if (!outcome.ok) {
      groups.failed.push({ path: outcome.path, error: outcome.error });
      continue;
    }
    const { pacscript } = outcome;
    switch (versionStatus(pacscript.version.current, pacscript.version.latest)) {
      case VersionStatus.OUTDATED:
        groups.outdated.push(pacscript);
        break;
      case VersionStatus.UPDATED:
        groups.updated.push(pacscript);
        break;
      case VersionStatus.NEWER:
        groups.newer.push(pacscript);
        break;
      case VersionStatus.UNKNOWN:
        groups.unknown.push(pacscript);
        break;
    }
  }
  return groups;
}
