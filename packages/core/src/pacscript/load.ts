import { Logger, logger as defaultLogger } from '@pacup/shared';
import { fetchReleaseNotes, ReleaseNotesOptions } from '../release-notes';
import { versionStatus } from '../version/comparator';
import { Limiter, ResolveOptions, resolveLatest } from '../version/resolver';
import { VersionStatus } from '../version/types';
import { ParseOptions, parsePacscript } from './parser';
import type { Pacscript } from './types';

export interface LoadContext {
  limiter: Limiter;
  showDebugOutput?: boolean;
  parse?: ParseOptions;
  resolve?: ResolveOptions;
  releaseNotes?: ReleaseNotesOptions;
  logger?: Logger;
}

/**
 * Parses a pacscript and looks up its upstream version. Release notes are only
 * fetched for outdated pacscripts.
 */
export async function loadPacscript(filePath: string, ctx: LoadContext): Promise<Pacscript> {
  const log = ctx.logger ?? defaultLogger;
  log.info(`Parsing ${filePath}`);

  const parsed = await parsePacscript(filePath, { logger: log, ...ctx.parse });
  const scoped = log.child({ pacscript: parsed.name });

  const latest = await resolveLatest(
    parsed.filterCriteria,
    ctx.limiter,
    ctx.showDebugOutput ?? false,
    { logger: scoped, ...ctx.resolve },
  );

  const status = versionStatus(parsed.version.current, latest);
  const releaseNotes =
    status === VersionStatus.OUTDATED
      ? await fetchReleaseNotes(parsed.downloadUrl.value, parsed.version.current, {
          logger: scoped,
          ...ctx.releaseNotes,
        })
      : new Map<string, string>();

  return {
    ...parsed,
    version: { ...parsed.version, latest },
    releaseNotes,
  };
}
