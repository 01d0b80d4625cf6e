import fse from 'fs-extra';
import { HttpError, Logger, errorMessage, logger as defaultLogger } from '@pacup/shared';
import type { Pacscript } from '../pacscript/types';
import { versionStatus } from '../version/comparator';
import { VersionStatus } from '../version/types';
import type { Installer, Shipper, UserPrompt } from './collaborators';
import { DownloadOptions, downloadArtifact } from './download';
import { renderLineDiff, rewritePacscript, writePacscript } from './rewrite';

export type UpdateEvent =
  | { type: 'started'; record: Pacscript; latest: string }
  | { type: 'release-notes'; record: Pacscript; notes: ReadonlyMap<string, string> }
  | { type: 'no-release-notes'; record: Pacscript }
  | { type: 'download-progress'; record: Pacscript; received: number; total?: number }
  | { type: 'diff'; record: Pacscript; diff: string }
  | { type: 'installing'; record: Pacscript }
  | { type: 'installed'; record: Pacscript }
  | { type: 'shipped'; record: Pacscript }
  | { type: 'succeeded'; record: Pacscript }
  | { type: 'failed'; record: Pacscript; reason: string };

export interface UpdateReporter {
  report(event: UpdateEvent): void;
}

export interface UpdateCollaborators {
  prompt: UserPrompt;
  installer: Installer;
  /** Present only when updates should be committed. */
  shipper?: Shipper;
  reporter?: UpdateReporter;
  download: Omit<DownloadOptions, 'onProgress' | 'logger'>;
  logger?: Logger;
}

export interface UpdateReport {
  updated: Pacscript[];
  /** Reason each failed pacscript could not be updated, in the order they failed. */
  failed: Map<Pacscript, string>;
}

/** The download URL with every occurrence of the current version replaced. */
export function latestDownloadUrl(
  record: Pick<Pacscript, 'version' | 'downloadUrl'>,
  latest: string,
): string {
  const { current } = record.version;
  const url = record.downloadUrl.value;
  return current ? url.split(current).join(latest) : url;
}

class UpdateFailure extends Error {}

/**
 * Updates every outdated pacscript in turn. A failing pacscript is recorded
 * with its reason and the loop moves on to the next one.
 */
export async function updatePacscripts(
  records: readonly Pacscript[],
  collaborators: UpdateCollaborators,
): Promise<UpdateReport> {
  const report: UpdateReport = { updated: [], failed: new Map() };
  const log = collaborators.logger ?? defaultLogger;

  for (const record of records) {
    const latest = record.version.latest;
    if (
      latest.kind !== 'resolved' ||
      versionStatus(record.version.current, latest) !== VersionStatus.OUTDATED
    ) {
      continue;
    }

    const scoped = log.child({ pacscript: record.name });
    try {
      await updateOne(record, latest.version, collaborators, scoped);
      report.updated.push(record);
      collaborators.reporter?.report({ type: 'succeeded', record });
    } catch (error) {
      const reason = error instanceof UpdateFailure ? error.message : errorMessage(error);
      if (!(error instanceof UpdateFailure)) {
        scoped.error(error instanceof Error ? error : new Error(reason), 'Update failed');
      }
      report.failed.set(record, reason);
      collaborators.reporter?.report({ type: 'failed', record, reason });
    } finally {
      scoped.info('Clearing downloaded packages');
      try {
        await fse.remove(collaborators.download.dir);
      } catch (error) {
        scoped.warn(`Could not clear ${collaborators.download.dir}: ${errorMessage(error)}`);
      }
    }
  }

  return report;
}

async function updateOne(
  record: Pacscript,
  latest: string,
  collaborators: UpdateCollaborators,
  log: Logger,
): Promise<void> {
  const { prompt, installer, shipper, reporter } = collaborators;
  reporter?.report({ type: 'started', record, latest });

  if (record.releaseNotes.size > 0) {
    if (await prompt.confirm('Do you want to see the release notes?', true)) {
      reporter?.report({ type: 'release-notes', record, notes: record.releaseNotes });
    }
  } else {
    reporter?.report({ type: 'no-release-notes', record });
  }

  const url = latestDownloadUrl(record, latest);
  log.info(`Downloading ${url}`);
  let sha256: string;
  try {
    ({ sha256 } = await downloadArtifact(url, {
      ...collaborators.download,
      logger: log,
      onProgress: (received, total) =>
        reporter?.report({ type: 'download-progress', record, received, total }),
    }));
  } catch (error) {
    if (error instanceof HttpError && error.status !== undefined) {
      throw new UpdateFailure(`HTTP status error: ${error.status}`);
    }
    throw new UpdateFailure(errorMessage(error));
  }

  const lines = rewritePacscript(record, latest, sha256);
  const fileName = `${record.name}.pacscript`;
  reporter?.report({
    type: 'diff',
    record,
    diff: renderLineDiff(record.rawLines, lines, `Outdated ${fileName}`, `Updated ${fileName}`),
  });
  log.info(`Writing ${record.path}`);
  await writePacscript(record.path, lines);

  reporter?.report({ type: 'installing', record });
  try {
    await installer.install(record);
  } catch (error) {
    log.warn(`Could not install ${fileName}: ${errorMessage(error)}`);
    throw new UpdateFailure('Installation using pacstall failed');
  }
  reporter?.report({ type: 'installed', record });

  if (!(await prompt.confirm(`Does ${record.packageName} work?`, false))) {
    throw new UpdateFailure(`${record.packageName} doesn't work`);
  }

  if (shipper) {
    try {
      await shipper.ship(record, record.version.current);
    } catch (error) {
      throw new UpdateFailure(`Shipping failed: ${errorMessage(error)}`);
    }
    reporter?.report({ type: 'shipped', record });
  }
}
