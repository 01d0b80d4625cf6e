import pc from 'picocolors';
import { describeLatest } from '@pacup/core';
import type {
  Pacscript,
  ResolutionEvent,
  ResolutionObserver,
  StatusGroups,
  UpdateEvent,
  UpdateReport,
  UpdateReporter,
} from '@pacup/core';
import { errorMessage } from '@pacup/shared';
import { renderTable } from './index';

export interface RendererOptions {
  /** Receives whole lines. */
  out?: (line: string) => void;
  /** Receives raw progress text; progress is not shown without it. */
  progress?: (text: string) => void;
  columns?: number;
}

const INDENT = '    ';

export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} kB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

function versionChange(record: Pacscript): string {
  return `${record.version.current} => ${describeLatest(record.version.latest)}`;
}

/**
 * Human output for an update run: status panels, per-pacscript progress,
 * Repology debug panels and the final summary.
 */
export class UpdateRenderer implements UpdateReporter, ResolutionObserver {
  private readonly out: (line: string) => void;
  private readonly progress?: (text: string) => void;
  private readonly columns: number;
  private progressActive = false;

  constructor(options: RendererOptions = {}) {
    this.out = options.out ?? ((line) => console.log(line));
    this.progress = options.progress;
    this.columns = options.columns ?? 80;
  }

  private line(text = ''): void {
    if (this.progressActive) {
      this.progress?.('\n');
      this.progressActive = false;
    }
    this.out(text);
  }

  private rule(colour: (text: string) => string): void {
    this.line(colour('─'.repeat(this.columns)));
  }

  statusGroups(groups: StatusGroups): void {
    const panels: string[] = [];
    if (groups.outdated.length > 0) {
      panels.push(
        renderTable(
          'Outdated',
          ['Pacscript', 'Current', 'Latest', 'Maintainer'],
          groups.outdated.map((p) => [
            p.name,
            p.version.current,
            describeLatest(p.version.latest),
            p.maintainer,
          ]),
          pc.blue,
        ),
      );
    }
    if (groups.updated.length > 0) {
      panels.push(
        renderTable(
          'Up To Date',
          ['Pacscript', 'Maintainer'],
          groups.updated.map((p) => [p.name, p.maintainer]),
          pc.green,
        ),
      );
    }
    if (groups.newer.length > 0) {
      panels.push(
        renderTable(
          'Newer',
          ['Pacscript', 'Latest', 'Current', 'Maintainer'],
          groups.newer.map((p) => [
            p.name,
            describeLatest(p.version.latest),
            p.version.current,
            p.maintainer,
          ]),
          pc.magenta,
        ),
      );
    }
    if (groups.unknown.length > 0) {
      panels.push(
        renderTable(
          'Unknown',
          ['Pacscript', 'Current', 'Latest', 'Maintainer'],
          groups.unknown.map((p) => [
            p.name,
            p.version.current,
            describeLatest(p.version.latest),
            p.maintainer,
          ]),
          pc.red,
        ),
      );
    }
    if (groups.failed.length > 0) {
      panels.push(
        renderTable(
          'Failed to parse',
          ['Pacscript', 'Error'],
          groups.failed.map((f) => [f.path, errorMessage(f.error)]),
          pc.red,
        ),
      );
    }

    this.line(pc.bold('Version statuses'));
    panels.forEach((panel) => this.line(panel));
  }

  report(event: UpdateEvent): void {
    const name = event.record.name;
    switch (event.type) {
      case 'started':
        this.line(
          `${pc.bold(pc.blue('=>'))} Updating ${name} pacscript (${event.record.version.current} => ${event.latest})`,
        );
        break;
      case 'release-notes':
        for (const [tag, notes] of event.notes) {
          this.line(pc.bold(pc.blue(`${INDENT}Release notes for ${tag}`)));
          notes.split(/\r?\n/).forEach((noteLine) => this.line(`${INDENT}${noteLine}`));
        }
        break;
      case 'no-release-notes':
        this.line(`${INDENT}${pc.bold(pc.red('❌'))} Could not find release notes`);
        break;
      case 'download-progress':
        this.downloadProgress(event.received, event.total);
        break;
      case 'diff':
        this.line(`${INDENT}${pc.bold(pc.blue('=>'))} Editing pacscript`);
        event.diff
          .split('\n')
          .filter((diffLine) => diffLine.length > 0)
          .forEach((diffLine) => this.line(colourDiffLine(diffLine)));
        break;
      case 'installing':
        this.line(`${INDENT}${pc.bold(pc.blue('=>'))} Installing pacscript using pacstall`);
        this.rule(pc.blue);
        break;
      case 'installed':
        this.rule(pc.blue);
        this.line(
          `${INDENT}${pc.bold(pc.green('✔'))} Successfully installed ${pc.bold(pc.blue(name))} pacscript`,
        );
        break;
      case 'shipped':
        this.line(`${INDENT}${pc.bold(pc.blue('=>'))} Committed ${name}`);
        break;
      case 'succeeded':
        this.line(
          `${INDENT}${pc.bold(pc.blue('=>'))} Finished updating pacscript ${pc.bold(pc.blue(name))}!`,
        );
        break;
      case 'failed':
        this.line(
          `${INDENT}${pc.bold(pc.red('❌'))} Failed to update pacscript ${pc.bold(pc.red(name))}: ${event.reason}`,
        );
        break;
    }
  }

  private downloadProgress(received: number, total?: number): void {
    if (!this.progress) return;
    const amount =
      total === undefined
        ? formatBytes(received)
        : `${((received / Math.max(total, 1)) * 100).toFixed(1)}% • ${formatBytes(received)}/${formatBytes(total)}`;
    this.progress(`\r${INDENT}Downloading package ${amount}`);
    this.progressActive = true;
  }

  onResolution(event: ResolutionEvent): void {
    this.line(pc.bold(`Repology for ${event.project}`));
    this.line(pc.bold(pc.blue('Filters')));
    this.line(JSON.stringify(Object.fromEntries(event.criteria), null, 2));
    this.line(pc.bold(pc.blue('Filtrate')));
    this.line(JSON.stringify(event.filtrate, null, 2));
    this.line(`${pc.bold(pc.blue('Selected version (most common):'))} ${event.selected}`);
  }

  summary(report: UpdateReport): void {
    if (report.updated.length === 0 && report.failed.size === 0) {
      return;
    }
    this.line(pc.bold('Summary'));
    if (report.updated.length > 0) {
      this.line(
        renderTable(
          'Success',
          ['Pacscript', 'Update'],
          report.updated.map((p) => [p.name, versionChange(p)]),
          pc.green,
        ),
      );
    }
    if (report.failed.size > 0) {
      this.line(
        renderTable(
          'Failures',
          ['Pacscript', 'Update', 'Reason'],
          [...report.failed].map(([p, reason]) => [p.name, versionChange(p), reason]),
          pc.red,
        ),
      );
    }
  }
}

function colourDiffLine(line: string): string {
  if (line.startsWith('+++') || line.startsWith('---')) return pc.bold(line);
  if (line.startsWith('@@')) return pc.cyan(line);
  if (line.startsWith('+')) return pc.green(line);
  if (line.startsWith('-')) return pc.red(line);
  return line;
}
