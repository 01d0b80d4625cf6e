import path from 'path';
import { CommandRunner } from '@pacup/exec';
import { Logger, ProcessError } from '@pacup/shared';
import { GitService } from '../git/service';
import type { Pacscript } from '../pacscript/types';
import { describeLatest } from '../version/types';

export interface UserPrompt {
  confirm(message: string, defaultValue: boolean): Promise<boolean>;
}

export interface Installer {
  /** Installs the rewritten pacscript. Rejects when installation fails. */
  install(record: Pacscript): Promise<void>;
}

export interface Shipper {
  ship(record: Pacscript, previousVersion: string): Promise<void>;
}

export interface PacstallInstallerOptions {
  command: string;
  args: string[];
  runner?: CommandRunner;
  /** Used by the default runner to log each command. */
  logger?: Logger;
}

/**
 * Installs a local pacscript with `pacstall -Il <name>` from the pacscript's directory.
 */
export class PacstallInstaller implements Installer {
  private readonly runner: CommandRunner;

  constructor(private readonly options: PacstallInstallerOptions) {
    this.runner = options.runner ?? new CommandRunner(options.logger);
  }

  async install(record: Pacscript): Promise<void> {
    const { exitCode } = await this.runner.run(
      this.options.command,
      [...this.options.args, record.name],
      { cwd: path.dirname(path.resolve(record.path)), interactive: true },
    );
    if (exitCode !== 0) {
      throw new ProcessError(`${this.options.command} exited with ${exitCode}`, { exitCode });
    }
  }
}

export interface GitShipperOptions {
  push: boolean;
  remote: string;
  runner?: CommandRunner;
  logger?: Logger;
}

/**
 * Commits each updated pacscript on its own, optionally pushing the current branch.
 */
export class GitShipper implements Shipper {
  constructor(private readonly options: GitShipperOptions) {}

  async ship(record: Pacscript, previousVersion: string): Promise<void> {
    const file = path.resolve(record.path);
    const git = new GitService({
      repoRoot: path.dirname(file),
      runner: this.options.runner,
      logger: this.options.logger,
    });
    await git.stage([file]);
    await git.commit(commitMessage(record, previousVersion));
    if (this.options.push) {
      await git.push(this.options.remote, await git.currentBranch());
    }
  }
}

export function commitMessage(record: Pacscript, previousVersion: string): string {
  return `upd(${record.name}): \`${previousVersion}\` -> \`${describeLatest(record.version.latest)}\``;
}
