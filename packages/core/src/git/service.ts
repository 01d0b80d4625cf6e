import { CommandRunner } from '@pacup/exec';
import type { Logger } from '@pacup/shared';

export interface GitServiceOptions {
  repoRoot: string;
  runner?: CommandRunner;
  logger?: Logger;
}

export class GitService {
  private readonly repoRoot: string;
  private readonly runner: CommandRunner;

  constructor(options: GitServiceOptions) {
    this.repoRoot = options.repoRoot;
    this.runner = options.runner ?? new CommandRunner(options.logger);
  }

  private async exec(args: string[]): Promise<string> {
    const { stdout } = await this.runner.run('git', args, { cwd: this.repoRoot });
    return stdout.trim();
  }

  async currentBranch(): Promise<string> {
    return this.exec(['rev-parse', '--abbrev-ref', 'HEAD']);
  }

  async stage(paths: string[]): Promise<void> {
    await this.exec(['add', '--', ...paths]);
  }

  async commit(message: string): Promise<void> {
    await this.exec(['commit', '-m', message]);
  }

  async push(remote: string, branch: string): Promise<void> {
    await this.exec(['push', remote, branch]);
  }
}
