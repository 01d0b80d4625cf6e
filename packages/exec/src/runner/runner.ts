import { execa } from 'execa';
import which from 'which';
import { ProcessError, Logger } from '@pacup/shared';

export interface RunOptions {
  cwd?: string;
  /** Hand the terminal to the child (installers prompt and draw progress bars). */
  interactive?: boolean;
}

export interface CommandResult {
  stdout: string;
  exitCode: number;
}

/**
 * Runs external tools (pacstall, git) and turns failures into `ProcessError`.
 */
export class CommandRunner {
  constructor(private readonly logger?: Logger) {}

  async run(command: string, args: string[], options: RunOptions = {}): Promise<CommandResult> {
    const rendered = [command, ...args].join(' ');
    this.logger?.info(`Running ${rendered}`);
    try {
      const result = await execa(command, args, {
        cwd: options.cwd,
        stdio: options.interactive ? 'inherit' : 'pipe',
      });
      return { stdout: result.stdout ?? '', exitCode: result.exitCode };
    } catch (error) {
      const exitCode = readExitCode(error);
      throw new ProcessError(`Command failed: ${rendered}`, {
        cause: error,
        exitCode,
        details: readStderr(error),
      });
    }
  }

  /**
   * Resolves `command` on PATH, or null when it is not installed.
   */
  async locate(command: string): Promise<string | null> {
    try {
      return await which(command);
    } catch {
      return null;
    }
  }
}

function readExitCode(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'exitCode' in error) {
    const { exitCode } = error;
    return typeof exitCode === 'number' ? exitCode : undefined;
  }
  return undefined;
}

function readStderr(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'stderr' in error) {
    const { stderr } = error;
    return typeof stderr === 'string' && stderr.length > 0 ? stderr : undefined;
  }
  return undefined;
}
