import { describe, it, expect, vi, beforeEach } from 'vitest';
import { execa } from 'execa';
import which from 'which';
import { ProcessError } from '@pacup/shared';
import { CommandRunner } from './runner';

vi.mock('execa', () => ({
  execa: vi.fn(),
}));

vi.mock('which', () => ({
  default: vi.fn(),
}));

const mockExeca = vi.mocked(execa);
const mockWhich = vi.mocked(which);

describe('CommandRunner', () => {
  beforeEach(() => {
    vi.resetAllMocks();
  });

  it('returns stdout and the exit code', async () => {
    mockExeca.mockResolvedValueOnce({ stdout: 'ok', exitCode: 0 } as never);

    const result = await new CommandRunner().run('git', ['status', '--porcelain'], {
      cwd: '/repo',
    });

    expect(result).toEqual({ stdout: 'ok', exitCode: 0 });
    expect(mockExeca).toHaveBeenCalledWith('git', ['status', '--porcelain'], {
      cwd: '/repo',
      stdio: 'pipe',
    });
  });

  it('inherits stdio for interactive commands', async () => {
    mockExeca.mockResolvedValueOnce({ stdout: undefined, exitCode: 0 } as never);

    const result = await new CommandRunner().run('pacstall', ['-Il', 'foo'], {
      interactive: true,
    });

    expect(result.stdout).toBe('');
    expect(mockExeca).toHaveBeenCalledWith('pacstall', ['-Il', 'foo'], {
      cwd: undefined,
      stdio: 'inherit',
    });
  });

  it('wraps failures in ProcessError with the exit code', async () => {
    mockExeca.mockRejectedValueOnce(
      Object.assign(new Error('Command failed with exit code 1'), {
        exitCode: 1,
        stderr: 'fatal: not a git repository',
      }),
    );

    const error = await new CommandRunner().run('git', ['commit']).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ProcessError);
    expect(error).toMatchObject({
      message: 'Command failed: git commit',
      exitCode: 1,
      details: 'fatal: not a git repository',
    });
  });

  it('locates executables on PATH', async () => {
    mockWhich.mockResolvedValueOnce('/usr/bin/git' as never);
    expect(await new CommandRunner().locate('git')).toBe('/usr/bin/git');
  });

  it('returns null for missing executables', async () => {
    mockWhich.mockRejectedValueOnce(new Error('not found: pacstall'));
    expect(await new CommandRunner().locate('pacstall')).toBeNull();
  });
});
