import { describe, it, expect, vi, beforeAll, beforeEach, afterAll, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { http, HttpResponse } from 'msw';
import { setupServer } from 'msw/node';
import { ConfigSchema, ConsoleLogger, UsageError, stripAnsi } from '@pacup/shared';
import { UpdateRenderer } from '../output/renderer';
import { EXIT_UPDATE_FAILED, runUpdate, validatePacscriptPaths } from './update';

const API = 'https://repology.test/api/v1';
const SHA256 = 'b94d27b9934d3e08a52e52d7da7dabfac484efe37a5380ee9088f7ace2efcde9';
const server = setupServer();

let dir: string;

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), 'pacup-cli-'));
});

afterEach(async () => {
  await fs.rm(dir, { recursive: true, force: true });
});

async function write(file: string, text = ''): Promise<string> {
  const target = path.join(dir, file);
  await fs.writeFile(target, text);
  return target;
}

describe('validatePacscriptPaths', () => {
  it('resolves existing pacscripts against the working directory', async () => {
    await write('foo.pacscript');

    expect(validatePacscriptPaths(['foo.pacscript'], dir)).toEqual([
      path.join(dir, 'foo.pacscript'),
    ]);
  });

  it('rejects other extensions', () => {
    expect(() => validatePacscriptPaths(['foo.sh'], dir)).toThrow(
      new UsageError('All pacscripts must have a .pacscript extension.'),
    );
  });

  it('rejects git pacscripts', () => {
    expect(() => validatePacscriptPaths(['foo-git.pacscript'], dir)).toThrow(
      'Git pacscripts are not supported.',
    );
  });

  it('rejects missing files and directories', async () => {
    await fs.mkdir(path.join(dir, 'bar.pacscript'));

    expect(() => validatePacscriptPaths(['foo.pacscript'], dir)).toThrow(
      'Pacscript not found: foo.pacscript',
    );
    expect(() => validatePacscriptPaths(['bar.pacscript'], dir)).toThrow(
      'Not a file: bar.pacscript',
    );
  });

  it('requires at least one pacscript', () => {
    expect(() => validatePacscriptPaths([], dir)).toThrow(UsageError);
  });
});

describe('runUpdate', () => {
  let lines: string[];
  const installer = { install: vi.fn(async () => undefined) };
  const prompt = { confirm: vi.fn(async () => true) };

  beforeAll(() => server.listen({ onUnhandledRequest: 'error' }));
  afterAll(() => server.close());

  beforeEach(() => {
    lines = [];
    installer.install.mockClear();
    prompt.confirm.mockClear();
    server.use(
      http.get(`${API}/project/foo`, () =>
        HttpResponse.json([{ repo: 'arch', version: '2.0', status: 'newest' }]),
      ),
    );
  });

  afterEach(() => server.resetHandlers());

  function pacscript(version: string): string {
    return [
      'pkgname="foo"',
      `version="${version}"`,
      `url="https://downloads.test/foo-${version}.deb"`,
      'hash="old"',
      'repology=("project: foo")',
      '',
    ].join('\n');
  }

  function run(files: string[]) {
    return runUpdate(
      files,
      {},
      {
        cwd: dir,
        config: ConfigSchema.parse({
          repology: { apiUrl: API },
          download: { dir: path.join(dir, 'downloads') },
        }),
        renderer: new UpdateRenderer({ out: (line) => lines.push(stripAnsi(line)) }),
        prompt,
        installer,
        logger: new ConsoleLogger(),
      },
    );
  }

  it('updates an outdated pacscript and exits cleanly', async () => {
    const file = await write('foo.pacscript', pacscript('1.0'));
    server.use(
      http.get('https://downloads.test/foo-2.0.deb', () => HttpResponse.text('hello world')),
    );

    await expect(run(['foo.pacscript'])).resolves.toBe(0);

    expect(await fs.readFile(file, 'utf8')).toBe(
      [
        'pkgname="foo"',
        'version="2.0"',
        'url="https://downloads.test/foo-1.0.deb"',
        `hash="${SHA256}"`,
        'repology=("project: foo")',
        '',
      ].join('\n'),
    );
    expect(installer.install).toHaveBeenCalledTimes(1);
    expect(lines).toContain('=> Updating foo pacscript (1.0 => 2.0)');
    expect(lines).toContain('Summary');
  });

  it('exits with the failure status when an update fails', async () => {
    await write('foo.pacscript', pacscript('1.0'));
    server.use(
      http.get('https://downloads.test/foo-2.0.deb', () => new HttpResponse(null, { status: 404 })),
    );

    await expect(run(['foo.pacscript'])).resolves.toBe(EXIT_UPDATE_FAILED);

    expect(installer.install).not.toHaveBeenCalled();
    expect(lines).toContain('    ❌ Failed to update pacscript foo: HTTP status error: 404');
  });

  it('leaves up-to-date pacscripts alone', async () => {
    const file = await write('foo.pacscript', pacscript('2.0'));

    await expect(run(['foo.pacscript'])).resolves.toBe(0);

    expect(await fs.readFile(file, 'utf8')).toBe(pacscript('2.0'));
    expect(lines[0]).toBe('Version statuses');
    expect(lines[1].split('\n')[0]).toBe('Up To Date');
    expect(lines).not.toContain('Summary');
  });

  it('rejects invalid arguments before doing any work', async () => {
    await expect(run(['foo-git.pacscript'])).rejects.toThrow(UsageError);
  });
});
