import { describe, it, expect, beforeAll, beforeEach, afterAll, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { http, HttpResponse } from 'msw';
import { setupServer } from 'msw/node';
import { ManifestReadError, type Logger } from '@pacup/shared';
import { groupByStatus, parsePacscripts, type BatchContext } from './batch';
import { ResolutionFailure, failed, resolved } from './version/types';

const API = 'https://repology.test/api/v1';
const server = setupServer();

const silent: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  child: () => silent,
};

function pacscriptText(project: string, version: string, repology = `("project: ${project}")`) {
  return [
    `pkgname="${project}"`,
    `version="${version}"`,
    `url="https://github.com/acme/${project}/releases/download/v${version}/${project}.deb"`,
    'hash="abc"',
    `repology=${repology}`,
    '',
  ].join('\n');
}

function repology(project: string, version: string) {
  server.use(
    http.get(`${API}/project/${project}`, () =>
      HttpResponse.json([{ repo: 'arch', version, status: 'newest' }]),
    ),
  );
}

describe('parsePacscripts', () => {
  let dir: string;
  const ctx: BatchContext = { resolve: { apiUrl: API }, logger: silent };

  beforeAll(() => server.listen({ onUnhandledRequest: 'error' }));
  afterAll(() => server.close());

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'pacup-batch-'));
  });

  afterEach(async () => {
    server.resetHandlers();
    await fs.rm(dir, { recursive: true, force: true });
  });

  async function write(name: string, text: string): Promise<string> {
    const file = path.join(dir, `${name}.pacscript`);
    await fs.writeFile(file, text);
    return file;
  }

  it('resolves the latest version and fetches notes for outdated pacscripts', async () => {
    const file = await write('foo', pacscriptText('foo', '1.0'));
    repology('foo', '2.0');
    server.use(
      http.get('https://api.github.com/repos/acme/foo/releases', () =>
        HttpResponse.json([
          { tag_name: 'v2.0', body: 'Faster' },
          { tag_name: 'v1.0', body: 'First' },
        ]),
      ),
    );

    const [outcome] = await parsePacscripts([file], ctx);

    expect(outcome.ok).toBe(true);
    if (!outcome.ok) return;
    expect(outcome.pacscript.version).toEqual({
      lineNumber: 1,
      current: '1.0',
      latest: resolved('2.0'),
    });
    expect(outcome.pacscript.releaseNotes).toEqual(new Map([['v2.0', 'Faster']]));
  });

  it('skips release notes when the pacscript is up to date', async () => {
    const file = await write('foo', pacscriptText('foo', '2.0'));
    repology('foo', '2.0');

    const [outcome] = await parsePacscripts([file], ctx);

    expect(outcome.ok && outcome.pacscript.releaseNotes.size).toBe(0);
  });

  it('keeps input order and isolates failures', async () => {
    const missing = path.join(dir, 'missing.pacscript');
    const bar = await write('bar', pacscriptText('bar', '1.0', '()'));
    const foo = await write('foo', pacscriptText('foo', '2.0'));
    repology('foo', '2.0');

    const outcomes = await parsePacscripts([missing, bar, foo], ctx);

    expect(outcomes.map((outcome) => outcome.ok)).toEqual([false, true, true]);
    const [first, second] = outcomes;
    expect(!first.ok && first.error).toBeInstanceOf(ManifestReadError);
    expect(!first.ok && first.path).toBe(missing);
    expect(second.ok && second.pacscript.version.latest).toEqual(
      failed(ResolutionFailure.NO_FILTERS),
    );
    expect(outcomes[2].ok && outcomes[2].pacscript.path).toBe(foo);
  });
});

describe('groupByStatus', () => {
  const base = {
    path: 'x.pacscript',
    name: 'x',
    packageName: 'x',
    downloadUrl: { lineNumber: -1, value: '' },
    hashLineNumber: -1,
    maintainer: '',
    filterCriteria: new Map<string, string>(),
    releaseNotes: new Map<string, string>(),
    rawLines: [],
  };

  it('sorts pacscripts into status groups', () => {
    const outdated = { ...base, version: { lineNumber: 0, current: '1.0', latest: resolved('2.0') } };
    const updated = { ...base, version: { lineNumber: 0, current: '2.0', latest: resolved('2.0') } };
    const newer = { ...base, version: { lineNumber: 0, current: '3.0', latest: resolved('2.0') } };
    const unknown = {
      ...base,
      version: { lineNumber: 0, current: '1.0', latest: failed(ResolutionFailure.NOT_FOUND) },
    };
    const error = new Error('boom');

    const groups = groupByStatus([
      { ok: true, pacscript: outdated },
      { ok: true, pacscript: updated },
      { ok: true, pacscript: newer },
      { ok: true, pacscript: unknown },
      { ok: false, path: 'y.pacscript', error },
    ]);

    expect(groups).toEqual({
      outdated: [outdated],
      updated: [updated],
      newer: [newer],
      unknown: [unknown],
      failed: [{ path: 'y.pacscript', error }],
    });
  });
});
