import { describe, it, expect, beforeAll, beforeEach, afterAll, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { http, HttpResponse } from 'msw';
import { setupServer } from 'msw/node';
import { HttpError } from '@pacup/shared';
import { downloadArtifact } from './download';

const server = setupServer();
const ARTIFACT_URL = 'https://downloads.test/releases/foo_1.0_amd64.deb';
const BODY = 'hello world';
const BODY_SHA256 = 'b94d27b9934d3e08a52e52d7da7dabfac484efe37a5380ee9088f7ace2efcde9';

describe('downloadArtifact', () => {
  let dir: string;

  beforeAll(() => server.listen({ onUnhandledRequest: 'error' }));
  afterEach(() => server.resetHandlers());
  afterAll(() => server.close());

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'pacup-download-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  // HttpResponse.text() always sets Content-Length; the bare constructor leaves it out.
  it('writes the artifact and returns its sha256', async () => {
    server.use(
      http.get(ARTIFACT_URL, () =>
        HttpResponse.text(BODY, { headers: { 'Content-Length': String(BODY.length) } }),
      ),
    );
    const progress: Array<[number, number | undefined]> = [];

    const result = await downloadArtifact(ARTIFACT_URL, {
      dir,
      onProgress: (received, total) => progress.push([received, total]),
    });

    expect(result).toEqual({
      sha256: BODY_SHA256,
      path: path.join(dir, 'foo_1.0_amd64.deb'),
      bytes: 11,
    });
    expect(await fs.readFile(result.path, 'utf8')).toBe(BODY);
    expect(progress.at(-1)).toEqual([11, 11]);
  });

  it('asks again with identity encoding when Content-Length is missing', async () => {
    const encodings: Array<string | null> = [];
    server.use(
      http.get(ARTIFACT_URL, ({ request }) => {
        encodings.push(request.headers.get('accept-encoding'));
        return encodings.length === 1
          ? new HttpResponse('compressed garbage')
          : HttpResponse.text(BODY, { headers: { 'Content-Length': String(BODY.length) } });
      }),
    );

    const result = await downloadArtifact(ARTIFACT_URL, { dir, contentLengthRetries: 3 });

    expect(encodings).toHaveLength(2);
    expect(encodings[1]).toBe('identity');
    expect(result.sha256).toBe(BODY_SHA256);
  });

  it('keeps the last response when Content-Length never arrives', async () => {
    let requests = 0;
    server.use(
      http.get(ARTIFACT_URL, () => {
        requests++;
        return new HttpResponse(BODY);
      }),
    );
    const totals: Array<number | undefined> = [];

    const result = await downloadArtifact(ARTIFACT_URL, {
      dir,
      contentLengthRetries: 2,
      onProgress: (_received, total) => totals.push(total),
    });

    expect(requests).toBe(3);
    expect(result.sha256).toBe(BODY_SHA256);
    expect(result.bytes).toBe(11);
    expect(totals.every((total) => total === undefined)).toBe(true);
  });

  it('fails with HttpError carrying the status', async () => {
    server.use(http.get(ARTIFACT_URL, () => new HttpResponse('gone', { status: 404 })));

    const error = await downloadArtifact(ARTIFACT_URL, { dir }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(HttpError);
    expect(error).toMatchObject({ status: 404 });
  });

  it('fails with HttpError when the request cannot be made', async () => {
    server.use(http.get(ARTIFACT_URL, () => HttpResponse.error()));

    const error = await downloadArtifact(ARTIFACT_URL, { dir }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(HttpError);
    expect(error).toMatchObject({ status: undefined });
  });
});
