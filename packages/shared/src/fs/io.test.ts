import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { atomicWrite } from './io';

describe('atomicWrite', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'pacup-io-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('creates missing parent directories', async () => {
    const target = path.join(dir, 'nested', 'deeper', 'foo.pacscript');
    await atomicWrite(target, 'pkgname="foo"\n');
    expect(await fs.readFile(target, 'utf8')).toBe('pkgname="foo"\n');
  });

  it('replaces existing content and leaves no temp files behind', async () => {
    const target = path.join(dir, 'foo.pacscript');
    await fs.writeFile(target, 'old\n');

    await atomicWrite(target, 'new\n');

    expect(await fs.readFile(target, 'utf8')).toBe('new\n');
    expect(await fs.readdir(dir)).toEqual(['foo.pacscript']);
  });
});
