import { promises as fs } from 'fs';
import { dirname } from 'path';
import { tmpName } from 'tmp-promise';
import fse from 'fs-extra';

export async function ensureDir(path: string): Promise<void> {
  await fse.ensureDir(dirname(path));
}

/**
 * Writes through a sibling temp file and a rename, so readers never see a half-written file.
 */
export async function atomicWrite(path: string, content: string | Buffer): Promise<void> {
  await ensureDir(path);
  const tempPath = await tmpName({ dir: dirname(path) });
  await fs.writeFile(tempPath, content);
  await fs.rename(tempPath, path);
}
