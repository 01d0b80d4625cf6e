import { UsageError, atomicWrite } from '@pacup/shared';
import type { Pacscript } from '../pacscript/types';

const DIFF_CONTEXT = 3;

type RewriteTarget = Pick<Pacscript, 'name' | 'rawLines' | 'hashLineNumber'> & {
  version: { lineNumber: number };
};

/**
 * Returns the pacscript's lines with `version=` and `hash=` replaced. Every other line is kept as is.
 */
export function rewritePacscript(
  record: RewriteTarget,
  latestVersion: string,
  hash: string,
): string[] {
  const { lineNumber } = record.version;
  if (lineNumber < 0 || lineNumber >= record.rawLines.length) {
    throw new UsageError(`${record.name} has no version= line to update`);
  }
  if (record.hashLineNumber < 0 || record.hashLineNumber >= record.rawLines.length) {
    throw new UsageError(`${record.name} has no hash= line to update`);
  }

  const lines = [...record.rawLines];
  lines[lineNumber] = `version="${latestVersion}"\n`;
  lines[record.hashLineNumber] = `hash="${hash}"\n`;
  return lines;
}

function withoutTerminator(line: string): string {
  return line.replace(/\r?\n$/, '');
}

/**
 * Unified diff of two versions of a file whose lines were replaced in place.
 * Returns an empty string when nothing changed.
 */
export function renderLineDiff(
  before: readonly string[],
  after: readonly string[],
  fromName: string,
  toName: string,
): string {
  const length = Math.max(before.length, after.length);
  const changed: number[] = [];
  for (let i = 0; i < length; i++) {
    if (before[i] !== after[i]) changed.push(i);
  }
  if (changed.length === 0) return '';

  // Group changes whose context windows touch into one hunk.
  const hunks: Array<[number, number]> = [];
  for (const index of changed) {
    const last = hunks.at(-1);
    if (last && index - last[1] <= DIFF_CONTEXT * 2 + 1) {
      last[1] = index;
    } else {
      hunks.push([index, index]);
    }
  }

  const out = [`--- ${fromName}`, `+++ ${toName}`];
  for (const [first, last] of hunks) {
    const start = Math.max(0, first - DIFF_CONTEXT);
    const end = Math.min(length - 1, last + DIFF_CONTEXT);
    const body: string[] = [];
    let oldCount = 0;
    let newCount = 0;

    let i = start;
    while (i <= end) {
      if (before[i] === after[i]) {
        body.push(` ${withoutTerminator(before[i])}`);
        oldCount++;
        newCount++;
        i++;
        continue;
      }
      const runStart = i;
      while (i <= end && before[i] !== after[i]) i++;
      for (let j = runStart; j < i; j++) {
        const line = before[j];
        if (line !== undefined) {
          body.push(`-${withoutTerminator(line)}`);
          oldCount++;
        }
      }
      for (let j = runStart; j < i; j++) {
        const line = after[j];
        if (line !== undefined) {
          body.push(`+${withoutTerminator(line)}`);
          newCount++;
        }
      }
    }

    out.push(`@@ -${start + 1},${oldCount} +${start + 1},${newCount} @@`, ...body);
  }
  return `${out.join('\n')}\n`;
}

export async function writePacscript(filePath: string, lines: readonly string[]): Promise<void> {
  await atomicWrite(filePath, lines.join(''));
}
