import { promises as fs } from 'fs';
import path from 'path';
import { Logger, ManifestReadError, logger as defaultLogger, stripSuffixes } from '@pacup/shared';
import { EvaluatorOptions, ShellEvaluator, createEvaluator } from './evaluator';
import type { Pacscript } from './types';

export const PACSCRIPT_EXTENSION = '.pacscript';

/** A pacscript as read from disk, before any upstream lookup. */
export type ParsedPacscript = Omit<Pacscript, 'version' | 'releaseNotes'> & {
  version: { lineNumber: number; current: string };
};

export interface ParseOptions {
  evaluator?: EvaluatorOptions;
  /** Replaces the default evaluator, mostly for tests. */
  createEvaluator?: (source: string) => ShellEvaluator;
  logger?: Logger;
}

type ScalarField = 'pkgname' | 'version' | 'url' | 'maintainer';

const SCALAR_FIELDS: readonly ScalarField[] = ['pkgname', 'version', 'url', 'maintainer'];
const NEEDS_SHELL = /[$\\]/;
const PLAIN_WORD = /^[^\s"'`;#()]*$/;
const DOUBLE_QUOTED = /^"[^"`]*"$/;
const LITERAL_ARRAY = /^\(\s*(?:"[^"`]*"\s*)*\)$/;

/**
 * Splits text into lines that keep their terminators, so joining them gives the text back.
 */
export function splitLines(text: string): string[] {
  return text.match(/[^\n]*\n|[^\n]+$/g) ?? [];
}

/**
 * Value of a right-hand side that needs no shell, or undefined when it does.
 */
function literalValue(rhs: string): string | undefined {
  if (NEEDS_SHELL.test(rhs)) return undefined;
  if (PLAIN_WORD.test(rhs)) return rhs;
  if (DOUBLE_QUOTED.test(rhs)) return rhs.slice(1, -1);
  return undefined;
}

function literalArray(rhs: string): string[] | undefined {
  if (NEEDS_SHELL.test(rhs) || !LITERAL_ARRAY.test(rhs)) return undefined;
  return [...rhs.matchAll(/"([^"]*)"/g)].map((match) => match[1]);
}

/**
 * Reads `key: value` repology filters into `into`. Stops at the first malformed
 * element and returns it; filters read before it are kept.
 */
function readFilters(elements: readonly string[], into: Map<string, string>): string | undefined {
  for (const element of elements) {
    const parts = element.split(': ');
    if (parts.length !== 2) {
      return element;
    }
    into.set(parts[0], parts[1]);
  }
  return undefined;
}

/**
 * Reads the fields pacup needs from a pacscript. Literal assignments are read
 * directly; anything with expansions or escapes is asked of a shell evaluator.
 */
export async function parsePacscript(
  filePath: string,
  options: ParseOptions = {},
): Promise<ParsedPacscript> {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    throw new ManifestReadError(filePath, { cause: error });
  }

  const name = path.basename(filePath, PACSCRIPT_EXTENSION);
  const log = (options.logger ?? defaultLogger).child({ pacscript: name });
  const rawLines = splitLines(text);

  const record: ParsedPacscript = {
    path: filePath,
    name,
    packageName: stripSuffixes(name, ['-bin', '-deb', '-app']),
    version: { lineNumber: -1, current: '' },
    downloadUrl: { lineNumber: -1, value: '' },
    hashLineNumber: -1,
    maintainer: '',
    filterCriteria: new Map(),
    rawLines,
  };
  const filters = new Map<string, string>();

  let evaluator: ShellEvaluator | undefined;
  const shell = (): ShellEvaluator => {
    evaluator ??= options.createEvaluator
      ? options.createEvaluator(text)
      : createEvaluator(text, { ...options.evaluator, logger: log });
    return evaluator;
  };

  const scalar = async (field: ScalarField, rhs: string): Promise<string> =>
    literalValue(rhs) ?? shell().expandVariable(field);

  try {
    for (const [lineNumber, rawLine] of rawLines.entries()) {
      const line = rawLine.trim();

      if (line.startsWith('hash=')) {
        log.info(`Found hash on line ${lineNumber + 1}`);
        record.hashLineNumber = lineNumber;
        continue;
      }

      if (line.startsWith('repology=')) {
        log.info(`Found repology: ${line}`);
        const rhs = line.slice('repology='.length);
        const elements = literalArray(rhs) ?? (await shell().expandArray('repology'));
        const malformed = readFilters(elements, filters);
        if (malformed !== undefined) {
          log.error(
            new Error(`Expected "key: value", got "${malformed}"`),
            `Failed to parse repology filters for ${name}`,
          );
        }
        continue;
      }

      const field = SCALAR_FIELDS.find((candidate) => line.startsWith(`${candidate}=`));
      if (field === undefined) continue;

      log.info(`Found ${field}: ${line}`);
      const value = await scalar(field, line.slice(field.length + 1));
      switch (field) {
        case 'pkgname':
          record.packageName = value;
          break;
        case 'version':
          record.version = { lineNumber, current: value };
          break;
        case 'url':
          record.downloadUrl = { lineNumber, value };
          break;
        case 'maintainer':
          record.maintainer = value;
          break;
      }
    }
  } finally {
    await evaluator?.close();
  }

  log.debug(`Repology filters: ${JSON.stringify(Object.fromEntries(filters))}`);
  return { ...record, filterCriteria: filters };
}
