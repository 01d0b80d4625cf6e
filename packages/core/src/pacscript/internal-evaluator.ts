import { UnsupportedExpressionError } from '@pacup/shared';
import type { ShellEvaluator } from './evaluator';

type Binding =
  | { kind: 'scalar'; value: string }
  | { kind: 'array'; values: string[] }
  | { kind: 'unsupported'; reason: string };

type Lookup = { values: string[] } | { unsupported: string };

type WordContext = 'scalar' | 'array';

interface Word {
  fields: string[];
  unsupported?: string;
}

const NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;
const NAME = /[A-Za-z_][A-Za-z0-9_]*/y;
const ASSIGNMENT = /([A-Za-z_][A-Za-z0-9_]*)(\+?=)/y;
const DECLARATION = /(?:export|readonly|declare|typeset|local)[ \t]+(?:-[A-Za-z]+[ \t]+)*/y;
const FUNCTION_HEADER =
  /(?:function[ \t]+)?[A-Za-z_][\w:.-]*[ \t]*\([ \t]*\)[ \t\n]*\{|function[ \t]+[A-Za-z_][\w:.-]*[ \t\n]*\{/y;

const WORD_BREAK = new Set([' ', '\t', '\n', ';', '&', '|', '<', '>', '(', ')']);
const GLOB_CHARS = new Set(['*', '?', '[']);
const SPECIAL_PARAMETERS = new Set(['0', '1', '2', '3', '4', '5', '6', '7', '8', '9', '@', '*', '#', '?', '$', '!', '-']);

/** Shell variables bash computes itself; their values cannot be known without a shell. */
const DYNAMIC_VARIABLES = new Set([
  'RANDOM',
  'SRANDOM',
  'SECONDS',
  'LINENO',
  'BASHPID',
  'EPOCHSECONDS',
  'EPOCHREALTIME',
  'BASH_SOURCE',
  'BASH',
  'BASH_VERSION',
  'FUNCNAME',
  'PIPESTATUS',
  'PPID',
  'UID',
  'EUID',
  'HOSTNAME',
  'HOSTTYPE',
  'OSTYPE',
  'MACHTYPE',
]);

export interface InternalEvaluatorOptions {
  /** Variables visible to the pacscript that it does not assign itself. */
  env?: NodeJS.ProcessEnv;
}

/**
 * Evaluates the assignment subset of bash that pacscripts use for their metadata:
 * scalar and array assignments (`=`, `+=`, multi-line `( ... )`), quoting, backslash
 * escapes, and `$name`, `${name}`, `${name[@]}`, `${name[*]}`, `${name[N]}`,
 * `${#name}` and `${#name[@]}` expansions. Function definitions are skipped.
 *
 * Anything else makes the affected variables (or, for top-level commands, the whole
 * pacscript) raise `UnsupportedExpressionError` so a real shell can answer instead.
 */
export class InternalEvaluator implements ShellEvaluator {
  private readonly scope = new Map<string, Binding>();
  private readonly env: NodeJS.ProcessEnv;
  private readonly source: string;
  private pos = 0;
  private fileUnsupported?: string;

  constructor(source: string, options: InternalEvaluatorOptions = {}) {
    this.source = source;
    this.env = options.env ?? process.env;
    this.interpret();
  }

  async expandVariable(name: string): Promise<string> {
    const values = this.resolve(name);
    // `echo ${name}` word-splits the first element and joins the words with one space.
    return (values[0] ?? '').split(/[ \t\n]+/).filter(Boolean).join(' ');
  }

  async expandArray(name: string): Promise<string[]> {
    return [...this.resolve(name)];
  }

  async close(): Promise<void> {}

  private resolve(name: string): string[] {
    if (!NAME_PATTERN.test(name)) {
      throw new UnsupportedExpressionError(`Not a variable name: ${name}`);
    }
    if (this.fileUnsupported) {
      throw new UnsupportedExpressionError(this.fileUnsupported);
    }
    const result = this.lookup(name);
    if ('unsupported' in result) {
      throw new UnsupportedExpressionError(result.unsupported);
    }
    return result.values;
  }

  private lookup(name: string): Lookup {
    const binding = this.scope.get(name);
    if (binding) {
      switch (binding.kind) {
        case 'scalar':
          return { values: [binding.value] };
        case 'array':
          return { values: binding.values };
        case 'unsupported':
          return { unsupported: binding.reason };
      }
    }
    if (DYNAMIC_VARIABLES.has(name)) {
      return { unsupported: `$${name} is computed by the shell` };
    }
    const fromEnv = this.env[name];
    return { values: fromEnv === undefined ? [] : [fromEnv] };
  }

  // Top-level statements

  private interpret(): void {
    while (!this.fileUnsupported) {
      this.skipBlank();
      if (this.eof()) return;

      if (this.peek() === '#') {
        this.skipComment();
      } else if (this.match(FUNCTION_HEADER) !== undefined) {
        this.skipFunctionBody();
      } else if (this.match(DECLARATION) !== undefined) {
        this.readAssignments(true);
      } else if (!this.readAssignments(false)) {
        this.markFileUnsupported('Unsupported statement');
      }
    }
  }

  /**
   * Reads `name=value` assignments up to the end of the statement.
   * Returns false when the statement does not start with an assignment.
   */
  private readAssignments(declaration: boolean): boolean {
    let count = 0;
    for (;;) {
      const assignment = this.matchGroups(ASSIGNMENT);
      if (assignment) {
        this.readAssignment(assignment[1], assignment[2] === '+=');
        count++;
      } else if (declaration && this.match(NAME) !== undefined) {
        // `export FOO` without a value leaves FOO as it was.
        count++;
      } else if (count === 0) {
        return false;
      } else {
        this.markFileUnsupported('Command after assignment');
        return true;
      }

      this.skipInlineSpace();
      const next = this.peek();
      if (this.eof() || next === '\n' || next === ';') return true;
      if (next === '#') {
        this.skipComment();
        return true;
      }
      if (this.fileUnsupported) return true;
    }
  }

  private readAssignment(name: string, append: boolean): void {
    if (this.peek() === '(') {
      this.pos++;
      const { values, unsupported } = this.readArrayLiteral();
      if (this.fileUnsupported) return;
      this.assignArray(name, values, append, unsupported);
      return;
    }
    const word = this.readWord('scalar');
    this.assignScalar(name, word.fields.join(' '), append, word.unsupported);
  }

  private readArrayLiteral(): { values: string[]; unsupported?: string } {
    const values: string[] = [];
    let unsupported: string | undefined;
    for (;;) {
      this.skipBlank(false);
      if (this.eof()) {
        this.markFileUnsupported('Unterminated array');
        return { values };
      }
      const c = this.peek();
      if (c === ')') {
        this.pos++;
        return { values, unsupported };
      }
      if (c === '#') {
        this.skipComment();
        continue;
      }
      const start = this.pos;
      const word = this.readWord('array');
      if (this.pos === start) {
        this.markFileUnsupported(`Unexpected "${c}" in array`);
        return { values };
      }
      unsupported ??= word.unsupported;
      values.push(...word.fields);
    }
  }

  private assignScalar(name: string, value: string, append: boolean, unsupported?: string): void {
    if (unsupported) {
      this.scope.set(name, { kind: 'unsupported', reason: unsupported });
      return;
    }
    let base = '';
    if (append) {
      const current = this.lookup(name);
      if ('unsupported' in current) {
        this.scope.set(name, { kind: 'unsupported', reason: current.unsupported });
        return;
      }
      base = current.values[0] ?? '';
    }
    const existing = this.scope.get(name);
    if (existing?.kind === 'array') {
      // Assigning a scalar to an array variable replaces element 0.
      this.scope.set(name, { kind: 'array', values: [base + value, ...existing.values.slice(1)] });
      return;
    }
    this.scope.set(name, { kind: 'scalar', value: base + value });
  }

  private assignArray(name: string, values: string[], append: boolean, unsupported?: string): void {
    if (unsupported) {
      this.scope.set(name, { kind: 'unsupported', reason: unsupported });
      return;
    }
    let base: string[] = [];
    if (append) {
      const current = this.lookup(name);
      if ('unsupported' in current) {
        this.scope.set(name, { kind: 'unsupported', reason: current.unsupported });
        return;
      }
      base = current.values;
    }
    this.scope.set(name, { kind: 'array', values: [...base, ...values] });
  }

  // Words

  private readWord(context: WordContext): Word {
    const fields: string[] = [''];
    // Whether each field holds literal or quoted text (quoted empty strings still count).
    const solid: boolean[] = [false];
    let unsupported: string | undefined;
    let emptySplat = false;
    const start = this.pos;

    const note = (reason: string) => {
      unsupported ??= reason;
    };
    const append = (text: string, isSolid = true) => {
      fields[fields.length - 1] += text;
      if (isSolid) solid[solid.length - 1] = true;
    };
    const appendFields = (values: string[], quoted: boolean) => {
      if (values.length === 0) return;
      append(values[0], quoted);
      for (const value of values.slice(1)) {
        fields.push(value);
        solid.push(quoted);
      }
    };
    const appendExpansion = (values: string[], quoted: boolean, splat: boolean) => {
      if (!quoted && context === 'array' && values.some((v) => /[ \t\n]/.test(v))) {
        note('Unquoted expansion with whitespace');
      }
      if (splat && (quoted || context === 'array')) {
        if (quoted && values.length === 0) emptySplat = true;
        appendFields(values, quoted);
      } else {
        append(values.join(' '), quoted);
      }
    };

    while (!this.eof()) {
      const c = this.peek();
      if (WORD_BREAK.has(c)) break;

      if (c === '\\') {
        const next = this.source[this.pos + 1];
        if (next === '\n') {
          this.pos += 2;
        } else if (next === undefined) {
          append('\\');
          this.pos++;
        } else {
          append(next);
          this.pos += 2;
        }
      } else if (c === "'") {
        const end = this.source.indexOf("'", this.pos + 1);
        if (end === -1) {
          note('Unterminated single quote');
          this.pos = this.source.length;
        } else {
          append(this.source.slice(this.pos + 1, end));
          this.pos = end + 1;
        }
      } else if (c === '"') {
        this.pos++;
        emptySplat = false;
        this.readDoubleQuoted(append, appendExpansion, note);
        // "${empty[@]}" expands to no word at all, unlike "".
        if (!emptySplat) append('');
      } else if (c === '$') {
        this.readExpansion(false, append, appendExpansion, note);
      } else if (c === '`') {
        note('Command substitution');
        this.skipBackticks();
      } else {
        if (context === 'array' && GLOB_CHARS.has(c)) {
          note(`Glob pattern "${c}"`);
        }
        if (c === '~' && this.pos === start) {
          note('Tilde expansion');
        }
        append(c);
        this.pos++;
      }
    }

    if (context === 'array') {
      return {
        fields: fields.filter((field, i) => solid[i] || field !== ''),
        unsupported,
      };
    }
    return { fields, unsupported };
  }

  private readDoubleQuoted(
    append: (text: string) => void,
    appendExpansion: (values: string[], quoted: boolean, splat: boolean) => void,
    note: (reason: string) => void,
  ): void {
    while (!this.eof()) {
      const c = this.peek();
      if (c === '"') {
        this.pos++;
        return;
      }
      if (c === '\\') {
        const next = this.source[this.pos + 1];
        if (next === '\n') {
          this.pos += 2;
        } else if (next === '$' || next === '`' || next === '"' || next === '\\') {
          append(next);
          this.pos += 2;
        } else {
          append('\\');
          this.pos++;
        }
      } else if (c === '$') {
        this.readExpansion(true, append, appendExpansion, note);
      } else if (c === '`') {
        note('Command substitution');
        this.skipBackticks();
      } else {
        append(c);
        this.pos++;
      }
    }
    note('Unterminated double quote');
  }

  private readExpansion(
    quoted: boolean,
    append: (text: string) => void,
    appendExpansion: (values: string[], quoted: boolean, splat: boolean) => void,
    note: (reason: string) => void,
  ): void {
    const next = this.source[this.pos + 1];

    if (next === '{') {
      const end = this.findClosing(this.pos + 1, '{', '}');
      if (end === -1) {
        note('Unterminated ${');
        this.pos = this.source.length;
        return;
      }
      const body = this.source.slice(this.pos + 2, end);
      this.pos = end + 1;
      this.expandBraced(body, quoted, appendExpansion, note);
      return;
    }

    if (next === '(') {
      note(this.source[this.pos + 2] === '(' ? 'Arithmetic expansion' : 'Command substitution');
      const end = this.findClosing(this.pos + 1, '(', ')');
      this.pos = end === -1 ? this.source.length : end + 1;
      return;
    }

    if (!quoted && (next === "'" || next === '"')) {
      note(next === "'" ? 'ANSI-C quoting' : 'Locale quoting');
      this.pos++;
      return;
    }

    this.pos++;
    const name = this.match(NAME);
    if (name !== undefined) {
      const result = this.lookup(name);
      if ('unsupported' in result) {
        note(result.unsupported);
        return;
      }
      appendExpansion(result.values.slice(0, 1), quoted, false);
      return;
    }

    if (next !== undefined && SPECIAL_PARAMETERS.has(next)) {
      note(`Special parameter $${next}`);
      this.pos++;
      return;
    }

    append('$');
  }

  private expandBraced(
    body: string,
    quoted: boolean,
    appendExpansion: (values: string[], quoted: boolean, splat: boolean) => void,
    note: (reason: string) => void,
  ): void {
    const withLookup = (name: string, use: (values: string[]) => void) => {
      const result = this.lookup(name);
      if ('unsupported' in result) {
        note(result.unsupported);
      } else {
        use(result.values);
      }
    };

    let m: RegExpExecArray | null;
    if ((m = /^#([A-Za-z_]\w*)\[[@*]\]$/.exec(body))) {
      withLookup(m[1], (values) => appendExpansion([String(values.length)], quoted, false));
    } else if ((m = /^#([A-Za-z_]\w*)$/.exec(body))) {
      withLookup(m[1], (values) =>
        appendExpansion([String((values[0] ?? '').length)], quoted, false),
      );
    } else if ((m = /^([A-Za-z_]\w*)$/.exec(body))) {
      withLookup(m[1], (values) => appendExpansion(values.slice(0, 1), quoted, false));
    } else if ((m = /^([A-Za-z_]\w*)\[@\]$/.exec(body))) {
      withLookup(m[1], (values) => appendExpansion(values, quoted, true));
    } else if ((m = /^([A-Za-z_]\w*)\[\*\]$/.exec(body))) {
      withLookup(m[1], (values) =>
        quoted ? appendExpansion([values.join(' ')], true, false) : appendExpansion(values, false, true),
      );
    } else if ((m = /^([A-Za-z_]\w*)\[(\d+)\]$/.exec(body))) {
      const index = Number(m[2]);
      withLookup(m[1], (values) => {
        const element = values[index];
        appendExpansion(element === undefined ? [] : [element], quoted, false);
      });
    } else {
      note(`Parameter expansion \${${body}}`);
    }
  }

  // Scanning helpers

  private eof(): boolean {
    return this.pos >= this.source.length;
  }

  private peek(): string {
    return this.source[this.pos];
  }

  private match(pattern: RegExp): string | undefined {
    const groups = this.matchGroups(pattern);
    return groups ? groups[0] : undefined;
  }

  private matchGroups(pattern: RegExp): RegExpExecArray | undefined {
    pattern.lastIndex = this.pos;
    const m = pattern.exec(this.source);
    if (!m) return undefined;
    this.pos = pattern.lastIndex;
    return m;
  }

  private skipBlank(allowSemicolon = true): void {
    while (!this.eof()) {
      const c = this.peek();
      if (c === ' ' || c === '\t' || c === '\n' || c === '\r' || (allowSemicolon && c === ';')) {
        this.pos++;
      } else if (c === '\\' && this.source[this.pos + 1] === '\n') {
        this.pos += 2;
      } else {
        return;
      }
    }
  }

  private skipInlineSpace(): void {
    while (!this.eof()) {
      const c = this.peek();
      if (c === ' ' || c === '\t' || c === '\r') {
        this.pos++;
      } else if (c === '\\' && this.source[this.pos + 1] === '\n') {
        this.pos += 2;
      } else {
        return;
      }
    }
  }

  private skipComment(): void {
    const end = this.source.indexOf('\n', this.pos);
    this.pos = end === -1 ? this.source.length : end;
  }

  private skipBackticks(): void {
    let i = this.pos + 1;
    while (i < this.source.length && this.source[i] !== '`') {
      i += this.source[i] === '\\' ? 2 : 1;
    }
    this.pos = Math.min(i + 1, this.source.length);
  }

  private skipFunctionBody(): void {
    // FUNCTION_HEADER consumed the opening brace.
    const end = this.findClosing(this.pos - 1, '{', '}');
    if (end === -1) {
      this.markFileUnsupported('Unterminated function body');
      return;
    }
    this.pos = end + 1;
  }

  /**
   * Finds the bracket closing the one at `openIndex`, skipping quoted text,
   * escapes and comments. Returns -1 when there is none.
   */
  private findClosing(openIndex: number, open: string, close: string): number {
    let depth = 0;
    let i = openIndex;
    while (i < this.source.length) {
      const c = this.source[i];
      if (c === '\\') {
        i += 2;
        continue;
      }
      if (c === "'") {
        const end = this.source.indexOf("'", i + 1);
        if (end === -1) return -1;
        i = end + 1;
        continue;
      }
      if (c === '"') {
        i++;
        while (i < this.source.length && this.source[i] !== '"') {
          i += this.source[i] === '\\' ? 2 : 1;
        }
        i++;
        continue;
      }
      if (c === '#' && i > openIndex && /[\s;]/.test(this.source[i - 1])) {
        const end = this.source.indexOf('\n', i);
        if (end === -1) return -1;
        i = end;
        continue;
      }
      if (c === open) depth++;
      if (c === close) {
        depth--;
        if (depth === 0) return i;
      }
      i++;
    }
    return -1;
  }

  private markFileUnsupported(reason: string): void {
    const line = this.source.slice(0, this.pos).split('\n').length;
    this.fileUnsupported = `${reason} at line ${line}`;
  }
}
