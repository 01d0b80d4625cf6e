import { BashSession } from '@pacup/exec';
import { EvaluationError, UnsupportedExpressionError, Logger } from '@pacup/shared';
import { InternalEvaluator } from './internal-evaluator';

/**
 * Expands variables of one pacscript.
 * Implementations must answer the same query the same way for the lifetime of the evaluator.
 */
export interface ShellEvaluator {
  /** Value of `echo ${name}`. */
  expandVariable(name: string): Promise<string>;
  /** Elements of `"${name[@]}"`, one per entry. */
  expandArray(name: string): Promise<string[]>;
  /** Releases any interpreter held by the evaluator. Safe to call more than once. */
  close(): Promise<void>;
}

export interface EvaluatorOptions {
  shell?: string;
  timeoutMs?: number;
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
}

const VARIABLE_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

function assertVariableName(name: string): void {
  if (!VARIABLE_NAME.test(name)) {
    throw new EvaluationError(`Not a variable name: ${name}`);
  }
}

/**
 * Answers queries from a bash process that has sourced the pacscript.
 */
export class BashEvaluator implements ShellEvaluator {
  private session?: Promise<BashSession>;

  constructor(
    private readonly source: string,
    private readonly options: EvaluatorOptions = {},
  ) {}

  async expandVariable(name: string): Promise<string> {
    assertVariableName(name);
    const session = await this.start();
    return session.run(`echo \${${name}}`);
  }

  async expandArray(name: string): Promise<string[]> {
    assertVariableName(name);
    const session = await this.start();
    const output = await session.run(
      `for property in "\${${name}[@]}"; do echo "\${property}"; done`,
    );
    return output === '' ? [] : output.split('\n');
  }

  async close(): Promise<void> {
    const pending = this.session;
    this.session = undefined;
    if (!pending) return;
    const session = await pending.catch(() => undefined);
    await session?.close();
  }

  private start(): Promise<BashSession> {
    this.session ??= BashSession.start(this.source, {
      shell: this.options.shell,
      timeoutMs: this.options.timeoutMs,
      logger: this.options.logger,
    });
    return this.session;
  }
}

/**
 * Answers from the internal evaluator and starts bash only for queries it cannot handle.
 */
export class FallbackEvaluator implements ShellEvaluator {
  private readonly internal: InternalEvaluator;
  private readonly bash: BashEvaluator;

  constructor(source: string, private readonly options: EvaluatorOptions = {}) {
    this.internal = new InternalEvaluator(source, { env: options.env });
    this.bash = new BashEvaluator(source, options);
  }

  expandVariable(name: string): Promise<string> {
    return this.withFallback(name, (evaluator) => evaluator.expandVariable(name));
  }

  expandArray(name: string): Promise<string[]> {
    return this.withFallback(name, (evaluator) => evaluator.expandArray(name));
  }

  close(): Promise<void> {
    return this.bash.close();
  }

  private async withFallback<T>(
    name: string,
    query: (evaluator: ShellEvaluator) => Promise<T>,
  ): Promise<T> {
    try {
      return await query(this.internal);
    } catch (error) {
      if (!(error instanceof UnsupportedExpressionError)) {
        throw error;
      }
      this.options.logger?.debug(`Asking bash for ${name}: ${error.message}`);
      return query(this.bash);
    }
  }
}

/**
 * Creates the default evaluator for a pacscript's text.
 */
export function createEvaluator(source: string, options: EvaluatorOptions = {}): ShellEvaluator {
  return new FallbackEvaluator(source, options);
}
