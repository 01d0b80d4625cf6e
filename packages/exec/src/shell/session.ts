import { spawn, ChildProcess } from 'child_process';
import { randomUUID } from 'crypto';
import { EvaluationError, TimeoutError, Logger } from '@pacup/shared';

export interface BashSessionOptions {
  /** Interpreter to spawn. */
  shell?: string;
  /** Max time to wait for one query's reply. */
  timeoutMs?: number;
  /** Time `close()` waits for a clean exit before killing. */
  closeGraceMs?: number;
  logger?: Logger;
}

interface PendingQuery {
  sentinel: string;
  resolve: (output: string) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
}

const DEFAULT_TIMEOUT_MS = 10_000;
const DEFAULT_CLOSE_GRACE_MS = 2_000;

/**
 * A long-lived bash process that has sourced one pacscript.
 *
 * Each query is written to stdin followed by a sentinel `printf`; the reply is
 * everything on stdout before the sentinel line. Queries run one at a time.
 */
export class BashSession {
  private readonly child: ChildProcess;
  private readonly timeoutMs: number;
  private readonly closeGraceMs: number;
  private readonly logger?: Logger;
  private readonly exited: Promise<number | null>;
  private buffer = '';
  private stderr = '';
  private pending?: PendingQuery;
  private queue: Promise<unknown> = Promise.resolve();
  private exitCode: number | null = null;
  private isExited = false;
  private failure?: Error;

  private constructor(source: string, options: BashSessionOptions) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.closeGraceMs = options.closeGraceMs ?? DEFAULT_CLOSE_GRACE_MS;
    this.logger = options.logger;

    this.child = spawn(options.shell ?? '/bin/bash', ['--noprofile', '--norc'], {
      stdio: ['pipe', 'pipe', 'pipe'],
    });

    this.exited = new Promise((resolve) => {
      this.child.on('close', (code) => {
        this.markExited(code, `Shell exited with code ${code ?? 'null'}`);
        resolve(code);
      });
      this.child.on('error', (err) => {
        this.markExited(null, `Shell failed to start: ${err.message}`, err);
        resolve(null);
      });
    });

    // Writing to stdin can race with process exit and produce EPIPE.
    this.child.stdin?.on('error', (err: NodeJS.ErrnoException) => {
      if (err.code === 'EPIPE') {
        return;
      }
      this.markExited(null, `Shell stdin failed: ${err.message}`, err);
    });

    this.child.stdout?.setEncoding('utf8');
    this.child.stdout?.on('data', (chunk: string) => this.handleStdout(chunk));
    this.child.stderr?.setEncoding('utf8');
    this.child.stderr?.on('data', (chunk: string) => {
      this.stderr += chunk;
    });

    const delimiter = `PACUP_EOF_${randomUUID().replace(/-/g, '')}`;
    this.write(`source /dev/stdin <<'${delimiter}'\n${source}\n${delimiter}\n`);
  }

  /**
   * Spawns the interpreter, sources `source` into it and waits until it answers.
   * Anything the pacscript prints while being sourced is discarded.
   */
  static async start(source: string, options: BashSessionOptions = {}): Promise<BashSession> {
    const session = new BashSession(source, options);
    try {
      await session.run(':');
    } catch (error) {
      await session.close();
      throw error;
    }
    return session;
  }

  get running(): boolean {
    return !this.isExited;
  }

  /**
   * Runs `command` in the session and returns its stdout, trimmed.
   */
  run(command: string): Promise<string> {
    const next = this.queue.then(() => this.query(command));
    // Keep the chain alive after a failed query.
    this.queue = next.catch(() => undefined);
    return next;
  }

  /**
   * Closes stdin and waits for the interpreter to exit, killing it after the grace period.
   */
  async close(): Promise<void> {
    if (!this.isExited) {
      this.child.stdin?.end();
      const grace = new Promise<'timeout'>((resolve) => {
        const timer = setTimeout(() => resolve('timeout'), this.closeGraceMs);
        timer.unref();
      });
      const outcome = await Promise.race([this.exited, grace]);
      if (outcome === 'timeout' && !this.isExited) {
        this.logger?.warn('Shell did not exit after stdin closed, killing it');
        this.child.kill('SIGKILL');
      }
    }
    await this.exited;
  }

  private query(command: string): Promise<string> {
    if (this.isExited) {
      return Promise.reject(
        new EvaluationError(this.failure?.message ?? 'Shell is not running', {
          cause: this.failure,
          details: this.stderr || undefined,
        }),
      );
    }

    const sentinel = `__PACUP_DONE_${randomUUID().replace(/-/g, '')}__`;
    return new Promise<string>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending = undefined;
        const cause = new TimeoutError(`No reply within ${this.timeoutMs}ms`);
        reject(new EvaluationError(`Shell stopped answering: ${command}`, { cause }));
        // A session that missed a sentinel cannot be trusted for later queries.
        this.child.kill('SIGKILL');
      }, this.timeoutMs);

      this.pending = { sentinel, resolve, reject, timer };
      this.logger?.debug(`shell <- ${command}`);
      this.write(`${command}\nprintf '\\n%s\\n' '${sentinel}'\n`);
      this.drain();
    });
  }

  private write(data: string): void {
    const stdin = this.child.stdin;
    if (stdin && !stdin.destroyed && stdin.writable) {
      stdin.write(data);
    }
  }

  private handleStdout(chunk: string): void {
    this.buffer += chunk;
    this.drain();
  }

  private drain(): void {
    const pending = this.pending;
    if (!pending) return;

    const marker = `\n${pending.sentinel}\n`;
    const index = this.buffer.indexOf(marker);
    if (index === -1) return;

    const output = this.buffer.slice(0, index);
    this.buffer = this.buffer.slice(index + marker.length);
    this.pending = undefined;
    clearTimeout(pending.timer);
    this.logger?.debug(`shell -> ${output.trim()}`);
    pending.resolve(output.trim());
  }

  private markExited(code: number | null, message: string, cause?: Error): void {
    if (this.isExited) return;
    this.isExited = true;
    this.exitCode = code;
    this.failure = new EvaluationError(message, { cause });

    const pending = this.pending;
    if (pending) {
      this.pending = undefined;
      clearTimeout(pending.timer);
      pending.reject(
        new EvaluationError(message, {
          cause,
          details: this.stderr || undefined,
        }),
      );
    }
  }

  /** Exit code once the interpreter has stopped, otherwise null. */
  get lastExitCode(): number | null {
    return this.exitCode;
  }
}
