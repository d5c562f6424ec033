import { spawn } from 'child_process';
import { TextDecoder } from 'util';
import which from 'which';
import {
  BinaryNotFoundError,
  CommandInput,
  CommandResult,
  InvalidArgumentError,
  LineFilter,
} from '../types';
import { tokenizeCommand } from './command';
import { ExecutionLock } from './execution-lock';
import { Logger, noopLogger } from './logger';
import { ChildHandle, ChildPool, ProcessReaper, processReaper } from './process-pool';

export type Spawner = (command: string, args: string[]) => ChildHandle;

// Returns the absolute path of an executable, or null when it is not on PATH
export type BinaryResolver = (name: string) => string | null;

export interface ProcessRunnerOptions {
  // Serialize every execute() call through one lock
  singleton?: boolean;
  debug?: boolean;
  logger?: Logger;
  spawner?: Spawner;
  resolver?: BinaryResolver;
  reaper?: ProcessReaper;
}

export interface ExecuteOptions {
  timeoutMs?: number;
  filter?: LineFilter;
  onComplete?: (exitCode: number | null, output: string) => void;
}

type ChildOutcome =
  | { kind: 'exit'; code: number | null; signal: NodeJS.Signals | null }
  | { kind: 'timeout' }
  | { kind: 'error'; error: Error };

const defaultSpawner: Spawner = (command, args) =>
  spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'], windowsHide: true });

const defaultResolver: BinaryResolver = name => which.sync(name, { nothrow: true });

const strictDecoder = new TextDecoder('utf-8', { fatal: true });
const lenientDecoder = new TextDecoder('utf-8');

function toBuffer(chunk: Buffer | string): Buffer {
  return typeof chunk === 'string' ? Buffer.from(chunk, 'utf-8') : chunk;
}

export function decodeOutput(data: Buffer): string {
  try {
    return strictDecoder.decode(data);
  } catch {
    // Invalid UTF-8 falls back to replacement characters
    return lenientDecoder.decode(data);
  }
}

// stderr first, then stdout, the way adb prints warnings ahead of results
export function mergeOutput(stderr: string, stdout: string): string {
  const err = stderr.trimEnd();
  const out = stdout.trimEnd();
  if (err.length === 0) {
    return out;
  }
  return `${err}\n${out}`.trimEnd();
}

export function toLinePattern(filter: LineFilter): RegExp {
  if (filter instanceof RegExp) {
    return new RegExp(filter.source, filter.flags.replace(/[gy]/g, ''));
  }
  try {
    return new RegExp(filter);
  } catch (error) {
    throw new InvalidArgumentError(
      `Invalid line filter "${filter}": ${error instanceof Error ? error.message : String(error)}`,
      filter
    );
  }
}

export function filterLines(output: string, pattern: RegExp): string {
  return output
    .split(/\r?\n/)
    .filter(line => pattern.test(line))
    .join('\n');
}

function waitForChild(child: ChildHandle, timeoutMs?: number): Promise<ChildOutcome> {
  return new Promise(resolve => {
    let timer: NodeJS.Timeout | undefined;
    let settled = false;

    const settle = (outcome: ChildOutcome): void => {
      if (settled) {
        return;
      }
      settled = true;
      if (timer) {
        clearTimeout(timer);
      }
      resolve(outcome);
    };

    child.once('close', (code, signal) => settle({ kind: 'exit', code, signal }));
    child.on('error', error => settle({ kind: 'error', error }));

    if (timeoutMs !== undefined && timeoutMs > 0) {
      timer = setTimeout(() => settle({ kind: 'timeout' }), timeoutMs);
    }
  });
}

/**
 * Runs a fixed executable as short-lived child processes.
 *
 * The executable is resolved on PATH once, at construction. Every spawned
 * child sits in the runner's pool until it completes, times out or the host
 * process exits; the pool is registered with a {@link ProcessReaper} whose
 * single exit hook kills whatever is still running.
 *
 * Execution-time trouble (timeouts, undecodable output, spawn failures) is
 * reported in the returned output rather than thrown.
 */
export class ProcessRunner {
  readonly baseArgs: readonly string[];
  readonly singleton: boolean;

  protected readonly debug: boolean;
  protected readonly logger: Logger;

  private readonly pool = new ChildPool();
  private readonly lock?: ExecutionLock;
  private readonly spawner: Spawner;
  private readonly reaper: ProcessReaper;

  constructor(executable: CommandInput | null = null, options: ProcessRunnerOptions = {}) {
    const tokens = tokenizeCommand(executable);
    if (tokens.length > 0) {
      const resolved = (options.resolver ?? defaultResolver)(tokens[0]);
      if (!resolved) {
        throw new BinaryNotFoundError(tokens[0]);
      }
      tokens[0] = resolved;
    }

    this.baseArgs = Object.freeze(tokens);
    this.singleton = options.singleton === true;
    this.debug = options.debug === true;
    this.logger = options.logger ?? noopLogger;
    this.spawner = options.spawner ?? defaultSpawner;
    this.reaper = options.reaper ?? processReaper;
    this.lock = this.singleton ? new ExecutionLock() : undefined;

    this.reaper.track(this.pool);
  }

  get executable(): string | undefined {
    return this.baseArgs[0];
  }

  // Number of children currently running for this runner
  get activeProcesses(): number {
    return this.pool.size;
  }

  async execute(args: CommandInput, options: ExecuteOptions = {}): Promise<CommandResult> {
    const argv = [...this.baseArgs, ...tokenizeCommand(args)];
    if (argv.length === 0) {
      throw new InvalidArgumentError('No command to execute');
    }
    const pattern = options.filter === undefined ? undefined : toLinePattern(options.filter);

    const release = this.lock ? await this.lock.acquire() : undefined;
    let result: CommandResult;
    try {
      result = await this.spawnAndWait(argv, options.timeoutMs);
    } finally {
      release?.();
    }

    if (pattern && !result.timedOut) {
      result = { ...result, output: filterLines(result.output, pattern) };
    }

    this.print(result.output);
    options.onComplete?.(result.exitCode, result.output);
    return result;
  }

  // Kills this runner's children and detaches its pool from the exit hook
  dispose(): number {
    const killed = this.pool.killAll('the runner was disposed', this.logger);
    this.reaper.untrack(this.pool);
    return killed;
  }

  protected print(message: string): void {
    if (this.debug && message.length > 0) {
      this.logger.debug?.(message);
    }
  }

  private async spawnAndWait(argv: string[], timeoutMs?: number): Promise<CommandResult> {
    const [command, ...args] = argv;
    this.print(`> ${argv.join(' ')}`);

    const child = this.spawner(command, args);
    this.pool.add(child);

    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    child.stdout?.on('data', (chunk: Buffer | string) => stdout.push(toBuffer(chunk)));
    child.stderr?.on('data', (chunk: Buffer | string) => stderr.push(toBuffer(chunk)));

    try {
      const outcome = await waitForChild(child, timeoutMs);

      if (outcome.kind === 'timeout') {
        this.kill(child);
        const output = `Process "${child.pid}" timed out after ${timeoutMs} ms`;
        this.logger.warn(output);
        return { exitCode: null, output, timedOut: true };
      }

      if (outcome.kind === 'error') {
        const output = `Process failed to start: ${outcome.error.message}`;
        this.logger.warn(output, { command });
        return { exitCode: null, output, timedOut: false };
      }

      const output = mergeOutput(
        decodeOutput(Buffer.concat(stderr)),
        decodeOutput(Buffer.concat(stdout))
      );
      return { exitCode: outcome.code, output, timedOut: false };
    } finally {
      this.pool.remove(child);
    }
  }

  private kill(child: ChildHandle): void {
    try {
      child.kill('SIGKILL');
    } catch (error) {
      this.logger.debug?.(`Process "${child.pid}" could not be killed`, {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
