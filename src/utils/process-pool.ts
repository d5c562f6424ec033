import type { Readable } from 'stream';
import { ConsoleLogger, Logger, noopLogger } from './logger';

/**
 * The part of a spawned child the runner relies on. Node's ChildProcess
 * satisfies it structurally; tests provide an in-process fake.
 */
export interface ChildHandle {
  readonly pid?: number;
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  kill(signal?: NodeJS.Signals | number): boolean;
  once(event: 'close', listener: (code: number | null, signal: NodeJS.Signals | null) => void): this;
  on(event: 'error', listener: (error: Error) => void): this;
}

// Live children of one runner
export class ChildPool {
  private readonly children = new Set<ChildHandle>();

  add(child: ChildHandle): void {
    if (this.children.has(child)) {
      throw new Error(`Process "${child.pid}" is already tracked`);
    }
    this.children.add(child);
  }

  remove(child: ChildHandle): boolean {
    return this.children.delete(child);
  }

  has(child: ChildHandle): boolean {
    return this.children.has(child);
  }

  get size(): number {
    return this.children.size;
  }

  /**
   * Force-kills and forgets every tracked child. Returns how many were
   * signalled. A child that is already gone is skipped.
   */
  killAll(reason: string, logger: Logger = noopLogger): number {
    let killed = 0;
    for (const child of [...this.children]) {
      this.children.delete(child);
      try {
        child.kill('SIGKILL');
        killed += 1;
        logger.warn(`Process "${child.pid}" killed because ${reason}`);
      } catch (error) {
        logger.debug?.(`Process "${child.pid}" could not be killed`, {
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
    return killed;
  }
}

export interface ExitHost {
  once(event: 'exit', listener: () => void): unknown;
}

/**
 * Owns the single process-lifetime exit hook. Pools register here instead of
 * each runner installing its own listener.
 */
export class ProcessReaper {
  private readonly pools = new Set<ChildPool>();
  private installed = false;

  constructor(
    private readonly logger: Logger = noopLogger,
    private readonly host: ExitHost = process
  ) {}

  track(pool: ChildPool): void {
    this.pools.add(pool);
    this.install();
  }

  untrack(pool: ChildPool): void {
    this.pools.delete(pool);
  }

  get trackedPools(): number {
    return this.pools.size;
  }

  get isInstalled(): boolean {
    return this.installed;
  }

  reap(): number {
    let killed = 0;
    for (const pool of this.pools) {
      killed += pool.killAll('parent process is shutting down', this.logger);
    }
    return killed;
  }

  private install(): void {
    if (this.installed) {
      return;
    }
    this.installed = true;
    this.host.once('exit', () => {
      this.reap();
    });
  }
}

export const processReaper = new ProcessReaper(new ConsoleLogger());
