// FIFO mutex serializing commands of a singleton runner
export class ExecutionLock {
  private queue: Array<() => void> = [];
  private locked = false;

  async acquire(): Promise<() => void> {
    if (!this.locked) {
      this.locked = true;
      return this.releaser();
    }
    return new Promise(resolve => {
      this.queue.push(() => resolve(this.releaser()));
    });
  }

  get isLocked(): boolean {
    return this.locked;
  }

  get pending(): number {
    return this.queue.length;
  }

  // Releasers are single-use
  private releaser(): () => void {
    let released = false;
    return () => {
      if (released) {
        return;
      }
      released = true;
      this.release();
    };
  }

  private release(): void {
    const next = this.queue.shift();
    if (next) {
      next();
    } else {
      this.locked = false;
    }
  }
}
