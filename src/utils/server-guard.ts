export interface BridgeServerControl {
  killServer(): Promise<string>;
  startServer(): Promise<string>;
}

/**
 * Restarts the adb server at most once per guard. Sessions that share a guard
 * share the restart: concurrent callers await the same attempt, and a failed
 * attempt may be retried by the next caller.
 */
export class BridgeServerGuard {
  private pending?: Promise<void>;
  private done = false;

  get restarted(): boolean {
    return this.done;
  }

  ensureRestarted(control: BridgeServerControl): Promise<void> {
    this.pending ??= this.restart(control);
    return this.pending;
  }

  private async restart(control: BridgeServerControl): Promise<void> {
    try {
      await control.killServer();
      await control.startServer();
      this.done = true;
    } catch (error) {
      this.pending = undefined;
      throw error;
    }
  }
}

// Shared by every session of this process that opts into a fresh server
export const processBridgeGuard = new BridgeServerGuard();
