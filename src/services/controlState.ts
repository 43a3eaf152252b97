/**
 * Pause/cancel flags shared between the command side (HTTP handlers)
 * and the running crawl. Checked at chunk boundaries, recursion steps
 * and before every retry.
 */
export class ControlState {
  private paused = false;
  private canceled = false;
  private pauseWaiters: Array<() => void> = [];
  private sleepWaiters: Array<() => void> = [];

  get isPaused(): boolean {
    return this.paused;
  }

  get isCanceled(): boolean {
    return this.canceled;
  }

  pause(): void {
    if (this.canceled) return;
    this.paused = true;
  }

  resume(): void {
    this.paused = false;
    this.pauseWaiters = release(this.pauseWaiters);
  }

  /**
   * Cancel is sticky for the lifetime of this state object
   */
  cancel(): void {
    this.canceled = true;
    this.pauseWaiters = release(this.pauseWaiters);
    this.sleepWaiters = release(this.sleepWaiters);
  }

  /**
   * Resolves immediately unless paused; otherwise once resumed or canceled.
   */
  waitWhilePaused(): Promise<void> {
    if (!this.paused || this.canceled) {
      return Promise.resolve();
    }
    return new Promise<void>(resolve => {
      this.pauseWaiters.push(resolve);
    });
  }

  /**
   * Sleep that ends early when the run is canceled
   */
  sleep(ms: number): Promise<void> {
    if (this.canceled || ms <= 0) {
      return Promise.resolve();
    }
    return new Promise<void>(resolve => {
      const done = (): void => {
        clearTimeout(timer);
        this.sleepWaiters = this.sleepWaiters.filter(waiter => waiter !== done);
        resolve();
      };
      const timer = setTimeout(done, ms);
      this.sleepWaiters.push(done);
    });
  }
}

function release(waiters: Array<() => void>): Array<() => void> {
  waiters.forEach(waiter => waiter());
  return [];
}
