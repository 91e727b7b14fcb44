/**
 * The single "running" flag shared by the capture loop and the keep-alive
 * task. It starts true and flips to false once; it is never reset.
 */
export class RunState {
  private isRunning = true;
  private stopListeners: Array<() => void> = [];

  get running(): boolean {
    return this.isRunning;
  }

  /**
   * Returns false when the run was already stopped.
   */
  stop(): boolean {
    if (!this.isRunning) {
      return false;
    }
    this.isRunning = false;
    const listeners = this.stopListeners;
    this.stopListeners = [];
    listeners.forEach((listener) => listener());
    return true;
  }

  /**
   * Resolves once `stop()` has been called.
   */
  stopped(): Promise<void> {
    if (!this.isRunning) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.stopListeners.push(resolve);
    });
  }
}
