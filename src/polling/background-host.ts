/**
 * Deferred wake-ups requested while the primary is in a constrained
 * (background) execution state. The host owns at most one pending wake.
 */
export interface BackgroundHost {
  requestDeferredWake(delayMs: number, wake: () => void): void;
  cancelDeferredWake(): void;
}

export class TimerBackgroundHost implements BackgroundHost {
  private timer: ReturnType<typeof setTimeout> | null = null;

  requestDeferredWake(delayMs: number, wake: () => void): void {
    this.cancelDeferredWake();
    this.timer = setTimeout(() => {
      this.timer = null;
      wake();
    }, delayMs);
    // never keeps the process alive on its own
    this.timer.unref?.();
  }

  cancelDeferredWake(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }
}
