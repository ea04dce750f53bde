/**
 * Single-slot timer holder.
 *
 * Setting a new timer always clears the previous one, so a holder can never
 * leak more than one pending callback.
 *
 * ```typescript
 * const guard = new TimerGuard('batch:bge-small');
 * guard.set(() => flush(), 5);
 * guard.clear();
 * ```
 */
export class TimerGuard {
  private timer?: NodeJS.Timeout;
  private readonly name: string;

  constructor(name = 'anonymous') {
    this.name = name;
  }

  /**
   * Arm the timer, replacing any pending one.
   */
  set(callback: () => void, delayMs: number): void {
    this.clear();
    this.timer = setTimeout(() => {
      this.timer = undefined;
      callback();
    }, delayMs);
  }

  /**
   * Idempotent.
   */
  clear(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
  }

  isActive(): boolean {
    return this.timer !== undefined;
  }

  getName(): string {
    return this.name;
  }
}
