/**
 * Timer Lifecycle Guard
 *
 * Owns a single timeout so that a deadline can be armed and cleared
 * without leaking handles after the guarded work finishes.
 *
 * Usage:
 * ```typescript
 * const guard = new TimerGuard('ollama run llama3');
 * guard.set(() => killProcessGroup(child), 300_000);
 * // Later...
 * guard.clear();
 * ```
 */

/**
 * Largest delay setTimeout honours; anything above it fires after 1ms
 */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

export class TimerGuard {
  private timer?: NodeJS.Timeout;
  private fired = false;
  private readonly name: string;

  constructor(name = 'anonymous') {
    this.name = name;
  }

  /**
   * Arm the timer, replacing any timer already set.
   * Delays above MAX_TIMER_DELAY_MS are capped to it.
   */
  set(callback: () => void, delayMs: number): void {
    this.clear();
    this.fired = false;
    this.timer = setTimeout(() => {
      this.timer = undefined;
      this.fired = true;
      callback();
    }, Math.min(delayMs, MAX_TIMER_DELAY_MS));
  }

  /**
   * Clear the timer if set. Idempotent.
   */
  clear(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
  }

  /**
   * Whether the callback of the last armed timer has run
   */
  hasFired(): boolean {
    return this.fired;
  }

  getName(): string {
    return this.name;
  }
}
