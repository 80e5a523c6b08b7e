/** Paces outgoing radio transmissions. */
export interface TxPacer {
  /** Resolves once a transmission is allowed */
  waitForTx(): Promise<void>;
  recordSend(): void;
}

/**
 * Minimum spacing between transmissions. The radio shares airtime with the
 * whole mesh, so every reply page goes through one of these.
 */
export class RateLimiter implements TxPacer {
  private cooldownMs: number;
  private lastSend = 0;

  constructor(cooldownMs: number) {
    this.cooldownMs = cooldownMs;
  }

  canSend(now: number = Date.now()): boolean {
    return now - this.lastSend >= this.cooldownMs;
  }

  timeUntilNext(now: number = Date.now()): number {
    return Math.max(0, this.cooldownMs - (now - this.lastSend));
  }

  recordSend(now: number = Date.now()): void {
    this.lastSend = now;
  }

  async waitForTx(): Promise<void> {
    const waitMs = this.timeUntilNext();
    if (waitMs <= 0) return;
    await new Promise<void>((resolve) => setTimeout(resolve, waitMs));
  }
}
