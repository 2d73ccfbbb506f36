import type { RateLimitSnapshot } from "./types";

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export const sleep: Sleep = (ms, signal) =>
  new Promise<void>((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    signal?.addEventListener("abort", onAbort, { once: true });
  });

export class RateLimiter {
  private remaining = 5000;
  private resetAt = new Date(Date.now() + 60_000);
  private threshold: number;
  private wait: Sleep;

  constructor(threshold: number = 100, wait: Sleep = sleep) {
    this.threshold = threshold;
    this.wait = wait;
  }

  get remainingPoints(): number {
    return this.remaining;
  }

  async checkAndWait(signal?: AbortSignal) {
    const now = Date.now();
    if (this.remaining > this.threshold || this.resetAt.getTime() <= now) {
      return;
    }
    const waitMs = this.resetAt.getTime() - now + 1000;
    const seconds = Math.ceil(waitMs / 1000);
    console.log(`⏸️  Rate limit low (${this.remaining} remaining). Waiting ${seconds}s until ${this.resetAt.toISOString()}…`);
    await this.wait(waitMs, signal);
  }

  updateFromSnapshot(snapshot: RateLimitSnapshot | null | undefined) {
    if (!snapshot) {
      return;
    }
    if (Number.isFinite(snapshot.remaining)) {
      this.remaining = snapshot.remaining;
    }
    const resetAt = new Date(snapshot.resetAt);
    if (!Number.isNaN(resetAt.getTime())) {
      this.resetAt = resetAt;
    }
  }
}
