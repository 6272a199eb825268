import type { TcpLineConfig } from "./config";

/** Doubling delay before the next connection attempt, bounded by the configured window. */
export class ReconnectBackoff {
  private failures = 0;

  constructor(private readonly window: TcpLineConfig["reconnect"]) {}

  next(): number {
    const { minBackoffMs, maxBackoffMs } = this.window;
    const delay = Math.min(maxBackoffMs, minBackoffMs * 2 ** this.failures);
    this.failures += 1;
    return delay;
  }

  reset(): void {
    this.failures = 0;
  }
}
