export type Sleeper = (ms: number) => Promise<void>;

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface CountdownOptions {
  tickMs: number;
  signal?: AbortSignal;
  now?: () => number;
  sleep?: Sleeper;
  onTick?: (remainingMs: number) => void;
}

/**
 * Wait until `deadline` in ticks of at most `tickMs`, checking the abort
 * signal between ticks. Resolves true when the deadline passed, false when
 * aborted first.
 */
export async function countdown(deadline: number, options: CountdownOptions): Promise<boolean> {
  const now = options.now ?? Date.now;
  const wait = options.sleep ?? sleep;
  for (;;) {
    if (options.signal?.aborted) return false;
    const remaining = deadline - now();
    if (remaining <= 0) return true;
    options.onTick?.(remaining);
    await wait(Math.min(options.tickMs, remaining));
  }
}
