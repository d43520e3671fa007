import { ElementNotFoundError, TimeoutFailureError } from "./errors.js";

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export type Check<T> = () => Promise<T | null | undefined | false>;

export interface PollOptions {
  timeoutMs: number;
  intervalMs: number;
  description: string;
}

/**
 * Re-run `check` until it yields a value. A missing element only means
 * "not rendered yet"; every other error ends the wait immediately.
 */
export async function pollUntil<T>(check: Check<T>, opts: PollOptions): Promise<T> {
  const deadline = Date.now() + opts.timeoutMs;
  for (;;) {
    try {
      const value = await check();
      if (value !== null && value !== undefined && value !== false) return value;
    } catch (error) {
      if (!(error instanceof ElementNotFoundError)) throw error;
    }
    const remaining = deadline - Date.now();
    if (remaining <= 0) {
      throw new TimeoutFailureError(opts.description, opts.timeoutMs);
    }
    await sleep(Math.min(opts.intervalMs, remaining));
  }
}
