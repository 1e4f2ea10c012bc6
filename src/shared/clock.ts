import { BridgeError } from "../errors/index.js";

export interface Clock {
  now(): number;
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export function createSystemClock(): Clock {
  return {
    now: () => Date.now(),
    sleep: (ms, signal) =>
      new Promise<void>((resolve) => {
        const waitMs = Math.max(0, Math.floor(ms));
        if (signal?.aborted || waitMs === 0) {
          resolve();
          return;
        }
        const onAbort = () => {
          clearTimeout(timer);
          resolve();
        };
        const timer = setTimeout(() => {
          signal?.removeEventListener("abort", onAbort);
          resolve();
        }, waitMs);
        signal?.addEventListener("abort", onAbort, { once: true });
      }),
  };
}

/**
 * Deterministic clock for tests: `sleep` advances `now` instantly.
 */
export function createManualClock(startMs = 0): Clock & { advance(ms: number): void; readonly slept: number[] } {
  let current = startMs;
  const slept: number[] = [];
  return {
    now: () => current,
    sleep: async (ms) => {
      const waitMs = Math.max(0, Math.floor(ms));
      slept.push(waitMs);
      current += waitMs;
    },
    advance: (ms) => {
      current += ms;
    },
    slept,
  };
}

export function withTimeout<T>(promise: Promise<T>, ms: number, label = "request"): Promise<T> {
  let timer: NodeJS.Timeout | null = null;
  const timeoutPromise = new Promise<T>((_, reject) => {
    timer = setTimeout(
      () => reject(new BridgeError({ code: "TRANSPORT", message: `${label} timed out after ${ms}ms`, retryable: true })),
      ms,
    );
  });
  return Promise.race([promise, timeoutPromise]).finally(() => {
    if (timer) clearTimeout(timer);
  });
}
