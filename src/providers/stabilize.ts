import { withTimeout, type Clock } from "../shared/clock.js";

export type StabilizePhase = "polling" | "stable" | "timed-out";

export interface ResponseSnapshot {
  /** Number of response blocks on the page; 0 when the surface cannot tell. */
  turns: number;
  text: string;
}

export interface StabilizeOptions {
  read: () => Promise<ResponseSnapshot>;
  baseline: ResponseSnapshot;
  clock: Clock;
  timeoutMs: number;
  pollIntervalMs: number;
  /** Settle time before the first read, counted against the timeout. */
  initialWaitMs?: number;
}

export interface StabilizeOutcome {
  phase: Exclude<StabilizePhase, "polling">;
  text: string;
  polls: number;
  elapsedMs: number;
}

function isFresh(snapshot: ResponseSnapshot, baseline: ResponseSnapshot): boolean {
  if (!snapshot.text) return false;
  return snapshot.turns > baseline.turns || snapshot.text !== baseline.text;
}

/**
 * Polls the response region until the same fresh text is read twice in a
 * row. Sleeps are capped at the remaining budget and each read at the
 * remaining budget plus one poll interval, so the outcome arrives no later
 * than `timeoutMs` plus one poll interval. A failed or stalled read counts
 * as an empty one.
 */
export async function waitForStableText(options: StabilizeOptions): Promise<StabilizeOutcome> {
  const { clock, baseline } = options;
  const startedAt = clock.now();
  const deadline = startedAt + Math.max(0, options.timeoutMs);
  const pollIntervalMs = Math.max(1, options.pollIntervalMs);

  const initialWait = Math.min(Math.max(0, options.initialWaitMs ?? 0), Math.max(0, options.timeoutMs));
  if (initialWait > 0) await clock.sleep(initialWait);

  let phase: StabilizePhase = "polling";
  let previous = "";
  let lastFresh = "";
  let polls = 0;

  while (phase === "polling") {
    const readBudget = Math.max(0, deadline - clock.now()) + pollIntervalMs;
    const snapshot = await withTimeout(options.read(), readBudget, "Response read").catch(
      (): ResponseSnapshot => ({ turns: 0, text: "" }),
    );
    polls += 1;
    const current = { turns: snapshot.turns, text: snapshot.text.trim() };
    const fresh = isFresh(current, baseline);

    if (fresh && current.text === previous) {
      phase = "stable";
      lastFresh = current.text;
      break;
    }
    previous = fresh ? current.text : "";
    if (fresh) lastFresh = current.text;

    const remaining = deadline - clock.now();
    if (remaining <= 0) {
      phase = "timed-out";
      break;
    }
    await clock.sleep(Math.min(pollIntervalMs, remaining));
  }

  return {
    phase: phase === "stable" ? "stable" : "timed-out",
    text: lastFresh,
    polls,
    elapsedMs: clock.now() - startedAt,
  };
}
