import { describeUnknownError } from "../errors/index.js";
import type { BridgeLogger } from "../logging/index.js";
import type { Clock } from "../shared/clock.js";
import type { ProviderSession, SessionProbe, SessionState } from "./types.js";

export interface SessionRegistryOptions {
  clock: Clock;
  logger: BridgeLogger;
  /** A session checked longer ago than this is re-probed by `refreshIfStale`. */
  refreshIntervalMs: number;
}

interface SessionSlot {
  session: ProviderSession;
  probe: SessionProbe;
  checked: boolean;
}

export class SessionRegistry {
  private readonly slots = new Map<string, SessionSlot>();
  private readonly clock: Clock;
  private readonly logger: BridgeLogger;
  private readonly refreshIntervalMs: number;

  public constructor(options: SessionRegistryOptions) {
    this.clock = options.clock;
    this.logger = options.logger;
    this.refreshIntervalMs = Math.max(0, options.refreshIntervalMs);
  }

  public register(providerId: string, probe: SessionProbe): void {
    const existing = this.slots.get(providerId);
    if (existing) {
      existing.probe = probe;
      return;
    }
    this.slots.set(providerId, {
      probe,
      checked: false,
      session: { providerId, state: "LoggedOut", lastCheckedAt: 0 },
    });
  }

  public has(providerId: string): boolean {
    return this.slots.has(providerId);
  }

  public get(providerId: string): ProviderSession | null {
    const slot = this.slots.get(providerId);
    return slot ? { ...slot.session } : null;
  }

  public list(): ProviderSession[] {
    return [...this.slots.values()].map((slot) => ({ ...slot.session }));
  }

  public ready(providerId: string): boolean {
    return this.slots.get(providerId)?.session.state === "Ready";
  }

  public async refresh(providerId: string): Promise<ProviderSession> {
    const slot = this.slots.get(providerId);
    if (!slot) {
      return { providerId, state: "LoggedOut", lastCheckedAt: this.clock.now(), detail: "unregistered" };
    }
    let next: SessionState;
    let detail: string | undefined;
    try {
      next = await slot.probe({ ...slot.session });
    } catch (error) {
      next = "LoggedOut";
      detail = describeUnknownError(error);
    }
    this.transition(slot, next, detail);
    return { ...slot.session };
  }

  public async refreshIfStale(providerId: string): Promise<ProviderSession | null> {
    const slot = this.slots.get(providerId);
    if (!slot) return null;
    const age = this.clock.now() - slot.session.lastCheckedAt;
    if (slot.checked && age < this.refreshIntervalMs) return { ...slot.session };
    return this.refresh(providerId);
  }

  public markExpired(providerId: string, reason: string): void {
    const slot = this.slots.get(providerId);
    if (!slot) return;
    this.transition(slot, "Expired", reason);
  }

  /**
   * Re-probes the given sessions until all are ready or the wait runs out.
   * Returns the ids still not ready.
   */
  public async waitUntilReady(
    providerIds: readonly string[],
    timeoutMs: number,
    pollIntervalMs: number,
    signal?: AbortSignal,
  ): Promise<string[]> {
    const deadline = this.clock.now() + Math.max(0, timeoutMs);
    let pending = [...providerIds];
    while (true) {
      const stillPending: string[] = [];
      for (const providerId of pending) {
        const session = await this.refresh(providerId);
        if (session.state !== "Ready") stillPending.push(providerId);
      }
      pending = stillPending;
      if (pending.length === 0 || signal?.aborted) return pending;
      const remaining = deadline - this.clock.now();
      if (remaining <= 0) return pending;
      await this.clock.sleep(Math.min(Math.max(1, pollIntervalMs), remaining), signal);
    }
  }

  private transition(slot: SessionSlot, next: SessionState, detail?: string): void {
    const previous = slot.session.state;
    slot.checked = true;
    slot.session = {
      providerId: slot.session.providerId,
      state: next,
      lastCheckedAt: this.clock.now(),
      ...(detail ? { detail } : {}),
    };
    if (previous === next) return;
    const message = `Session ${slot.session.providerId}: ${previous} -> ${next}${detail ? ` (${detail})` : ""}`;
    if (next === "Ready") this.logger.info(message);
    else this.logger.warn(message);
  }
}
