import type { CacheStore } from "../cache/store.js";
import type { BridgeSettings, ConversationMapping } from "../config/types.js";
import { BridgeError, asBridgeError, describeUnknownError } from "../errors/index.js";
import type { BridgeLogger } from "../logging/index.js";
import type { Message, MessageSource } from "../messaging/types.js";
import type { ProviderAdapter } from "../providers/types.js";
import { providerIdFor, type ChatRouter, type RouteDecision } from "../router/index.js";
import type { SessionRegistry } from "../session/registry.js";
import { MESSAGING_SESSION_ID } from "../session/types.js";
import type { Clock } from "../shared/clock.js";
import type { DispatchResult, DispatchState } from "./types.js";

const TRANSIENT_FAILURE_RETENTION_MS = 60 * 60 * 1000;

export type OrchestratorSettings = Pick<BridgeSettings, "loopIntervalMs" | "maxCycleRetries" | "cleanupEveryCycles">;

export interface OrchestratorDeps {
  router: ChatRouter;
  source: MessageSource;
  cache: CacheStore;
  sessions: SessionRegistry;
  /** Keyed by conversation name. */
  adapters: ReadonlyMap<string, ProviderAdapter>;
  clock: Clock;
  logger: BridgeLogger;
  settings: OrchestratorSettings;
}

/**
 * Single cooperative loop: one conversation and one provider call in flight.
 * Shutdown is honored at the top of each cycle and between messages.
 */
export class Orchestrator {
  private readonly deps: OrchestratorDeps;
  private readonly transientFailures = new Map<string, { count: number; lastFailedAt: number }>();
  private cycles = 0;

  public constructor(deps: OrchestratorDeps) {
    this.deps = deps;
  }

  public get cycleCount(): number {
    return this.cycles;
  }

  /** Fingerprints with transient failures that are still waiting for another cycle. */
  public get pendingRetries(): number {
    return this.transientFailures.size;
  }

  public async run(signal: AbortSignal): Promise<void> {
    const { clock, logger, settings } = this.deps;
    logger.info(`Loop started, ${this.deps.router.list().length} conversations, interval ${settings.loopIntervalMs}ms`);
    while (!signal.aborted) {
      try {
        await this.runCycle(signal);
      } catch (error) {
        logger.error(`Cycle ${this.cycles} failed: ${describeUnknownError(error)}`);
      }
      if (signal.aborted) break;
      await clock.sleep(settings.loopIntervalMs, signal);
    }
    logger.info(`Loop stopped after ${this.cycles} cycles`);
  }

  public async runCycle(signal?: AbortSignal): Promise<DispatchResult[]> {
    const { router, sessions, source, logger, settings } = this.deps;
    const results: DispatchResult[] = [];
    if (signal?.aborted) return results;
    this.cycles += 1;

    if (sessions.has(MESSAGING_SESSION_ID)) {
      await sessions.refreshIfStale(MESSAGING_SESSION_ID);
      if (!sessions.ready(MESSAGING_SESSION_ID)) {
        logger.debug("Messaging surface is not ready, skipping cycle");
        return results;
      }
    }

    for (const mapping of router.list()) {
      if (signal?.aborted) break;
      if (!mapping.enabled) continue;
      const providerId = providerIdFor(mapping);
      await sessions.refreshIfStale(providerId);
      if (!sessions.ready(providerId)) {
        logger.debug(`Skipping ${mapping.name}: ${providerId} is ${sessions.get(providerId)?.state ?? "unregistered"}`);
        continue;
      }

      for await (const message of source.pollNew(mapping.name, signal)) {
        if (signal?.aborted) break;
        const result = await this.dispatch(mapping, message);
        results.push(result);
        this.report(result);
        // Later messages wait until this one is resolved, keeping arrival order.
        if (result.willRetry) break;
      }
    }

    if (settings.cleanupEveryCycles > 0 && this.cycles % settings.cleanupEveryCycles === 0) {
      this.pruneTransientFailures();
      await source.maintain().catch((error: unknown) => {
        logger.warn(`Maintenance failed: ${describeUnknownError(error)}`);
      });
    }
    return results;
  }

  private async dispatch(mapping: ConversationMapping, message: Message): Promise<DispatchResult> {
    const { router, cache, sessions, source } = this.deps;
    const trail: DispatchState[] = ["Detected"];
    const base = { conversation: message.conversation, fingerprint: message.fingerprint, trail };

    if (cache.seen(message.fingerprint)) {
      trail.push("Deduped");
      return { ...base, status: "skipped", reason: "duplicate", willRetry: false };
    }

    const resolved = router.resolve(message.conversation) ?? mapping;
    const providerId = providerIdFor(resolved);
    const adapter = this.deps.adapters.get(resolved.name);
    if (!adapter) {
      trail.push("Skipped");
      return { ...base, status: "skipped", reason: `no adapter for ${resolved.name}`, willRetry: false };
    }

    let decision: RouteDecision;
    try {
      decision = router.route(resolved, message);
    } catch (error) {
      return this.fail(message, providerId, asBridgeError(error, { code: "MALFORMED_INPUT" }), trail);
    }

    if (!sessions.ready(providerId)) {
      trail.push("Skipped");
      return { ...base, status: "skipped", reason: `${providerId} not ready`, errorCode: "SESSION_NOT_READY", willRetry: true };
    }

    let imagePath: string | undefined;
    if (decision.kind === "image") {
      try {
        imagePath = await source.materializeImage(message);
      } catch (error) {
        return this.fail(message, providerId, asBridgeError(error, { code: "TRANSPORT" }), trail);
      }
    }

    trail.push("Dispatched", "AwaitingResponse");
    const answer = await adapter.ask({
      conversation: message.conversation,
      kind: decision.kind,
      model: decision.model,
      prompt: decision.prompt,
      imagePath,
      timeoutMs: decision.timeoutMs,
    });
    if (!answer.ok) return this.fail(message, providerId, answer.error, trail);
    trail.push("Extracted");

    try {
      await source.reply(message.conversation, answer.text);
    } catch (error) {
      return this.fail(message, providerId, asBridgeError(error, { code: "TRANSPORT" }), trail);
    }
    trail.push("Delivered");
    this.transientFailures.delete(message.fingerprint);

    this.markProcessed(message, trail);
    return { ...base, status: "delivered", responseText: answer.text, willRetry: false };
  }

  private fail(message: Message, providerId: string, error: BridgeError, trail: DispatchState[]): DispatchResult {
    const { sessions, clock, settings } = this.deps;
    const base = { conversation: message.conversation, fingerprint: message.fingerprint, trail, errorCode: error.code };

    if (error.code === "AUTH_FAILED" || error.code === "SESSION_NOT_READY") {
      if (error.code === "AUTH_FAILED") sessions.markExpired(providerId, error.message);
      trail.push("Skipped");
      return { ...base, status: "skipped", reason: error.message, willRetry: true };
    }

    trail.push("Failed");
    if (error.retryable) {
      const failures = (this.transientFailures.get(message.fingerprint)?.count ?? 0) + 1;
      if (failures < settings.maxCycleRetries) {
        this.transientFailures.set(message.fingerprint, { count: failures, lastFailedAt: clock.now() });
        return {
          ...base,
          status: "failed",
          reason: `${error.message} (attempt ${failures}/${settings.maxCycleRetries})`,
          willRetry: true,
        };
      }
      this.transientFailures.delete(message.fingerprint);
      this.markProcessed(message, trail);
      return { ...base, status: "failed", reason: `gave up after ${failures} cycles: ${error.message}`, willRetry: false };
    }

    this.markProcessed(message, trail);
    return { ...base, status: "failed", reason: error.message, willRetry: false };
  }

  // Counters of messages that scrolled away before a retry would otherwise stay forever.
  private pruneTransientFailures(): void {
    const cutoff = this.deps.clock.now() - TRANSIENT_FAILURE_RETENTION_MS;
    for (const [fingerprint, entry] of this.transientFailures) {
      if (entry.lastFailedAt < cutoff) this.transientFailures.delete(fingerprint);
    }
  }

  // A failed write is logged; the outcome still stands and the message may be seen again.
  private markProcessed(message: Message, trail: DispatchState[]): void {
    const { cache, clock, logger } = this.deps;
    try {
      cache.mark(message.fingerprint, clock.now());
      trail.push("Cached");
    } catch (error) {
      logger.error(
        `Cache write for ${message.conversation} ${message.fingerprint.slice(0, 12)} failed: ${describeUnknownError(error)}`,
      );
    }
  }

  private report(result: DispatchResult): void {
    const { logger } = this.deps;
    const label = `${result.conversation} ${result.fingerprint.slice(0, 12)}`;
    const trail = result.trail.join(" > ");
    if (result.status === "delivered") {
      logger.info(`Delivered reply to ${label} [${trail}]`);
    } else if (result.status === "failed") {
      const line = `Dispatch to ${label} failed: ${result.reason ?? "unknown"} [${trail}]`;
      if (result.willRetry) logger.warn(line);
      else logger.error(line);
    } else {
      logger.debug(`Skipped ${label}: ${result.reason ?? ""} [${trail}]`);
    }
  }
}

export type { DispatchResult, DispatchState, DispatchStatus } from "./types.js";
