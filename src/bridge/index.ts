import { CacheStore } from "../cache/store.js";
import type { ApiConversationMapping, BridgeConfig, UiConversationMapping } from "../config/types.js";
import { describeUnknownError } from "../errors/index.js";
import type { BridgeLogger } from "../logging/index.js";
import { ImageStore } from "../messaging/media.js";
import { BrowserMessageSource } from "../messaging/source.js";
import { WhatsAppWebSurface } from "../messaging/whatsapp.js";
import { Orchestrator } from "../orchestrator/index.js";
import { createAdapter } from "../providers/factory.js";
import type { ProviderCredentials } from "../providers/runtime.js";
import type { ProviderAdapter, ProviderClient } from "../providers/types.js";
import { ChatRouter, providerIdFor } from "../router/index.js";
import { createApiProbe, createMessagingProbe, createUiProbe } from "../session/probes.js";
import { SessionRegistry } from "../session/registry.js";
import { MESSAGING_SESSION_ID } from "../session/types.js";
import { createSystemClock, type Clock } from "../shared/clock.js";
import { BrowserProviderSurface } from "../browser/provider-surface.js";
import { AgentBrowserDriver, type BrowserDriver } from "../browser/driver.js";

export interface BridgeDeps {
  logger: BridgeLogger;
  clock?: Clock;
  driver?: BrowserDriver;
  clientFor?: (mapping: ApiConversationMapping, credentials: ProviderCredentials) => ProviderClient;
}

export interface Bridge {
  readonly orchestrator: Orchestrator;
  readonly sessions: SessionRegistry;
  readonly cache: CacheStore;
  /** Opens the browser tabs and waits for logins. Returns the sessions still not ready. */
  start(signal?: AbortSignal): Promise<string[]>;
  run(signal: AbortSignal): Promise<void>;
}

/**
 * Wires the configured conversations into one orchestrator. UI conversations
 * that share a provider share its browser tab and session.
 */
export function createBridge(config: BridgeConfig, deps: BridgeDeps): Bridge {
  const { logger } = deps;
  const clock = deps.clock ?? createSystemClock();
  const settings = config.settings;
  const driver =
    deps.driver ??
    new AgentBrowserDriver({ logger: logger.getSubLogger({ name: "browser" }), profileDir: config.browserProfileDir });

  const chat = new WhatsAppWebSurface(driver.tab(MESSAGING_SESSION_ID), config.messagingUrl);
  const sessions = new SessionRegistry({
    clock,
    logger: logger.getSubLogger({ name: "sessions" }),
    refreshIntervalMs: settings.sessionRefreshMs,
  });
  sessions.register(MESSAGING_SESSION_ID, createMessagingProbe(chat));

  const surfaces = new Map<string, BrowserProviderSurface>();
  const surfaceFor = (mapping: UiConversationMapping): BrowserProviderSurface => {
    const providerId = providerIdFor(mapping);
    const existing = surfaces.get(providerId);
    if (existing) return existing;
    const surface = new BrowserProviderSurface(driver.tab(providerId), mapping);
    surfaces.set(providerId, surface);
    sessions.register(providerId, createUiProbe(surface));
    return surface;
  };

  const adapters = new Map<string, ProviderAdapter>();
  for (const mapping of config.conversations) {
    if (!mapping.enabled) continue;
    if (mapping.transport === "api") {
      sessions.register(providerIdFor(mapping), createApiProbe(config.credentials[mapping.provider]));
    }
    adapters.set(
      mapping.name,
      createAdapter(mapping, {
        clock,
        logger,
        settings,
        credentials: config.credentials,
        surfaceFor,
        clientFor: deps.clientFor,
      }),
    );
  }

  const cache = new CacheStore({ file: config.cacheFile, logger: logger.getSubLogger({ name: "cache" }), now: clock.now });
  cache.load();

  const source = new BrowserMessageSource({
    surface: chat,
    images: new ImageStore({ dir: config.imageDir, now: clock.now }),
    clock,
    logger: logger.getSubLogger({ name: "messaging" }),
    ignore: config.ignore,
    granularityMs: settings.fingerprintGranularityMs,
    materializeTimeoutMs: settings.materializeTimeoutMs,
  });

  const orchestrator = new Orchestrator({
    router: new ChatRouter({ conversations: config.conversations, defaultTimeoutMs: settings.maxResponseWaitMs, logger }),
    source,
    cache,
    sessions,
    adapters,
    clock,
    logger: logger.getSubLogger({ name: "orchestrator" }),
    settings,
  });

  const open = async (label: string, task: () => Promise<void>): Promise<void> => {
    try {
      await task();
    } catch (error) {
      logger.warn(`Could not open ${label}: ${describeUnknownError(error)}`);
    }
  };

  const start = async (signal?: AbortSignal): Promise<string[]> => {
    await open("messaging tab", () => chat.open());
    for (const [providerId, surface] of surfaces) {
      if (signal?.aborted) break;
      await open(`${providerId} tab`, () => surface.open());
    }
    const ids = sessions.list().map((session) => session.providerId);
    logger.info(`Waiting up to ${settings.loginWaitMs}ms for ${ids.length} sessions`);
    const pending = await sessions.waitUntilReady(ids, settings.loginWaitMs, settings.pollIntervalMs, signal);
    for (const providerId of pending) {
      const session = sessions.get(providerId);
      logger.warn(`${providerId} is ${session?.state ?? "unregistered"}, its conversations wait until it is ready`);
    }
    return pending;
  };

  return {
    orchestrator,
    sessions,
    cache,
    start,
    run: async (signal) => {
      await start(signal);
      if (signal.aborted) return;
      await orchestrator.run(signal);
    },
  };
}
