import type { ApiConversationMapping, BridgeSettings, ConversationMapping, UiConversationMapping } from "../config/types.js";
import type { BridgeLogger } from "../logging/index.js";
import { providerIdFor } from "../router/index.js";
import type { Clock } from "../shared/clock.js";
import { ApiAdapter } from "./api-adapter.js";
import { createProviderClient } from "./clients.js";
import type { ApiProviderName, ProviderCredentials } from "./runtime.js";
import type { ProviderAdapter, ProviderClient } from "./types.js";
import { UiAdapter, type ProviderSurface } from "./ui-adapter.js";

export interface AdapterFactoryDeps {
  clock: Clock;
  logger: BridgeLogger;
  settings: BridgeSettings;
  credentials: Record<ApiProviderName, ProviderCredentials>;
  surfaceFor: (mapping: UiConversationMapping) => ProviderSurface;
  clientFor?: (mapping: ApiConversationMapping, credentials: ProviderCredentials) => ProviderClient;
}

/** One adapter per conversation mapping, chosen by transport. */
export function createAdapter(mapping: ConversationMapping, deps: AdapterFactoryDeps): ProviderAdapter {
  const providerId = providerIdFor(mapping);
  const logger = deps.logger.getSubLogger({ name: providerId });
  if (mapping.transport === "ui") {
    return new UiAdapter({
      providerId,
      mapping,
      surface: deps.surfaceFor(mapping),
      clock: deps.clock,
      settings: deps.settings,
      logger,
    });
  }
  const credentials = deps.credentials[mapping.provider];
  const client = deps.clientFor
    ? deps.clientFor(mapping, credentials)
    : createProviderClient(mapping.provider, credentials, mapping.baseUrl);
  return new ApiAdapter({
    providerId,
    mapping,
    client,
    credentials,
    clock: deps.clock,
    settings: deps.settings,
    logger,
  });
}
