import { computeFingerprint } from "../cache/fingerprint.js";
import type { ApiConversationMapping, BridgeSettings, UiConversationMapping } from "../config/types.js";
import type { Message, MessageKind } from "../messaging/types.js";

export const TEST_SETTINGS: BridgeSettings = {
  uploadDelayMs: 2_000,
  responseWaitTextMs: 2_000,
  responseWaitImageMs: 5_000,
  loginWaitMs: 10_000,
  loopIntervalMs: 5_000,
  maxResponseWaitMs: 30_000,
  pollIntervalMs: 1_000,
  sessionRefreshMs: 30_000,
  materializeTimeoutMs: 15_000,
  maxImageBytes: 1024 * 1024,
  maxCycleRetries: 3,
  cleanupEveryCycles: 120,
  fingerprintGranularityMs: 60_000,
  apiMaxAttempts: 3,
  apiBackoffBaseMs: 500,
  apiBackoffMaxMs: 8_000,
};

export function uiMapping(name: string, overrides: Partial<UiConversationMapping> = {}): UiConversationMapping {
  return {
    name,
    transport: "ui",
    provider: "chatgpt",
    url: "https://chat.example.test/",
    selectors: { input: "#prompt", response: ".answer", authenticated: "#prompt", login: "#login" },
    reloadAfterResponse: false,
    textModel: "",
    visionModel: "",
    textPromptTemplate: "{message}",
    imagePromptTemplate: "Describe this image briefly.",
    systemPrompt: "",
    historyTurns: 0,
    waits: { responseTimeoutMs: 30_000 },
    enabled: true,
    ...overrides,
  };
}

export function apiMapping(name: string, overrides: Partial<ApiConversationMapping> = {}): ApiConversationMapping {
  return {
    name,
    transport: "api",
    provider: "grok",
    textModel: "grok-4-0709",
    visionModel: "grok-2-vision-1212",
    textPromptTemplate: "{message}",
    imagePromptTemplate: "Describe this image briefly.",
    systemPrompt: "",
    historyTurns: 0,
    waits: {},
    enabled: true,
    ...overrides,
  };
}

export function makeMessage(
  conversation: string,
  content: string,
  options: { kind?: MessageKind; arrivedAt?: number; id?: string; caption?: string; sender?: string } = {},
): Message {
  const kind = options.kind ?? "text";
  const arrivedAt = options.arrivedAt ?? 1_700_000_000_000;
  return {
    id: options.id ?? `${conversation}-${arrivedAt}`,
    conversation,
    sender: options.sender ?? "Ana",
    kind,
    content,
    ...(options.caption !== undefined ? { caption: options.caption } : {}),
    arrivedAt,
    fingerprint: computeFingerprint({ conversation, kind, content, arrivedAt }),
  };
}
