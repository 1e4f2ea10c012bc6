import type { ApiProviderName, ProviderCredentials } from "../providers/runtime.js";

export type TransportKind = "ui" | "api";

export interface ProviderWaits {
  responseTimeoutMs?: number;
  responseWaitTextMs?: number;
  responseWaitImageMs?: number;
  uploadDelayMs?: number;
}

export interface UiSelectors {
  input: string;
  submit?: string;
  response: string;
  upload?: string;
  authenticated: string;
  login?: string;
}

interface MappingBase {
  name: string;
  provider: string;
  textModel: string;
  visionModel: string;
  textPromptTemplate: string;
  imagePromptTemplate: string;
  systemPrompt: string;
  historyTurns: number;
  maxPromptChars?: number;
  waits: ProviderWaits;
  enabled: boolean;
}

export interface UiConversationMapping extends MappingBase {
  transport: "ui";
  url: string;
  selectors: UiSelectors;
  reloadAfterResponse: boolean;
}

export interface ApiConversationMapping extends MappingBase {
  transport: "api";
  provider: ApiProviderName;
  baseUrl?: string;
}

export type ConversationMapping = UiConversationMapping | ApiConversationMapping;

export interface BridgeSettings {
  uploadDelayMs: number;
  responseWaitTextMs: number;
  responseWaitImageMs: number;
  loginWaitMs: number;
  loopIntervalMs: number;
  maxResponseWaitMs: number;
  pollIntervalMs: number;
  sessionRefreshMs: number;
  materializeTimeoutMs: number;
  maxImageBytes: number;
  maxCycleRetries: number;
  cleanupEveryCycles: number;
  fingerprintGranularityMs: number;
  apiMaxAttempts: number;
  apiBackoffBaseMs: number;
  apiBackoffMaxMs: number;
}

export interface BridgeConfig {
  configPath: string;
  messagingUrl: string;
  ignore: readonly string[];
  cacheFile: string;
  imageDir: string;
  browserProfileDir: string;
  conversations: readonly ConversationMapping[];
  settings: BridgeSettings;
  credentials: Record<ApiProviderName, ProviderCredentials>;
}
