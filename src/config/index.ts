import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import type { ZodError } from "zod";
import { ConfigurationError, describeUnknownError } from "../errors/index.js";
import {
  defaultTextModel,
  defaultVisionModel,
  resolveProviderCredentials,
} from "../providers/runtime.js";
import { configFileSchema, type ConversationMappingInput } from "./schema.js";
import type { BridgeConfig, BridgeSettings, ConversationMapping } from "./types.js";

const DEFAULT_CONFIG_PATH = "config.json";

const DEFAULT_SETTINGS: BridgeSettings = {
  uploadDelayMs: 2_000,
  responseWaitTextMs: 2_000,
  responseWaitImageMs: 5_000,
  loginWaitMs: 60_000,
  loopIntervalMs: 5_000,
  maxResponseWaitMs: 120_000,
  pollIntervalMs: 1_000,
  sessionRefreshMs: 30_000,
  materializeTimeoutMs: 15_000,
  maxImageBytes: 5 * 1024 * 1024,
  maxCycleRetries: 5,
  cleanupEveryCycles: 120,
  fingerprintGranularityMs: 60_000,
  apiMaxAttempts: 3,
  apiBackoffBaseMs: 500,
  apiBackoffMaxMs: 8_000,
};

function toNumber(value: string | undefined, fallback: number): number {
  if (!value) return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function toIntInRange(
  value: string | undefined,
  fallback: number,
  minValue: number,
  maxValue: number,
): number {
  const parsed = Math.floor(toNumber(value, fallback));
  return Math.max(minValue, Math.min(maxValue, parsed));
}

function resolveSettings(env: NodeJS.ProcessEnv): BridgeSettings {
  const base = DEFAULT_SETTINGS;
  return {
    uploadDelayMs: toIntInRange(env.CHATBRIDGE_UPLOAD_DELAY_MS, base.uploadDelayMs, 0, 120_000),
    responseWaitTextMs: toIntInRange(env.CHATBRIDGE_RESPONSE_WAIT_TEXT_MS, base.responseWaitTextMs, 0, 600_000),
    responseWaitImageMs: toIntInRange(env.CHATBRIDGE_RESPONSE_WAIT_IMAGE_MS, base.responseWaitImageMs, 0, 600_000),
    loginWaitMs: toIntInRange(env.CHATBRIDGE_LOGIN_WAIT_MS, base.loginWaitMs, 0, 3_600_000),
    loopIntervalMs: toIntInRange(env.CHATBRIDGE_LOOP_INTERVAL_MS, base.loopIntervalMs, 100, 3_600_000),
    maxResponseWaitMs: toIntInRange(env.CHATBRIDGE_MAX_RESPONSE_WAIT_MS, base.maxResponseWaitMs, 1_000, 3_600_000),
    pollIntervalMs: toIntInRange(env.CHATBRIDGE_POLL_INTERVAL_MS, base.pollIntervalMs, 50, 60_000),
    sessionRefreshMs: toIntInRange(env.CHATBRIDGE_SESSION_REFRESH_MS, base.sessionRefreshMs, 0, 3_600_000),
    materializeTimeoutMs: toIntInRange(env.CHATBRIDGE_MATERIALIZE_TIMEOUT_MS, base.materializeTimeoutMs, 1_000, 600_000),
    maxImageBytes: toIntInRange(env.CHATBRIDGE_MAX_IMAGE_BYTES, base.maxImageBytes, 1_024, 100 * 1024 * 1024),
    maxCycleRetries: toIntInRange(env.CHATBRIDGE_MAX_CYCLE_RETRIES, base.maxCycleRetries, 1, 1_000),
    cleanupEveryCycles: toIntInRange(env.CHATBRIDGE_CLEANUP_EVERY_CYCLES, base.cleanupEveryCycles, 1, 1_000_000),
    fingerprintGranularityMs: toIntInRange(
      env.CHATBRIDGE_FINGERPRINT_GRANULARITY_MS,
      base.fingerprintGranularityMs,
      1_000,
      86_400_000,
    ),
    apiMaxAttempts: toIntInRange(env.CHATBRIDGE_API_MAX_ATTEMPTS, base.apiMaxAttempts, 1, 10),
    apiBackoffBaseMs: toIntInRange(env.CHATBRIDGE_API_BACKOFF_BASE_MS, base.apiBackoffBaseMs, 0, 60_000),
    apiBackoffMaxMs: toIntInRange(env.CHATBRIDGE_API_BACKOFF_MAX_MS, base.apiBackoffMaxMs, 0, 300_000),
  };
}

function formatZodError(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}

function toMapping(name: string, input: ConversationMappingInput): ConversationMapping {
  const shared = {
    name,
    textPromptTemplate: input.textPromptTemplate,
    imagePromptTemplate: input.imagePromptTemplate,
    systemPrompt: input.systemPrompt,
    historyTurns: input.historyTurns,
    maxPromptChars: input.maxPromptChars,
    waits: { ...input.waits },
    enabled: input.enabled,
  };
  if (input.transport === "api") {
    return {
      ...shared,
      transport: "api",
      provider: input.provider,
      baseUrl: input.baseUrl,
      textModel: input.textModel || defaultTextModel(input.provider),
      visionModel: input.visionModel || defaultVisionModel(input.provider),
    };
  }
  return {
    ...shared,
    transport: "ui",
    provider: input.provider,
    url: input.url,
    selectors: { ...input.selectors },
    reloadAfterResponse: input.reloadAfterResponse,
    textModel: input.textModel ?? "",
    visionModel: input.visionModel ?? "",
  };
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

function readConfigDocument(configPath: string): unknown {
  let raw: string;
  try {
    raw = fs.readFileSync(configPath, "utf8");
  } catch (error) {
    throw new ConfigurationError(`Config file is unreadable: ${configPath} (${describeUnknownError(error)})`, error);
  }
  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError(`Config file is not valid JSON: ${configPath} (${describeUnknownError(error)})`, error);
  }
}

export interface LoadConfigOptions {
  configPath?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Loads the conversation mapping document, validates it and layers the
 * environment settings on top. The result is frozen.
 */
export function loadConfig(options: LoadConfigOptions = {}): BridgeConfig {
  const env = options.env ?? process.env;
  const configPath = path.resolve(options.configPath ?? env.CHATBRIDGE_CONFIG ?? DEFAULT_CONFIG_PATH);
  const parsed = configFileSchema.safeParse(readConfigDocument(configPath));
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid config ${configPath}: ${formatZodError(parsed.error)}`, parsed.error);
  }

  const file = parsed.data;
  const baseDir = path.dirname(configPath);
  const conversations = Object.entries(file.conversations).map(([name, input]) => toMapping(name, input));

  const config: BridgeConfig = {
    configPath,
    messagingUrl: file.messagingUrl,
    ignore: [...file.ignore],
    cacheFile: path.resolve(baseDir, env.CHATBRIDGE_CACHE_FILE ?? file.cacheFile ?? ".cache.json"),
    imageDir: path.resolve(
      baseDir,
      env.CHATBRIDGE_IMAGE_DIR ?? file.imageDir ?? path.join(os.tmpdir(), "chatbridge-images"),
    ),
    browserProfileDir: path.resolve(
      baseDir,
      env.CHATBRIDGE_BROWSER_PROFILE_DIR ?? file.browserProfileDir ?? ".browser-profile",
    ),
    conversations,
    settings: resolveSettings(env),
    credentials: resolveProviderCredentials(env),
  };
  return deepFreeze(config);
}

export { DEFAULT_CONFIG_PATH, DEFAULT_SETTINGS };
export type {
  ApiConversationMapping,
  BridgeConfig,
  BridgeSettings,
  ConversationMapping,
  ProviderWaits,
  TransportKind,
  UiConversationMapping,
  UiSelectors,
} from "./types.js";
